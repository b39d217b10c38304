/**
 * Power Strike - a single heavy blow.
 */
import { Skill } from "../core/skill.js";

export const SKILL_ID = "power-strike";

export const skill: Skill = {
	id: SKILL_ID,
	name: "Power Strike",
	description: "Put your full weight behind one devastating blow.",
	cost: 10,
	minLevel: 5,
	effect: { type: "damage", multiplier: 2 },
};
