/**
 * Fireball - a burst of flame hurled at the enemy.
 */
import { Skill } from "../core/skill.js";

export const SKILL_ID = "fireball";

export const skill: Skill = {
	id: SKILL_ID,
	name: "Fireball",
	description: "Hurl a ball of fire at the enemy.",
	cost: 6,
	minLevel: 1,
	effect: { type: "damage", multiplier: 1.5 },
};
