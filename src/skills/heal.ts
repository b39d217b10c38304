import { Skill } from "../core/skill.js";

export const SKILL_ID = "heal";

export const skill: Skill = {
	id: SKILL_ID,
	name: "Heal",
	description: "Mend your wounds, restoring part of your health.",
	cost: 8,
	minLevel: 2,
	effect: { type: "heal", ratio: 0.4 },
};
