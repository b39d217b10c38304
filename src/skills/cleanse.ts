/**
 * Cleanse - purges burns and poison.
 */
import { Skill } from "../core/skill.js";

export const SKILL_ID = "cleanse";

export const skill: Skill = {
	id: SKILL_ID,
	name: "Cleanse",
	description: "Purge burns and poison from your body.",
	cost: 5,
	minLevel: 3,
	effect: { type: "cure" },
};
