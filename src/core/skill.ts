/**
 * Core skill module.
 *
 * Skills are learned once and then used for a mana cost. What a skill does
 * is a closed union of effects resolved by the combat system.
 *
 * @module core/skill
 */

export type SkillEffect =
	/** Strike the enemy for `multiplier` × strength */
	| { type: "damage"; multiplier: number }
	/** Restore `ratio` × max health */
	| { type: "heal"; ratio: number }
	/** Remove the active status effect */
	| { type: "cure" };

export interface Skill {
	id: string;
	name: string;
	description: string;
	/** Mana spent per use */
	cost: number;
	/** Lowest character level that may learn the skill */
	minLevel: number;
	effect: SkillEffect;
}

/** Whether using the skill requires an enemy to be present. */
export function requiresTarget(skill: Skill): boolean {
	return skill.effect.type === "damage";
}
