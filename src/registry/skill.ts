/**
 * Registry: skill - learnable skills by id
 *
 * Skills are static definitions, one module per skill under `src/skills/`,
 * registered when this module loads.
 *
 * @module registry/skill
 */
import { Skill } from "../core/skill.js";
import { skill as FIREBALL } from "../skills/fireball.js";
import { skill as POWER_STRIKE } from "../skills/power-strike.js";
import { skill as HEAL } from "../skills/heal.js";
import { skill as CLEANSE } from "../skills/cleanse.js";

const SKILL_REGISTRY = new Map<string, Skill>();
export const READONLY_SKILL_REGISTRY: ReadonlyMap<string, Skill> =
	SKILL_REGISTRY;
export { READONLY_SKILL_REGISTRY as SKILL_REGISTRY };

/**
 * Registers a skill, replacing any skill with the same id.
 */
export function registerSkill(skill: Skill): void {
	SKILL_REGISTRY.set(skill.id, Object.freeze({ ...skill }));
}

/**
 * Gets a skill by its id.
 * @returns The skill or undefined if no skill has that id
 */
export function getSkillById(id: string): Skill | undefined {
	return SKILL_REGISTRY.get(id);
}

/**
 * Gets all registered skills, ordered by the level that unlocks them.
 */
export function getAllSkills(): Skill[] {
	return Array.from(SKILL_REGISTRY.values()).sort(
		(a, b) => a.minLevel - b.minLevel
	);
}

for (const skill of [FIREBALL, POWER_STRIKE, HEAL, CLEANSE]) registerSkill(skill);
