/**
 * Public entry point of the dirquest engine.
 *
 * @module index
 */
export { loadAllPackages, type LoadOptions } from "./package.js";

export {
	Game,
	HOME_PATH,
	createContext,
	type ContextOptions,
	type GameContext,
	type GameOptions,
	type GameSnapshot,
	type SerializedEncounter,
	type SerializedLocation,
} from "./src/game.js";

export { Character, xpForLevel, type SerializedCharacter } from "./src/core/character.js";
export {
	CATEGORY,
	deriveClass,
	familyName,
	statAt,
	tierFactor,
	tierRequirement,
	type BaseClassDefinition,
	type CharacterClass,
	type StatCurve,
} from "./src/core/class.js";
export { Distance, type DistanceBand } from "./src/core/distance.js";
export { STATUS_EFFECT, tickDamage } from "./src/core/effect.js";
export { IDLE, NPC, type Encounter } from "./src/core/encounter.js";
export * from "./src/core/errors.js";
export type { EnemySummary, GameEvent, GameEventType } from "./src/core/event.js";
export { Inventory, describeItem, itemKey, type Item, type ItemKind } from "./src/core/item.js";
export { createLocation, type Location } from "./src/core/location.js";
export {
	createInitialQuests,
	describeQuest,
	type Quest,
	type QuestGoal,
} from "./src/core/quest.js";
export {
	ScriptedRandomizer,
	SeededRandomizer,
	type Randomizer,
} from "./src/core/randomizer.js";
export { RING, RingSlots } from "./src/core/ring.js";
export type { Skill, SkillEffect } from "./src/core/skill.js";
export { TombstoneLedger, type Tombstone } from "./src/core/tombstone.js";

export { ClassCatalog } from "./src/registry/class.js";
export { CONFIG_DEFAULT, createConfig, type Config } from "./src/registry/config.js";
export { getAllSkills, getSkillById } from "./src/registry/skill.js";
export { loadClasses, parseClasses } from "./src/package/class.js";
export { loadConfig, mergeConfig } from "./src/package/config.js";

export {
	attack,
	bribe,
	flee,
	learnSkill,
	useSkill,
	type CombatOutcome,
	type SkillResult,
	type StrikeResult,
} from "./src/systems/combat.js";
export {
	generateEncounter,
	generateNpcEncounter,
	spawnEnemy,
	type SpawnSpec,
} from "./src/systems/encounter.js";
export { applyStatusTick } from "./src/systems/effects.js";
export { inspect, settleDeath, type InspectResult } from "./src/systems/death.js";
export { bet, brew, listen } from "./src/systems/npc.js";
export {
	changeClass,
	removeRing,
	seekBattle,
	travel,
	useItem,
	visit,
	type TravelResult,
} from "./src/systems/movement.js";
export { QuestBook, type QuestEntry } from "./src/systems/quests.js";
