/**
 * Encounter generator.
 *
 * Decides whether an enemy appears where the hero stands and what it is.
 * The decision runs in a fixed priority order, first match wins:
 *
 * 1. the evade ring suppresses every spawn
 * 2. the randomizer's appearance roll for the distance
 * 3. special spawns, each an independent function tried in order:
 *    guardian, gorthaur, shadow, dev
 * 4. a random family from the catalog, best variant the hero qualifies for
 * 5. level jitter, then instantiation
 *
 * NPC encounters use the same appearance gate and a separate uniform pick.
 *
 * @module systems/encounter
 */
import logger from "../logger.js";
import { Character } from "../core/character.js";
import {
	CATEGORY,
	CharacterClass,
	deriveClass,
	familyName,
	tierRequirement,
} from "../core/class.js";
import { Distance } from "../core/distance.js";
import { NPC, NPC_KINDS } from "../core/encounter.js";
import { Location } from "../core/location.js";
import { GUARDIAN_CLASS, GUARDIAN_QUEST } from "../core/quest.js";
import { Randomizer, oneIn } from "../core/randomizer.js";
import { RING } from "../core/ring.js";
import { ClassCatalog } from "../registry/class.js";
import { EncounterConfig } from "../registry/config.js";
import { DeepReadonly } from "../utils/types.js";

export const BOSS_LEVEL_BONUS = 5;
export const MIRROR_LEVEL_BONUS = 3;

export type SpawnKind = "boss" | "final-boss" | "mirror" | "easter-egg" | "random";

export interface SpawnSpec {
	kind: SpawnKind;
	class: CharacterClass;
	level: number;
}

/** Reads the quest book needs to offer the generator. */
export interface OpenQuests {
	isOpen(description: string): boolean;
}

export interface SpawnInput {
	character: Character;
	location: Location;
	quests: OpenQuests;
	catalog: ClassCatalog;
	config: DeepReadonly<EncounterConfig>;
	randomizer: Randomizer;
}

export type SpecialSpawn = (input: SpawnInput) => SpawnSpec | undefined;

/**
 * The Guardian hunts heroes who carry its quest far from home.
 */
export function spawnBoss(input: SpawnInput): SpawnSpec | undefined {
	const { character, location, quests, catalog, config } = input;
	if (!quests.isOpen(GUARDIAN_QUEST)) return undefined;
	if (location.distance.len <= config.bossDistance) return undefined;
	const guardian = catalog.get(GUARDIAN_CLASS);
	if (!guardian) return undefined;
	return {
		kind: "boss",
		class: guardian,
		level: character.level + BOSS_LEVEL_BONUS,
	};
}

/**
 * Gorthaur answers the ruling ring at the far edge of the world.
 */
export function spawnFinalBoss(input: SpawnInput): SpawnSpec | undefined {
	const { character, location, catalog, config } = input;
	if (!character.isWearing(RING.RULING)) return undefined;
	if (location.distance.len < config.finalBossDistance) return undefined;
	return {
		kind: "final-boss",
		class: deriveClass(catalog.playerFirst(), {
			name: "gorthaur",
			category: CATEGORY.LEGENDARY,
			scale: { health: 2, strength: 2 },
		}),
		level: character.level,
	};
}

/**
 * The hero's own shadow lurks at home.
 */
export function spawnMirror(input: SpawnInput): SpawnSpec | undefined {
	const { character, location, config, randomizer } = input;
	if (!location.isHome) return undefined;
	if (!oneIn(randomizer, config.specialSpawnOdds)) return undefined;
	return {
		kind: "mirror",
		class: deriveClass(character.class, {
			name: "shadow",
			category: CATEGORY.RARE,
		}),
		level: character.level + MIRROR_LEVEL_BONUS,
	};
}

/**
 * Someone is always debugging in the game's own data directory.
 */
export function spawnEasterEgg(input: SpawnInput): SpawnSpec | undefined {
	const { character, location, catalog, config, randomizer } = input;
	if (!location.isDataDir) return undefined;
	if (!oneIn(randomizer, config.specialSpawnOdds)) return undefined;
	return {
		kind: "easter-egg",
		class: deriveClass(catalog.playerFirst(), {
			name: "dev",
			category: CATEGORY.RARE,
			scale: { health: 0.5, strength: 0.5, speed: 0.5 },
		}),
		level: character.level,
	};
}

export const SPECIAL_SPAWNS: ReadonlyArray<SpecialSpawn> = [
	spawnBoss,
	spawnFinalBoss,
	spawnMirror,
	spawnEasterEgg,
];

/**
 * Level of a randomly spawned enemy: max(⌊L/10⌋ + distance − 1, 1).
 */
export function randomSpawnLevel(playerLevel: number, distance: Distance): number {
	return Math.max(Math.floor(playerLevel / 10) + distance.len - 1, 1);
}

/**
 * Group enemy classes into families by the first word of their name,
 * keeping catalog order.
 */
export function enemyFamilies(catalog: ClassCatalog): Map<string, CharacterClass[]> {
	const families = new Map<string, CharacterClass[]>();
	for (const enemy of catalog.enemies()) {
		const family = familyName(enemy);
		const members = families.get(family);
		if (members) members.push(enemy);
		else families.set(family, [enemy]);
	}
	return families;
}

/**
 * Pick a family uniformly, then its toughest variant the hero's level
 * allows (the family's first variant when none qualifies).
 */
export function spawnRandom(input: SpawnInput): SpawnSpec {
	const { character, location, catalog, randomizer } = input;
	const families = Array.from(enemyFamilies(catalog).values());
	if (families.length === 0) {
		throw new Error(
			"Cannot spawn an enemy: class catalog has no enemies. Call loadClasses() first."
		);
	}
	const family = families[randomizer.range(families.length)];
	let chosen: CharacterClass | undefined;
	for (const variant of family) {
		if (character.level < tierRequirement(variant.category)) continue;
		if (!chosen || variant.health.base >= chosen.health.base) chosen = variant;
	}
	return {
		kind: "random",
		class: chosen ?? family[0],
		level: randomSpawnLevel(character.level, location.distance),
	};
}

/**
 * Decide whether an enemy appears and what it is. The returned level
 * already carries the randomizer's jitter.
 */
export function generateEncounter(input: SpawnInput): SpawnSpec | undefined {
	const { character, location, randomizer } = input;
	if (character.evasionActive) {
		logger.debug("Encounter suppressed by the evade ring");
		return undefined;
	}
	if (!randomizer.shouldEnemyAppear(location.distance)) return undefined;

	let spec: SpawnSpec | undefined;
	for (const special of SPECIAL_SPAWNS) {
		spec = special(input);
		if (spec) break;
	}
	spec ??= spawnRandom(input);

	const level = randomizer.enemyLevel(spec.level);
	logger.debug("Encounter generated", {
		kind: spec.kind,
		enemy: spec.class.name,
		level,
		distance: location.distance.len,
	});
	return { ...spec, level };
}

/**
 * Generate and instantiate an enemy, if one appears.
 */
export function spawnEnemy(input: SpawnInput): Character | undefined {
	const spec = generateEncounter(input);
	if (!spec) return undefined;
	return new Character({ class: spec.class, level: spec.level });
}

/**
 * Roll for an NPC encounter at a distance.
 */
export function generateNpcEncounter(
	distance: Distance,
	randomizer: Randomizer
): NPC | undefined {
	if (!randomizer.shouldEnemyAppear(distance)) return undefined;
	return NPC_KINDS[randomizer.range(NPC_KINDS.length)];
}
