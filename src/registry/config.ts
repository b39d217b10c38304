/**
 * Registry: config - engine tuning values
 *
 * Holds the typed configuration shape and its defaults. The config package
 * reads `data/config.yaml` and merges it over these defaults; the result is
 * carried by the game context rather than a global.
 *
 * @module registry/config
 */

import { DeepReadonly } from "../utils/types.js";

export type GameConfig = {
	name: string;
};

export type EncounterConfig = {
	/** Appearance chance at distance zero */
	baseChance: number;
	/** Added to the appearance chance per step away from home */
	chancePerDistance: number;
	/** Upper bound for the appearance chance */
	maxChance: number;
	/** Chance of finding a chest when inspecting away from home */
	chestChance: number;
	/** Mirror and easter-egg spawns happen 1 in this many rolls */
	specialSpawnOdds: number;
	/** Guardian spawns strictly beyond this distance */
	bossDistance: number;
	/** Final boss spawns at or beyond this distance */
	finalBossDistance: number;
};

export type RewardConfig = {
	xpPerLevel: number;
	goldPerLevel: number;
	/** Extra gold credited with every recovered tombstone */
	tombstoneBonus: number;
};

export type BribeConfig = {
	costPerLevel: number;
};

export type Config = {
	game: GameConfig;
	encounter: EncounterConfig;
	rewards: RewardConfig;
	bribe: BribeConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "dirquest",
	},
	encounter: {
		baseChance: 0.2,
		chancePerDistance: 0.05,
		maxChance: 0.6,
		chestChance: 0.1,
		specialSpawnOdds: 10,
		bossDistance: 10,
		finalBossDistance: 100,
	},
	rewards: {
		xpPerLevel: 30,
		goldPerLevel: 50,
		tombstoneBonus: 0,
	},
	bribe: {
		costPerLevel: 50,
	},
} as const;

/**
 * A mutable copy of the defaults, with any sections given replaced
 * field by field.
 */
export function createConfig(overrides: {
	[S in keyof Config]?: Partial<Config[S]>;
} = {}): Config {
	return {
		game: { ...CONFIG_DEFAULT.game, ...overrides.game },
		encounter: { ...CONFIG_DEFAULT.encounter, ...overrides.encounter },
		rewards: { ...CONFIG_DEFAULT.rewards, ...overrides.rewards },
		bribe: { ...CONFIG_DEFAULT.bribe, ...overrides.bribe },
	};
}
