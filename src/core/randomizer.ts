/**
 * Source of every probabilistic decision the engine makes.
 *
 * Systems never call `Math.random` directly; they receive a `Randomizer`
 * through the game context. `SeededRandomizer` is the production source and
 * replays the same sequence for the same seed. `ScriptedRandomizer` returns
 * whatever its public fields say, for tests and tooling.
 *
 * The chance functions are exported separately so their shape (monotone in
 * distance, speed and level) can be checked without sampling.
 *
 * @module core/randomizer
 */
import { Distance } from "./distance.js";
import { CONFIG_DEFAULT, EncounterConfig } from "../registry/config.js";

export interface Randomizer {
	shouldEnemyAppear(distance: Distance): boolean;
	shouldFindChest(distance: Distance): boolean;
	/** Jitter a spawn level; never returns less than 1 */
	enemyLevel(base: number): number;
	/** Uniform integer in [0, n) */
	range(n: number): number;
	damage(base: number): number;
	isMiss(attackerSpeed: number, receiverSpeed: number): boolean;
	isCritical(): boolean;
	goldGained(base: number): number;
	fleeSucceeds(playerSpeed: number, enemySpeed: number): boolean;
	bribeSucceeds(playerLevel: number, enemyLevel: number): boolean;
}

export type ChanceOptions = Pick<
	EncounterConfig,
	"baseChance" | "chancePerDistance" | "maxChance" | "chestChance"
>;

export const CRITICAL_ODDS = 20;
export const LEVEL_JITTER_BELOW = 1;
export const LEVEL_JITTER_ABOVE = 2;
const VARIATION = 0.2;

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/**
 * Probability that an encounter happens at a distance. Non-decreasing in
 * the distance and capped at `maxChance`.
 */
export function appearChance(
	distance: Distance,
	options: ChanceOptions
): number {
	const chance = options.baseChance + options.chancePerDistance * distance.len;
	return clamp(chance, 0, options.maxChance);
}

/** Faster players get away more often. */
export function fleeChance(playerSpeed: number, enemySpeed: number): number {
	const total = playerSpeed + enemySpeed;
	if (total <= 0) return 0.5;
	return clamp(playerSpeed / total, 0.1, 0.9);
}

/** Enemies below the player's level take bribes more readily. */
export function bribeChance(playerLevel: number, enemyLevel: number): number {
	return clamp(0.5 + 0.05 * (playerLevel - enemyLevel), 0.1, 0.9);
}

/** Receivers faster than their attacker dodge more often. */
export function missChance(attackerSpeed: number, receiverSpeed: number): number {
	if (receiverSpeed <= attackerSpeed) return 0.05;
	return 0.05 + (0.45 * (receiverSpeed - attackerSpeed)) / (receiverSpeed + attackerSpeed);
}

/** True once in `odds` rolls. Odds of 1 or less always succeed. */
export function oneIn(randomizer: Randomizer, odds: number): boolean {
	if (odds <= 1) return true;
	return randomizer.range(odds) === 0;
}

function hashSeed(seed: string): number {
	let h = 1779033703 ^ seed.length;
	for (let i = 0; i < seed.length; i += 1) {
		h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
		h = (h << 13) | (h >>> 19);
	}
	return h >>> 0 || 1;
}

// Mulberry32
function mulberry32(seed: number): () => number {
	let a = seed >>> 0;
	return () => {
		a |= 0;
		a = (a + 0x6d2b79f5) | 0;
		let t = Math.imul(a ^ (a >>> 15), 1 | a);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export class SeededRandomizer implements Randomizer {
	private readonly next: () => number;
	private readonly options: ChanceOptions;

	constructor(
		seed: string | number = Date.now(),
		options: ChanceOptions = CONFIG_DEFAULT.encounter
	) {
		this.next = mulberry32(hashSeed(String(seed)));
		this.options = { ...options };
	}

	private chance(probability: number): boolean {
		if (probability <= 0) return false;
		if (probability >= 1) return true;
		return this.next() < probability;
	}

	private vary(base: number): number {
		const variation = Math.floor(base * VARIATION);
		return base - variation + this.range(variation * 2 + 1);
	}

	shouldEnemyAppear(distance: Distance): boolean {
		return this.chance(appearChance(distance, this.options));
	}

	shouldFindChest(distance: Distance): boolean {
		if (distance.isHome()) return false;
		return this.chance(this.options.chestChance);
	}

	enemyLevel(base: number): number {
		const offset =
			this.range(LEVEL_JITTER_BELOW + LEVEL_JITTER_ABOVE + 1) -
			LEVEL_JITTER_BELOW;
		return Math.max(1, base + offset);
	}

	range(n: number): number {
		if (n <= 1) return 0;
		return Math.floor(this.next() * n);
	}

	damage(base: number): number {
		return Math.max(1, this.vary(base));
	}

	isMiss(attackerSpeed: number, receiverSpeed: number): boolean {
		return this.chance(missChance(attackerSpeed, receiverSpeed));
	}

	isCritical(): boolean {
		return oneIn(this, CRITICAL_ODDS);
	}

	goldGained(base: number): number {
		return Math.max(0, this.vary(base));
	}

	fleeSucceeds(playerSpeed: number, enemySpeed: number): boolean {
		return this.chance(fleeChance(playerSpeed, enemySpeed));
	}

	bribeSucceeds(playerLevel: number, enemyLevel: number): boolean {
		return this.chance(bribeChance(playerLevel, enemyLevel));
	}
}

/**
 * A randomizer whose every answer is set by hand. Queued `ranges` are
 * consumed first; once empty, `range` answers `rangeDefault`. Answers are
 * clamped into [0, n).
 */
export class ScriptedRandomizer implements Randomizer {
	appear = true;
	chest = false;
	levelOffset = 0;
	ranges: number[] = [];
	rangeDefault = 0;
	miss = false;
	critical = false;
	flee = true;
	bribe = true;

	constructor(overrides: Partial<ScriptedRandomizerState> = {}) {
		Object.assign(this, overrides);
	}

	shouldEnemyAppear(_distance: Distance): boolean {
		return this.appear;
	}

	shouldFindChest(_distance: Distance): boolean {
		return this.chest;
	}

	enemyLevel(base: number): number {
		return Math.max(1, base + this.levelOffset);
	}

	range(n: number): number {
		const next = this.ranges.length > 0 ? this.ranges.shift() : undefined;
		const value = next ?? this.rangeDefault;
		return clamp(Math.floor(value), 0, Math.max(0, n - 1));
	}

	damage(base: number): number {
		return Math.max(1, base);
	}

	isMiss(_attackerSpeed: number, _receiverSpeed: number): boolean {
		return this.miss;
	}

	isCritical(): boolean {
		return this.critical;
	}

	goldGained(base: number): number {
		return base;
	}

	fleeSucceeds(_playerSpeed: number, _enemySpeed: number): boolean {
		return this.flee;
	}

	bribeSucceeds(_playerLevel: number, _enemyLevel: number): boolean {
		return this.bribe;
	}
}

export type ScriptedRandomizerState = Pick<
	ScriptedRandomizer,
	| "appear"
	| "chest"
	| "levelOffset"
	| "ranges"
	| "rangeDefault"
	| "miss"
	| "critical"
	| "flee"
	| "bribe"
>;
