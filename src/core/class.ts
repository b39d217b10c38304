/**
 * Core class module.
 *
 * Character classes are the archetypes players pick and enemies are spawned
 * from. Each stat grows linearly with level from a base value. Catalog
 * entries are frozen; characters receive clones, and spawn variants are
 * derived copies that never touch the catalog.
 *
 * @module core/class
 */
import { STATUS_EFFECT } from "./effect.js";

export enum CATEGORY {
	PLAYER = "player",
	COMMON = "common",
	RARE = "rare",
	LEGENDARY = "legendary",
	BOSS = "boss",
}

export type StatKey = "health" | "strength" | "speed" | "mana";

export interface StatCurve {
	base: number;
	growth: number;
}

/** An enemy of this class inflicts the effect with probability 1/odds per hit. */
export interface StatusInfliction {
	effect: STATUS_EFFECT;
	odds: number;
}

export interface BaseClassDefinition {
	readonly name: string;
	readonly category: CATEGORY;
	readonly health: StatCurve;
	readonly strength: StatCurve;
	readonly speed: StatCurve;
	readonly mana: StatCurve;
	readonly inflicts?: StatusInfliction;
}

export type CharacterClass = Readonly<BaseClassDefinition>;

function freezeCurve(curve: StatCurve): StatCurve {
	return Object.freeze({
		base: Math.max(0, Math.floor(curve.base)),
		growth: Math.max(0, Math.floor(curve.growth)),
	});
}

export function freezeClass(def: BaseClassDefinition): CharacterClass {
	return Object.freeze({
		name: def.name,
		category: def.category,
		health: freezeCurve(def.health),
		strength: freezeCurve(def.strength),
		speed: freezeCurve(def.speed),
		mana: freezeCurve(def.mana),
		...(def.inflicts ? { inflicts: Object.freeze({ ...def.inflicts }) } : {}),
	});
}

/**
 * Effective value of a stat at a level: base + growth × (level − 1).
 * Levels below 1 are treated as 1.
 */
export function statAt(curve: StatCurve, level: number): number {
	const safeLevel = Math.max(1, Math.floor(level));
	return curve.base + curve.growth * (safeLevel - 1);
}

export interface ClassOverrides {
	name?: string;
	category?: CATEGORY;
	/** Multipliers applied to base values, floored */
	scale?: Partial<Record<StatKey, number>>;
}

/**
 * Clone a class, renaming, re-tiering or scaling its base stats.
 */
export function deriveClass(
	source: CharacterClass,
	overrides: ClassOverrides = {}
): CharacterClass {
	const scaled = (key: StatKey): StatCurve => {
		const factor = overrides.scale?.[key] ?? 1;
		return {
			base: Math.floor(source[key].base * factor),
			growth: source[key].growth,
		};
	};
	return freezeClass({
		name: overrides.name ?? source.name,
		category: overrides.category ?? source.category,
		health: scaled("health"),
		strength: scaled("strength"),
		speed: scaled("speed"),
		mana: scaled("mana"),
		inflicts: source.inflicts,
	});
}

/**
 * Minimum player level before a variant of this tier may spawn.
 */
export function tierRequirement(category: CATEGORY): number {
	switch (category) {
		case CATEGORY.COMMON:
			return 1;
		case CATEGORY.RARE:
			return 5;
		case CATEGORY.LEGENDARY:
			return 10;
		default:
			return 1;
	}
}

/**
 * Difficulty multiplier of a tier, scaling experience rewards and bribes.
 */
export function tierFactor(category: CATEGORY): number {
	switch (category) {
		case CATEGORY.RARE:
			return 2;
		case CATEGORY.LEGENDARY:
		case CATEGORY.BOSS:
			return 5;
		default:
			return 1;
	}
}

/**
 * Family name of a class: the part of its name before the first space.
 * "orc captain" and "orc" share the family "orc".
 */
export function familyName(cls: CharacterClass): string {
	return cls.name.split(" ")[0];
}

export function isCategory(value: unknown): value is CATEGORY {
	return (
		typeof value === "string" &&
		Object.values(CATEGORY).some((entry) => entry === value)
	);
}
