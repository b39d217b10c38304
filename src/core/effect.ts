/**
 * Status effects carried by characters.
 *
 * A character holds at most one status effect at a time. Effects tick once
 * per location the character moves to and persist until cured.
 *
 * @module core/effect
 */

export enum STATUS_EFFECT {
	BURN = "burn",
	POISON = "poison",
}

export interface StatusEffectTemplate {
	id: STATUS_EFFECT;
	name: string;
	description: string;
	/** Fraction of max health lost per tick */
	tickRatio: number;
}

export const STATUS_EFFECT_TEMPLATES: Readonly<
	Record<STATUS_EFFECT, StatusEffectTemplate>
> = Object.freeze({
	[STATUS_EFFECT.BURN]: {
		id: STATUS_EFFECT.BURN,
		name: "Burn",
		description: "Flames lick at the hero with every step.",
		tickRatio: 1 / 20,
	},
	[STATUS_EFFECT.POISON]: {
		id: STATUS_EFFECT.POISON,
		name: "Poison",
		description: "Venom saps the hero's health with every step.",
		tickRatio: 1 / 10,
	},
});

/**
 * Damage one tick of the effect deals to a character with the given max
 * health. Always at least 1.
 */
export function tickDamage(effect: STATUS_EFFECT, maxHealth: number): number {
	const template = STATUS_EFFECT_TEMPLATES[effect];
	return Math.max(1, Math.floor(maxHealth * template.tickRatio));
}

export function isStatusEffect(value: unknown): value is STATUS_EFFECT {
	return (
		typeof value === "string" &&
		Object.values(STATUS_EFFECT).some((entry) => entry === value)
	);
}
