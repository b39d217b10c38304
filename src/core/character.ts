/**
 * Core character module.
 *
 * A `Character` is either the hero or a spawned enemy. It owns a private
 * copy of its class, so spawn variants (doubled, halved, renamed) never
 * leak back into the catalog. Stats derive from the class curves at the
 * current level, adjusted by worn rings.
 *
 * Invariants:
 * - `level >= 1`, `experience >= 0`
 * - `0 <= health <= maxHealth`, and health 0 means dead
 * - at most one status effect, at most two rings
 *
 * @module core/character
 */
import {
	BaseClassDefinition,
	CATEGORY,
	CharacterClass,
	deriveClass,
	freezeClass,
	statAt,
} from "./class.js";
import { STATUS_EFFECT } from "./effect.js";
import { RING, RingSlots } from "./ring.js";
import { Skill } from "./skill.js";
import {
	InsufficientResourcesError,
	SkillAlreadyLearnedError,
	SkillLockedError,
} from "./errors.js";

export const XP_BASE = 30;
export const XP_EXPONENT = 1.5;
/** Stat bonus granted by each matching ring worn */
export const RING_STAT_BONUS = 0.5;

/**
 * Experience needed to advance from `level` to the next level.
 */
export function xpForLevel(level: number): number {
	return Math.floor(XP_BASE * Math.pow(Math.max(1, level), XP_EXPONENT));
}

export interface CharacterOptions {
	class: CharacterClass;
	level?: number;
}

export interface SerializedCharacter {
	class: BaseClassDefinition;
	level: number;
	experience: number;
	health: number;
	mana: number;
	rings: RING[];
	statusEffect?: STATUS_EFFECT;
	skills: string[];
}

export class Character {
	private _class: CharacterClass;
	private _level: number;
	private _experience = 0;
	private _health: number;
	private _mana: number;
	private _statusEffect?: STATUS_EFFECT;
	private readonly _skills = new Set<string>();
	readonly rings = new RingSlots();

	constructor(options: CharacterOptions) {
		this._class = deriveClass(options.class);
		this._level = Math.max(1, Math.floor(options.level ?? 1));
		this._health = this.maxHealth;
		this._mana = this.maxMana;
	}

	get class(): CharacterClass {
		return this._class;
	}

	get name(): string {
		return this._class.name;
	}

	get category(): CATEGORY {
		return this._class.category;
	}

	get level(): number {
		return this._level;
	}

	get experience(): number {
		return this._experience;
	}

	get health(): number {
		return this._health;
	}

	get mana(): number {
		return this._mana;
	}

	get maxHealth(): number {
		return statAt(this._class.health, this._level);
	}

	get maxMana(): number {
		return statAt(this._class.mana, this._level);
	}

	get strength(): number {
		return this.withRingBonus(statAt(this._class.strength, this._level), [
			RING.ATTACK,
			RING.RULING,
		]);
	}

	get speed(): number {
		return this.withRingBonus(statAt(this._class.speed, this._level), [
			RING.SPEED,
			RING.RULING,
		]);
	}

	get isDead(): boolean {
		return this._health <= 0;
	}

	get statusEffect(): STATUS_EFFECT | undefined {
		return this._statusEffect;
	}

	get skills(): ReadonlyArray<string> {
		return Array.from(this._skills);
	}

	/** Read from the slots on every call. */
	get evasionActive(): boolean {
		return this.rings.isWearing(RING.EVADE);
	}

	private withRingBonus(value: number, rings: ReadonlyArray<RING>): number {
		const matches = this.rings.rings.filter((ring) => rings.includes(ring));
		return Math.floor(value * (1 + RING_STAT_BONUS * matches.length));
	}

	xpForNext(): number {
		return xpForLevel(this._level);
	}

	/**
	 * Add experience, raising the level once per threshold crossed. Health
	 * and mana grow by the increase of their maximums.
	 * @returns The number of levels gained
	 */
	addExperience(xp: number): number {
		this._experience += Math.max(0, Math.floor(xp));
		let gained = 0;
		while (this._experience >= this.xpForNext()) {
			this._experience -= this.xpForNext();
			const previousHealth = this.maxHealth;
			const previousMana = this.maxMana;
			this._level += 1;
			gained += 1;
			this._health = Math.min(
				this.maxHealth,
				this._health + (this.maxHealth - previousHealth)
			);
			this._mana = Math.min(this.maxMana, this._mana + (this.maxMana - previousMana));
		}
		return gained;
	}

	/**
	 * Lose health, stopping at zero.
	 * @returns The health actually lost
	 */
	takeDamage(amount: number): number {
		const lost = Math.min(this._health, Math.max(0, Math.floor(amount)));
		this._health -= lost;
		return lost;
	}

	/**
	 * Regain health, stopping at the maximum.
	 * @returns The health actually restored
	 */
	heal(amount: number): number {
		const restored = Math.min(
			this.maxHealth - this._health,
			Math.max(0, Math.floor(amount))
		);
		this._health += restored;
		return restored;
	}

	healFully(): void {
		this._health = this.maxHealth;
		this._mana = this.maxMana;
	}

	spendMana(cost: number): void {
		if (cost > this._mana) {
			throw new InsufficientResourcesError(cost, this._mana);
		}
		this._mana -= cost;
	}

	/**
	 * @returns The ring evicted from the slots, if any
	 */
	equipRing(ring: RING): RING | undefined {
		return this.rings.equip(ring);
	}

	unequipRing(ring: RING): boolean {
		return this.rings.unequip(ring);
	}

	isWearing(ring: RING): boolean {
		return this.rings.isWearing(ring);
	}

	/**
	 * Apply a status effect. Refused while another effect is active or while
	 * the protect ring is worn.
	 * @returns true when the effect took hold
	 */
	inflict(effect: STATUS_EFFECT): boolean {
		if (this._statusEffect !== undefined) return false;
		if (this.isWearing(RING.PROTECT)) return false;
		this._statusEffect = effect;
		return true;
	}

	/**
	 * @returns The effect removed, if there was one
	 */
	cure(): STATUS_EFFECT | undefined {
		const effect = this._statusEffect;
		this._statusEffect = undefined;
		return effect;
	}

	knowsSkill(id: string): boolean {
		return this._skills.has(id);
	}

	learnSkill(skill: Skill): void {
		if (this._skills.has(skill.id)) {
			throw new SkillAlreadyLearnedError(skill.id);
		}
		if (this._level < skill.minLevel) {
			throw new SkillLockedError(skill.id, skill.minLevel);
		}
		this._skills.add(skill.id);
	}

	/**
	 * Switch to another class, keeping level and experience. Health and mana
	 * are refilled to the new maximums.
	 */
	changeClass(cls: CharacterClass): void {
		this._class = deriveClass(cls);
		this.healFully();
	}

	serialize(): SerializedCharacter {
		return {
			class: {
				...this._class,
				health: { ...this._class.health },
				strength: { ...this._class.strength },
				speed: { ...this._class.speed },
				mana: { ...this._class.mana },
				...(this._class.inflicts ? { inflicts: { ...this._class.inflicts } } : {}),
			},
			level: this._level,
			experience: this._experience,
			health: this._health,
			mana: this._mana,
			rings: [...this.rings.rings],
			...(this._statusEffect ? { statusEffect: this._statusEffect } : {}),
			skills: this.skills.slice(),
		};
	}

	static deserialize(data: SerializedCharacter): Character {
		const character = new Character({
			class: freezeClass(data.class),
			level: data.level,
		});
		character._experience = Math.max(0, data.experience);
		character._health = Math.min(character.maxHealth, Math.max(0, data.health));
		character._mana = Math.min(character.maxMana, Math.max(0, data.mana));
		// oldest first so the newest ends up in the first slot
		for (const ring of [...data.rings].reverse()) character.rings.equip(ring);
		character._statusEffect = data.statusEffect;
		for (const id of data.skills) character._skills.add(id);
		return character;
	}
}
