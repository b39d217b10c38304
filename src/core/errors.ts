/**
 * Error kinds raised by the engine.
 *
 * Failed rolls are ordinary outcomes and never throw. Only structurally
 * invalid actions and character death reach the caller as errors, each with
 * its own class so callers can tell them apart with `instanceof`.
 *
 * @module core/errors
 */
import type { Tombstone } from "./tombstone.js";

export type GameErrorCode =
	| "INVALID_ACTION"
	| "UNKNOWN_SKILL"
	| "SKILL_NOT_LEARNED"
	| "SKILL_ALREADY_LEARNED"
	| "SKILL_LOCKED"
	| "INSUFFICIENT_RESOURCES"
	| "INSUFFICIENT_GOLD"
	| "UNKNOWN_CLASS"
	| "ITEM_NOT_FOUND"
	| "CHARACTER_DEAD";

export class GameError extends Error {
	constructor(
		public readonly code: GameErrorCode,
		message: string
	) {
		super(message);
		this.name = "GameError";
	}
}

/** The verb does not apply to the current encounter state or location. */
export class InvalidActionError extends GameError {
	constructor(message: string) {
		super("INVALID_ACTION", message);
		this.name = "InvalidActionError";
	}
}

export class UnknownSkillError extends GameError {
	constructor(public readonly skillId: string) {
		super("UNKNOWN_SKILL", `Unknown skill '${skillId}'.`);
		this.name = "UnknownSkillError";
	}
}

export class SkillNotLearnedError extends GameError {
	constructor(public readonly skillId: string) {
		super("SKILL_NOT_LEARNED", `Skill '${skillId}' has not been learned.`);
		this.name = "SkillNotLearnedError";
	}
}

export class SkillAlreadyLearnedError extends GameError {
	constructor(public readonly skillId: string) {
		super("SKILL_ALREADY_LEARNED", `Skill '${skillId}' is already known.`);
		this.name = "SkillAlreadyLearnedError";
	}
}

/** The character does not meet the skill's level requirement. */
export class SkillLockedError extends GameError {
	constructor(
		public readonly skillId: string,
		public readonly requiredLevel: number
	) {
		super(
			"SKILL_LOCKED",
			`Skill '${skillId}' requires level ${requiredLevel}.`
		);
		this.name = "SkillLockedError";
	}
}

export class InsufficientResourcesError extends GameError {
	constructor(
		public readonly required: number,
		public readonly available: number
	) {
		super(
			"INSUFFICIENT_RESOURCES",
			`Not enough mana: ${required} required, ${available} available.`
		);
		this.name = "InsufficientResourcesError";
	}
}

export class InsufficientGoldError extends GameError {
	constructor(
		public readonly required: number,
		public readonly available: number
	) {
		super(
			"INSUFFICIENT_GOLD",
			`Not enough gold: ${required}g required, ${available}g available.`
		);
		this.name = "InsufficientGoldError";
	}
}

export class UnknownClassError extends GameError {
	constructor(public readonly className: string) {
		super("UNKNOWN_CLASS", `Unknown class '${className}'.`);
		this.name = "UnknownClassError";
	}
}

export class ItemNotFoundError extends GameError {
	constructor(public readonly item: string) {
		super("ITEM_NOT_FOUND", `No ${item} in the inventory.`);
		this.name = "ItemNotFoundError";
	}
}

/**
 * Raised after the death pipeline has run. The game has already been reset
 * and the tombstone buried by the time a caller sees this.
 */
export class CharacterDeadError extends GameError {
	constructor(public readonly tombstone: Tombstone) {
		super("CHARACTER_DEAD", "The hero has died.");
		this.name = "CharacterDeadError";
	}
}
