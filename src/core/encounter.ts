/**
 * The encounter slot of a game.
 *
 * A game is idle, fighting exactly one enemy, or facing exactly one NPC.
 * The states exclude each other; entering one requires the slot to be idle.
 *
 * @module core/encounter
 */
import { Character } from "./character.js";

export enum NPC {
	GAMBLER = "gambler",
	WITCH = "witch",
	GHOSTLY_MAIDEN = "ghostly-maiden",
}

/** NPC kinds in roll order: `range(3)` picks by index. */
export const NPC_KINDS: ReadonlyArray<NPC> = [
	NPC.GAMBLER,
	NPC.WITCH,
	NPC.GHOSTLY_MAIDEN,
];

export type Encounter =
	| { readonly state: "idle" }
	| { readonly state: "in-combat"; readonly enemy: Character }
	| { readonly state: "in-npc-encounter"; readonly npc: NPC };

export const IDLE: Encounter = Object.freeze({ state: "idle" });
