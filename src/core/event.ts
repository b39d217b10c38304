/**
 * Gameplay events.
 *
 * Events are immutable facts produced by the combat, item and tombstone
 * systems and consumed by quests. They carry plain values only, never live
 * characters.
 *
 * @module core/event
 */
import { CATEGORY } from "./class.js";
import { ItemKind } from "./item.js";

export interface EnemySummary {
	readonly name: string;
	readonly category: CATEGORY;
	readonly level: number;
}

export type GameEvent =
	| {
			readonly type: "battle-won";
			readonly enemy: EnemySummary;
			readonly location: string;
			readonly xp: number;
			readonly gold: number;
			readonly levelsUp: number;
	  }
	| { readonly type: "level-up"; readonly level: number }
	| { readonly type: "item-added"; readonly item: ItemKind; readonly key: string }
	| { readonly type: "item-used"; readonly item: ItemKind; readonly key: string }
	| { readonly type: "tombstone-found"; readonly location: string; readonly gold: number }
	| { readonly type: "chest-found"; readonly location: string; readonly gold: number }
	| { readonly type: "enemy-bribed"; readonly enemy: EnemySummary; readonly cost: number }
	| { readonly type: "fled"; readonly enemy: EnemySummary }
	| { readonly type: "skill-learned"; readonly skill: string }
	| { readonly type: "character-died"; readonly location: string; readonly gold: number };

export type GameEventType = GameEvent["type"];
