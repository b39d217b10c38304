/**
 * Items the hero can carry.
 *
 * Item kinds form a closed union; every behavior that depends on the kind
 * switches over it exhaustively.
 *
 * @module core/item
 */
import { RING, RING_DESCRIPTIONS } from "./ring.js";

export type Item =
	| { kind: "potion"; level: number }
	| { kind: "remedy" }
	| { kind: "escape" }
	| { kind: "ring"; ring: RING }
	| { kind: "amulet" };

export type ItemKind = Item["kind"];

export const POTION_HEAL_PER_LEVEL = 25;

/**
 * Inventory key of an item. Rings are keyed by their name, e.g. `evade-ring`.
 */
export function itemKey(item: Item): string {
	switch (item.kind) {
		case "ring":
			return `${item.ring}-ring`;
		case "potion":
		case "remedy":
		case "escape":
		case "amulet":
			return item.kind;
	}
}

export function describeItem(item: Item): string {
	switch (item.kind) {
		case "potion":
			return `Restores up to ${potionHealing(item.level)} health.`;
		case "remedy":
			return "Cures burns and poison.";
		case "escape":
			return "Guarantees a clean escape from battle.";
		case "ring":
			return RING_DESCRIPTIONS[item.ring];
		case "amulet":
			return "A mysterious amulet that hums with ancient power.";
	}
}

export function potionHealing(level: number): number {
	return POTION_HEAL_PER_LEVEL * Math.max(1, level);
}

/** Items grouped by key, in insertion order. */
export class Inventory {
	private readonly items = new Map<string, Item[]>();

	constructor(items: ReadonlyArray<Item> = []) {
		for (const item of items) this.add(item);
	}

	add(item: Item): void {
		const key = itemKey(item);
		const stack = this.items.get(key);
		if (stack) stack.push(item);
		else this.items.set(key, [item]);
	}

	/**
	 * Remove and return one item with the key.
	 */
	take(key: string): Item | undefined {
		const stack = this.items.get(key);
		if (!stack) return undefined;
		const item = stack.shift();
		if (stack.length === 0) this.items.delete(key);
		return item;
	}

	peek(key: string): Item | undefined {
		return this.items.get(key)?.[0];
	}

	count(key: string): number {
		return this.items.get(key)?.length ?? 0;
	}

	has(key: string): boolean {
		return this.count(key) > 0;
	}

	get isEmpty(): boolean {
		return this.items.size === 0;
	}

	list(): Item[] {
		return Array.from(this.items.values()).flat();
	}

	clear(): void {
		this.items.clear();
	}
}
