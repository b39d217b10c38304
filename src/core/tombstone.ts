/**
 * Tombstones left behind by fallen heroes.
 *
 * The ledger keeps every tombstone by location path. Each death buries a
 * new one; the first inspection of that location digs up all of them.
 *
 * @module core/tombstone
 */

export interface Tombstone {
	readonly location: string;
	readonly gold: number;
	/** Class and level of the hero at the time of death */
	readonly hero: string;
	readonly level: number;
}

export class TombstoneLedger {
	private readonly graves = new Map<string, Tombstone[]>();

	constructor(tombstones: ReadonlyArray<Tombstone> = []) {
		for (const tombstone of tombstones) this.bury(tombstone);
	}

	bury(tombstone: Tombstone): Tombstone {
		const frozen = Object.freeze({ ...tombstone });
		const existing = this.graves.get(frozen.location);
		if (existing) existing.push(frozen);
		else this.graves.set(frozen.location, [frozen]);
		return frozen;
	}

	/**
	 * Remove and return every tombstone at the location.
	 */
	exhume(location: string): Tombstone[] {
		const found = this.graves.get(location) ?? [];
		this.graves.delete(location);
		return found;
	}

	at(location: string): ReadonlyArray<Tombstone> {
		return this.graves.get(location) ?? [];
	}

	get size(): number {
		let total = 0;
		for (const stones of this.graves.values()) total += stones.length;
		return total;
	}

	get isEmpty(): boolean {
		return this.graves.size === 0;
	}

	list(): Tombstone[] {
		return Array.from(this.graves.values()).flat();
	}
}
