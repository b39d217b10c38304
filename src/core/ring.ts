/**
 * Rings and the two ring slots a character wears them in.
 *
 * The slots form a first-in, first-out queue of capacity two: the newest ring
 * sits in the first slot, and equipping a third ring evicts the one worn the
 * longest.
 *
 * @module core/ring
 */

export enum RING {
	VOID = "void",
	EVADE = "evade",
	ATTACK = "attack",
	SPEED = "speed",
	PROTECT = "protect",
	GOLD = "gold",
	RULING = "ruling",
}

export const RING_CAPACITY = 2;

export const RING_DESCRIPTIONS: Readonly<Record<RING, string>> = Object.freeze({
	[RING.VOID]: "A plain ring with no power of its own.",
	[RING.EVADE]: "Enemies do not notice the wearer.",
	[RING.ATTACK]: "Increases strength by half.",
	[RING.SPEED]: "Increases speed by half.",
	[RING.PROTECT]: "Shields the wearer from new status effects.",
	[RING.GOLD]: "Increases gold won in battle by half.",
	[RING.RULING]: "One ring to rule them all.",
});

export function isRing(value: unknown): value is RING {
	return (
		typeof value === "string" &&
		Object.values(RING).some((entry) => entry === value)
	);
}

export class RingSlots {
	private readonly worn: RING[];

	constructor(rings: ReadonlyArray<RING> = []) {
		this.worn = rings.slice(0, RING_CAPACITY);
	}

	/** Worn rings, newest first. */
	get rings(): ReadonlyArray<RING> {
		return [...this.worn];
	}

	get left(): RING | undefined {
		return this.worn[0];
	}

	get right(): RING | undefined {
		return this.worn[1];
	}

	/**
	 * Put a ring on. Returns the ring evicted to make room, if any.
	 */
	equip(ring: RING): RING | undefined {
		this.worn.unshift(ring);
		if (this.worn.length > RING_CAPACITY) return this.worn.pop();
		return undefined;
	}

	/**
	 * Take off one worn copy of a ring. The other slot keeps its place.
	 * @returns false when the ring is not worn
	 */
	unequip(ring: RING): boolean {
		const index = this.worn.indexOf(ring);
		if (index === -1) return false;
		this.worn.splice(index, 1);
		return true;
	}

	isWearing(ring: RING): boolean {
		return this.worn.includes(ring);
	}

	clear(): void {
		this.worn.length = 0;
	}
}
