/**
 * Distance from the home location.
 *
 * The location layer measures how far a directory is from home; the engine
 * only orders distances, reads their length and adds integers to it.
 *
 * @module core/distance
 */

export type DistanceBand = "near" | "mid" | "far";

const NEAR_LIMIT = 3;
const MID_LIMIT = 6;

export class Distance {
	readonly len: number;

	private constructor(len: number) {
		this.len = len;
	}

	/**
	 * Build a distance from a step count. Negative and fractional inputs are
	 * floored into the non-negative integers.
	 */
	static from(len: number): Distance {
		const safe = Number.isFinite(len) ? Math.max(0, Math.floor(len)) : 0;
		return new Distance(safe);
	}

	get band(): DistanceBand {
		if (this.len <= NEAR_LIMIT) return "near";
		if (this.len <= MID_LIMIT) return "mid";
		return "far";
	}

	compare(other: Distance): number {
		return this.len - other.len;
	}

	isHome(): boolean {
		return this.len === 0;
	}

	add(steps: number): Distance {
		return Distance.from(this.len + steps);
	}
}
