/**
 * Locations as the engine sees them.
 *
 * Resolving real paths is the job of the location layer; the engine receives
 * a value that already knows its distance from home and whether it is home
 * or the game's own data directory.
 *
 * @module core/location
 */
import { Distance } from "./distance.js";

export interface Location {
	/** Identity key, used to find tombstones */
	readonly path: string;
	readonly distance: Distance;
	readonly isHome: boolean;
	readonly isDataDir: boolean;
}

export interface LocationOptions {
	path: string;
	distance: number | Distance;
	dataDir?: boolean;
}

/**
 * Create a location value. A location is home exactly when its distance is
 * zero.
 */
export function createLocation(options: LocationOptions): Location {
	const distance =
		options.distance instanceof Distance
			? options.distance
			: Distance.from(options.distance);
	return Object.freeze({
		path: options.path,
		distance,
		isHome: distance.isHome(),
		isDataDir: options.dataDir === true,
	});
}
