/**
 * Death and what it leaves behind.
 *
 * `settleDeath` is the single death pipeline: every path that can kill the
 * hero (an enemy strike, a status tick) ends here before the caller throws
 * `CharacterDeadError`. `inspect` is how the gold comes back, except in
 * hardcore mode, where nothing is buried.
 *
 * @module systems/death
 */
import logger from "../logger.js";
import { Character } from "../core/character.js";
import { Item } from "../core/item.js";
import { RING } from "../core/ring.js";
import { Tombstone } from "../core/tombstone.js";
import { Game } from "../game.js";

/** Rings a chest may hold. The ruling ring is never found lying around. */
export const CHEST_RINGS: ReadonlyArray<RING> = [
	RING.VOID,
	RING.EVADE,
	RING.ATTACK,
	RING.SPEED,
	RING.PROTECT,
	RING.GOLD,
];

export const CHEST_POTION_ODDS = 2;
export const CHEST_REMEDY_ODDS = 5;
export const CHEST_ESCAPE_ODDS = 10;
export const CHEST_RING_ODDS = 15;
export const CHEST_AMULET_ODDS = 20;

/**
 * Bury the hero where they fell and start them over at home.
 * @returns The tombstone; in hardcore mode it is not added to the ledger
 */
export function settleDeath(game: Game): Tombstone {
	const fallen = game.player;
	const grave: Tombstone = {
		location: game.location.path,
		gold: game.gold,
		hero: fallen.name,
		level: fallen.level,
	};
	const tombstone = game.hardcore ? Object.freeze(grave) : game.tombstones.bury(grave);
	logger.info(`${fallen.name}[${fallen.level}] died`, {
		location: tombstone.location,
		gold: tombstone.gold,
		hardcore: game.hardcore,
	});

	game.player = new Character({ class: fallen.class });
	game.gold = 0;
	game.inventory.clear();
	game.endEncounter();
	game.location = game.home;

	game.emit({
		type: "character-died",
		location: tombstone.location,
		gold: tombstone.gold,
	});
	return tombstone;
}

export interface ChestContents {
	gold: number;
	items: Item[];
}

export interface InspectResult {
	tombstones: Tombstone[];
	/** Gold taken from tombstones, bonus included */
	tombstoneGold: number;
	chest?: ChestContents;
}

/**
 * Fill a chest found at the hero's location. Each roll is independent and
 * runs in a fixed order: potion, remedy, escape, ring, then the amulet when
 * far from home.
 */
export function rollChest(game: Game): ChestContents {
	const { randomizer, config } = game.context;
	const distance = game.location.distance;
	const gold = randomizer.goldGained(
		config.rewards.goldPerLevel * Math.max(1, distance.len)
	);
	const items: Item[] = [];
	if (randomizer.range(CHEST_POTION_ODDS) === 0) {
		items.push({ kind: "potion", level: game.player.level });
	}
	if (randomizer.range(CHEST_REMEDY_ODDS) === 0) items.push({ kind: "remedy" });
	if (randomizer.range(CHEST_ESCAPE_ODDS) === 0) items.push({ kind: "escape" });
	if (randomizer.range(CHEST_RING_ODDS) === 0) {
		items.push({
			kind: "ring",
			ring: CHEST_RINGS[randomizer.range(CHEST_RINGS.length)],
		});
	}
	if (distance.band === "far" && randomizer.range(CHEST_AMULET_ODDS) === 0) {
		items.push({ kind: "amulet" });
	}
	return { gold, items };
}

/**
 * Search the hero's location: dig up every tombstone there, then look for
 * a chest.
 */
export function inspect(game: Game): InspectResult {
	const location = game.location;
	const bonus = game.context.config.rewards.tombstoneBonus;
	const tombstones = game.tombstones.exhume(location.path);
	let tombstoneGold = 0;
	for (const tombstone of tombstones) {
		const gold = tombstone.gold + bonus;
		tombstoneGold += gold;
		game.gold += gold;
		logger.info(`Found the tombstone of ${tombstone.hero}[${tombstone.level}]`, {
			location: location.path,
			gold,
		});
		game.emit({ type: "tombstone-found", location: location.path, gold });
	}

	if (!game.context.randomizer.shouldFindChest(location.distance)) {
		return { tombstones, tombstoneGold };
	}
	const chest = rollChest(game);
	game.gold += chest.gold;
	game.emit({ type: "chest-found", location: location.path, gold: chest.gold });
	for (const item of chest.items) game.addItem(item);
	return { tombstones, tombstoneGold, chest };
}
