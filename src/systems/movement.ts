/**
 * Movement and the actions the hero takes between fights.
 *
 * Per visited location the order is fixed: move, tick the status effect
 * (possibly dying), heal fully at home, then roll for an encounter away
 * from home. Travel stops at the first encounter.
 *
 * @module systems/movement
 */
import logger from "../logger.js";
import { Character } from "../core/character.js";
import { STATUS_EFFECT } from "../core/effect.js";
import { Encounter } from "../core/encounter.js";
import {
	InvalidActionError,
	ItemNotFoundError,
	UnknownClassError,
} from "../core/errors.js";
import { Item, itemKey, potionHealing } from "../core/item.js";
import { Location } from "../core/location.js";
import { RING } from "../core/ring.js";
import { Game } from "../game.js";
import { CombatOutcome, escape } from "./combat.js";
import { tickHero } from "./effects.js";
import { SpawnInput, generateNpcEncounter, spawnEnemy } from "./encounter.js";

export interface TravelOptions {
	/** Skip the intermediate steps and every encounter roll */
	force?: boolean;
}

export interface TravelResult {
	visited: Location[];
	/** Status damage taken along the way */
	damage: number;
	encounter: Encounter;
}

function spawnInput(game: Game): SpawnInput {
	const { catalog, config, randomizer } = game.context;
	return {
		character: game.player,
		location: game.location,
		quests: game.quests,
		catalog,
		config: config.encounter,
		randomizer,
	};
}

function requireIdle(game: Game): void {
	if (!game.isIdle) {
		throw new InvalidActionError("Finish the current encounter first.");
	}
}

/**
 * Arrive at a location.
 * @returns The status damage taken on arrival
 * @throws {CharacterDeadError} when the status tick is lethal
 */
export function visit(game: Game, location: Location): number {
	game.location = location;
	const damage = tickHero(game);
	if (location.isHome) game.player.healFully();
	return damage;
}

/**
 * Roll an enemy, and failing that an NPC, at the current location.
 */
function rollEncounter(game: Game): void {
	const enemy = spawnEnemy(spawnInput(game));
	if (enemy) {
		game.startCombat(enemy);
		return;
	}
	const npc = generateNpcEncounter(game.location.distance, game.context.randomizer);
	if (npc) game.startNpcEncounter(npc);
}

/**
 * Walk a route of locations, ending at its last entry.
 * @throws {InvalidActionError} while an encounter is active
 * @throws {CharacterDeadError} when a status tick kills the hero
 */
export function travel(
	game: Game,
	route: ReadonlyArray<Location>,
	options: TravelOptions = {}
): TravelResult {
	requireIdle(game);
	const steps = options.force ? route.slice(-1) : route;
	const visited: Location[] = [];
	let damage = 0;
	for (const location of steps) {
		damage += visit(game, location);
		visited.push(location);
		if (options.force || location.isHome) continue;
		rollEncounter(game);
		if (!game.isIdle) break;
	}
	logger.debug(`Travelled to ${game.location.path}`, {
		steps: visited.length,
		encounter: game.encounter.state,
	});
	return { visited, damage, encounter: game.encounter };
}

/**
 * Look for a fight where the hero stands, home included.
 * @returns The enemy now in combat, if one showed up
 */
export function seekBattle(game: Game): Character | undefined {
	requireIdle(game);
	const enemy = spawnEnemy(spawnInput(game));
	if (enemy) game.startCombat(enemy);
	return enemy;
}

export interface ItemUseResult {
	item: Item;
	healed: number;
	cured?: STATUS_EFFECT;
	/** Ring pushed out of the slots and returned to the inventory */
	evicted?: RING;
	combat?: CombatOutcome;
}

/**
 * Use one item from the inventory by key.
 * @throws {ItemNotFoundError} when the inventory has no such item
 * @throws {InvalidActionError} for the amulet, or an escape out of combat
 */
export function useItem(game: Game, key: string): ItemUseResult {
	const peeked = game.inventory.peek(key);
	if (!peeked) throw new ItemNotFoundError(key);
	if (peeked.kind === "amulet") {
		throw new InvalidActionError("The amulet's power works on its own.");
	}
	if (peeked.kind === "escape" && !game.enemy) {
		throw new InvalidActionError("There is nothing to escape from.");
	}
	const item = game.inventory.take(key);
	if (!item) throw new ItemNotFoundError(key);

	const result: ItemUseResult = { item, healed: 0 };
	switch (item.kind) {
		case "potion":
			result.healed = game.player.heal(potionHealing(item.level));
			break;
		case "remedy": {
			const cured = game.player.cure();
			if (cured) result.cured = cured;
			break;
		}
		case "escape":
			result.combat = escape(game);
			break;
		case "ring": {
			const evicted = game.player.equipRing(item.ring);
			if (evicted) {
				game.inventory.add({ kind: "ring", ring: evicted });
				result.evicted = evicted;
			}
			break;
		}
		case "amulet":
			break;
	}
	game.itemUsed(item.kind, itemKey(item));
	return result;
}

/**
 * Take off a worn ring and put it back in the inventory.
 * @throws {InvalidActionError} when the ring is not worn
 */
export function removeRing(game: Game, ring: RING): void {
	if (!game.player.unequipRing(ring)) {
		throw new InvalidActionError(`The ${ring} ring is not worn.`);
	}
	game.inventory.add({ kind: "ring", ring });
	logger.debug(`Took off the ${ring} ring`);
}

/**
 * Switch the hero to another player class. Only possible at home.
 * @throws {UnknownClassError} for a name that is not a player class
 */
export function changeClass(game: Game, name: string): Character {
	if (!game.location.isHome) {
		throw new InvalidActionError("Classes can only be changed at home.");
	}
	requireIdle(game);
	const cls = game.context.catalog.playerByName(name.toLowerCase());
	if (!cls) throw new UnknownClassError(name);
	game.player.changeClass(cls);
	logger.info(`Changed class to ${cls.name}`);
	return game.player;
}
