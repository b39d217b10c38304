/**
 * NPC encounters.
 *
 * Each NPC answers exactly one verb. Using the wrong verb changes nothing;
 * the right verb always ends the encounter.
 *
 * @module systems/npc
 */
import logger from "../logger.js";
import { NPC } from "../core/encounter.js";
import { InsufficientGoldError, InvalidActionError } from "../core/errors.js";
import { Item } from "../core/item.js";
import { Game } from "../game.js";

export const LORE: ReadonlyArray<string> = [
	"She whispers of a hidden treasure in a nearby cave.",
	"She speaks of a great evil that slumbers deep within the earth.",
	"She warns of a powerful dragon that guards the mountain pass.",
];

function requireNpc(game: Game, npc: NPC): void {
	const encounter = game.encounter;
	if (encounter.state !== "in-npc-encounter" || encounter.npc !== npc) {
		throw new InvalidActionError(`There is no ${npc} here.`);
	}
}

export interface BetResult {
	won: boolean;
	/** Gold gained, negative when lost */
	delta: number;
}

/**
 * Bet gold with the gambler on a coin flip.
 * @throws {InsufficientGoldError} when betting more than the hero carries
 */
export function bet(game: Game, amount: number): BetResult {
	requireNpc(game, NPC.GAMBLER);
	if (!Number.isFinite(amount)) {
		throw new InvalidActionError("The gambler wants a number of gold coins.");
	}
	const stake = Math.max(0, Math.floor(amount));
	if (stake > game.gold) {
		throw new InsufficientGoldError(stake, game.gold);
	}
	const won = game.context.randomizer.range(2) === 0;
	const delta = won ? stake : -stake;
	game.gold += delta;
	game.endEncounter();
	logger.info(`${won ? "Won" : "Lost"} a bet of ${stake}g`);
	return { won, delta };
}

/**
 * Have the witch brew a potion matching the hero's level.
 */
export function brew(game: Game): Item {
	requireNpc(game, NPC.WITCH);
	const potion: Item = { kind: "potion", level: game.player.level };
	game.endEncounter();
	game.addItem(potion);
	return potion;
}

/**
 * Hear what the ghostly maiden has to tell.
 */
export function listen(game: Game): string {
	requireNpc(game, NPC.GHOSTLY_MAIDEN);
	const line = LORE[game.context.randomizer.range(LORE.length)];
	game.endEncounter();
	return line;
}
