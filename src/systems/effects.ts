/**
 * Status effect processor.
 *
 * Burn and poison hurt the hero once per location visited. They last
 * until cured by the `cleanse` skill or a remedy.
 *
 * @module systems/effects
 */
import logger from "../logger.js";
import { Character } from "../core/character.js";
import { tickDamage } from "../core/effect.js";
import { CharacterDeadError } from "../core/errors.js";
import { Game } from "../game.js";
import { settleDeath } from "./death.js";

/**
 * Apply one tick of the character's status effect.
 * @returns The damage dealt; 0 without an effect
 */
export function applyStatusTick(character: Character): number {
	const effect = character.statusEffect;
	if (effect === undefined) return 0;
	const dealt = character.takeDamage(tickDamage(effect, character.maxHealth));
	logger.debug(`${character.name} suffers ${dealt} from ${effect}`, {
		health: character.health,
	});
	return dealt;
}

/**
 * Tick the hero's status effect, running the death pipeline when it is
 * lethal.
 * @throws {CharacterDeadError} when the tick kills the hero
 */
export function tickHero(game: Game): number {
	const dealt = applyStatusTick(game.player);
	if (game.player.isDead) {
		throw new CharacterDeadError(settleDeath(game));
	}
	return dealt;
}
