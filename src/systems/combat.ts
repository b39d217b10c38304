/**
 * Combat system.
 *
 * Every verb here is one player action against the enemy in the game's
 * encounter slot. An exchange is the player's move followed, when the enemy
 * is still standing and still engaged, by one enemy strike.
 *
 * Outcomes:
 * - `continue`: both sides are alive and the fight goes on
 * - `won`: the enemy died; rewards were granted and events emitted
 * - `disengaged`: the fight ended without a winner (fled, bribed, escaped)
 *
 * Losing is not an outcome: the death pipeline runs and the verb throws
 * `CharacterDeadError`.
 *
 * @module systems/combat
 */
import logger from "../logger.js";
import { Character } from "../core/character.js";
import { tierFactor } from "../core/class.js";
import { STATUS_EFFECT } from "../core/effect.js";
import {
	CharacterDeadError,
	InsufficientGoldError,
	InvalidActionError,
	SkillNotLearnedError,
	UnknownSkillError,
} from "../core/errors.js";
import { EnemySummary } from "../core/event.js";
import { Quest } from "../core/quest.js";
import { Randomizer, oneIn } from "../core/randomizer.js";
import { RING } from "../core/ring.js";
import { Skill, requiresTarget } from "../core/skill.js";
import { Game } from "../game.js";
import { getSkillById } from "../registry/skill.js";
import { settleDeath } from "./death.js";

/** Gold ring bonus on battle winnings. */
export const GOLD_RING_MULTIPLIER = 1.5;
export const CRITICAL_MULTIPLIER = 2;

export interface StrikeResult {
	attacker: string;
	receiver: string;
	damage: number;
	missed: boolean;
	critical: boolean;
	/** Status effect the strike left on the receiver */
	inflicted?: STATUS_EFFECT;
}

export interface VictoryReward {
	xp: number;
	gold: number;
	levelsUp: number;
	/** Quests completed by the victory */
	quests: Quest[];
}

export type DisengageReason = "fled" | "bribed" | "escaped";

export type CombatOutcome =
	| { outcome: "continue"; strikes: StrikeResult[] }
	| { outcome: "won"; strikes: StrikeResult[]; reward: VictoryReward }
	| {
			outcome: "disengaged";
			strikes: StrikeResult[];
			reason: DisengageReason;
			/** Gold paid to end the fight */
			cost: number;
	  };

export function summarize(enemy: Character): EnemySummary {
	return { name: enemy.name, category: enemy.category, level: enemy.level };
}

/**
 * One blow from attacker to receiver: the miss roll, strength scaled by
 * `multiplier` and jittered, a critical roll, then the attacker's status
 * infliction on a hit.
 */
export function strike(
	randomizer: Randomizer,
	attacker: Character,
	receiver: Character,
	multiplier = 1
): StrikeResult {
	const result: StrikeResult = {
		attacker: attacker.name,
		receiver: receiver.name,
		damage: 0,
		missed: false,
		critical: false,
	};
	if (randomizer.isMiss(attacker.speed, receiver.speed)) {
		result.missed = true;
		return result;
	}
	let damage = randomizer.damage(Math.floor(attacker.strength * multiplier));
	if (randomizer.isCritical()) {
		result.critical = true;
		damage *= CRITICAL_MULTIPLIER;
	}
	result.damage = receiver.takeDamage(damage);

	const inflicts = attacker.class.inflicts;
	if (inflicts && !receiver.isDead && oneIn(randomizer, inflicts.odds)) {
		if (receiver.inflict(inflicts.effect)) result.inflicted = inflicts.effect;
	}
	return result;
}

function requireEnemy(game: Game): Character {
	const enemy = game.enemy;
	if (!enemy) throw new InvalidActionError("You are not in combat.");
	return enemy;
}

/**
 * Grant the rewards for a defeated enemy and close the encounter.
 */
export function victory(game: Game, enemy: Character): VictoryReward {
	const { randomizer, config } = game.context;
	const xp = enemy.level * config.rewards.xpPerLevel * tierFactor(enemy.category);
	let gold = randomizer.goldGained(enemy.level * config.rewards.goldPerLevel);
	if (game.player.isWearing(RING.GOLD)) {
		gold = Math.floor(gold * GOLD_RING_MULTIPLIER);
	}

	const levelsUp = game.player.addExperience(xp);
	game.gold += gold;
	game.endEncounter();
	logger.info(`Defeated ${enemy.name}[${enemy.level}]`, { xp, gold, levelsUp });

	const quests = game.emit({
		type: "battle-won",
		enemy: summarize(enemy),
		location: game.location.path,
		xp,
		gold,
		levelsUp,
	});
	if (levelsUp > 0) {
		quests.push(...game.emit({ type: "level-up", level: game.player.level }));
	}
	return { xp, gold, levelsUp, quests };
}

/**
 * The enemy's strike closing an exchange.
 * @throws {CharacterDeadError} when it kills the hero
 */
function retaliate(game: Game, enemy: Character, strikes: StrikeResult[]): CombatOutcome {
	strikes.push(strike(game.context.randomizer, enemy, game.player));
	if (game.player.isDead) {
		throw new CharacterDeadError(settleDeath(game));
	}
	return { outcome: "continue", strikes };
}

/** Finish an exchange in which the hero dealt damage. */
function resolve(game: Game, enemy: Character, strikes: StrikeResult[]): CombatOutcome {
	if (enemy.isDead) {
		return { outcome: "won", strikes, reward: victory(game, enemy) };
	}
	return retaliate(game, enemy, strikes);
}

export function attack(game: Game): CombatOutcome {
	const enemy = requireEnemy(game);
	const strikes = [strike(game.context.randomizer, game.player, enemy)];
	return resolve(game, enemy, strikes);
}

export function flee(game: Game): CombatOutcome {
	const enemy = requireEnemy(game);
	if (!game.context.randomizer.fleeSucceeds(game.player.speed, enemy.speed)) {
		logger.debug(`Failed to flee from ${enemy.name}`);
		return retaliate(game, enemy, []);
	}
	game.endEncounter();
	game.emit({ type: "fled", enemy: summarize(enemy) });
	return { outcome: "disengaged", strikes: [], reason: "fled", cost: 0 };
}

/** Gold an enemy asks to let the hero go. */
export function bribeCost(game: Game, enemy: Character): number {
	return enemy.level * game.context.config.bribe.costPerLevel * tierFactor(enemy.category);
}

/**
 * Offer gold for safe passage. Gold is only paid when the enemy accepts.
 * @throws {InsufficientGoldError} when the hero cannot afford the bribe
 */
export function bribe(game: Game): CombatOutcome {
	const enemy = requireEnemy(game);
	const cost = bribeCost(game, enemy);
	if (game.gold < cost) {
		throw new InsufficientGoldError(cost, game.gold);
	}
	if (!game.context.randomizer.bribeSucceeds(game.player.level, enemy.level)) {
		logger.debug(`${enemy.name} refused a bribe of ${cost}g`);
		return retaliate(game, enemy, []);
	}
	game.gold -= cost;
	game.endEncounter();
	game.emit({ type: "enemy-bribed", enemy: summarize(enemy), cost });
	return { outcome: "disengaged", strikes: [], reason: "bribed", cost };
}

/**
 * Leave combat without a roll, as the escape item does.
 */
export function escape(game: Game): CombatOutcome {
	requireEnemy(game);
	game.endEncounter();
	return { outcome: "disengaged", strikes: [], reason: "escaped", cost: 0 };
}

export interface SkillResult {
	skill: Skill;
	healed: number;
	cured?: STATUS_EFFECT;
	/** Present when the skill was used in combat */
	combat?: CombatOutcome;
}

/**
 * Use a learned skill, in or out of combat. Checks run in order: the skill
 * exists, is learned, has a target if it needs one, and is affordable.
 */
export function useSkill(game: Game, id: string): SkillResult {
	const skill = getSkillById(id);
	if (!skill) throw new UnknownSkillError(id);
	const player = game.player;
	if (!player.knowsSkill(skill.id)) throw new SkillNotLearnedError(skill.id);
	const enemy = game.enemy;
	if (requiresTarget(skill) && !enemy) {
		throw new InvalidActionError(`${skill.name} needs a target.`);
	}
	player.spendMana(skill.cost);
	logger.debug(`${player.name} uses ${skill.id}`, { mana: player.mana });

	const effect = skill.effect;
	switch (effect.type) {
		case "damage": {
			if (!enemy) throw new InvalidActionError(`${skill.name} needs a target.`);
			const strikes = [
				strike(game.context.randomizer, player, enemy, effect.multiplier),
			];
			return { skill, healed: 0, combat: resolve(game, enemy, strikes) };
		}
		case "heal": {
			const healed = player.heal(Math.floor(player.maxHealth * effect.ratio));
			return {
				skill,
				healed,
				...(enemy ? { combat: retaliate(game, enemy, []) } : {}),
			};
		}
		case "cure": {
			const cured = player.cure();
			return {
				skill,
				healed: 0,
				...(cured ? { cured } : {}),
				...(enemy ? { combat: retaliate(game, enemy, []) } : {}),
			};
		}
	}
}

/**
 * Learn a skill from the registry.
 * @throws {UnknownSkillError} for an id the registry does not know
 */
export function learnSkill(game: Game, id: string): Skill {
	const skill = getSkillById(id);
	if (!skill) throw new UnknownSkillError(id);
	game.player.learnSkill(skill);
	logger.info(`Learned ${skill.name}`);
	game.emit({ type: "skill-learned", skill: skill.id });
	return skill;
}
