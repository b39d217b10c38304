/**
 * Fixtures shared by the system tests: a small class catalog and a game
 * wired to a `ScriptedRandomizer`.
 *
 * @module utils/testing
 */
import { CATEGORY, BaseClassDefinition } from "../core/class.js";
import { STATUS_EFFECT } from "../core/effect.js";
import { Location, createLocation } from "../core/location.js";
import { ScriptedRandomizer } from "../core/randomizer.js";
import { Game, GameOptions, createContext } from "../game.js";
import { ClassCatalog } from "../registry/class.js";
import { Config, createConfig } from "../registry/config.js";

function curve(base: number, growth: number) {
	return { base, growth };
}

export const TEST_CLASSES: ReadonlyArray<BaseClassDefinition> = [
	{
		name: "warrior",
		category: CATEGORY.PLAYER,
		health: curve(50, 10),
		strength: curve(12, 3),
		speed: curve(10, 2),
		mana: curve(0, 0),
	},
	{
		name: "mage",
		category: CATEGORY.PLAYER,
		health: curve(30, 6),
		strength: curve(8, 2),
		speed: curve(10, 2),
		mana: curve(30, 6),
	},
	{
		name: "rat",
		category: CATEGORY.COMMON,
		health: curve(10, 4),
		strength: curve(4, 1),
		speed: curve(6, 1),
		mana: curve(0, 0),
	},
	{
		name: "rat king",
		category: CATEGORY.RARE,
		health: curve(30, 8),
		strength: curve(9, 2),
		speed: curve(8, 1),
		mana: curve(0, 0),
	},
	{
		name: "orc",
		category: CATEGORY.COMMON,
		health: curve(28, 8),
		strength: curve(9, 3),
		speed: curve(8, 1),
		mana: curve(0, 0),
	},
	{
		name: "orc captain",
		category: CATEGORY.RARE,
		health: curve(45, 11),
		strength: curve(13, 3),
		speed: curve(9, 1),
		mana: curve(0, 0),
	},
	{
		name: "orc warlord",
		category: CATEGORY.LEGENDARY,
		health: curve(80, 16),
		strength: curve(18, 4),
		speed: curve(10, 2),
		mana: curve(0, 0),
	},
	{
		name: "snake",
		category: CATEGORY.COMMON,
		health: curve(18, 6),
		strength: curve(6, 2),
		speed: curve(9, 2),
		mana: curve(0, 0),
		inflicts: { effect: STATUS_EFFECT.POISON, odds: 5 },
	},
	{
		name: "guardian",
		category: CATEGORY.BOSS,
		health: curve(120, 20),
		strength: curve(20, 5),
		speed: curve(12, 2),
		mana: curve(0, 0),
	},
];

export function createTestCatalog(): ClassCatalog {
	return new ClassCatalog(TEST_CLASSES);
}

export interface TestGameOptions extends GameOptions {
	randomizer?: ScriptedRandomizer;
	config?: Config;
	catalog?: ClassCatalog;
}

export interface TestGame {
	game: Game;
	randomizer: ScriptedRandomizer;
}

/**
 * A fresh game at home. The randomizer defaults to one where enemies
 * appear, nothing misses and every range roll is 0.
 */
export function createTestGame(options: TestGameOptions = {}): TestGame {
	const randomizer = options.randomizer ?? new ScriptedRandomizer();
	const context = createContext({
		catalog: options.catalog ?? createTestCatalog(),
		config: options.config ?? createConfig(),
		randomizer,
	});
	const game = new Game(context, options);
	return { game, randomizer };
}

export function place(path: string, distance: number, dataDir = false): Location {
	return createLocation({ path, distance, dataDir });
}
