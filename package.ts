/**
 * Package loader.
 *
 * Loads the data packages in dependency order and returns the context games
 * run in:
 * 1. config (`data/config.yaml`), which tunes the randomizer
 * 2. classes (`data/classes.yaml`), which every spawn draws from
 *
 * @module package
 */
import logger from "./src/logger.js";
import { Randomizer } from "./src/core/randomizer.js";
import { GameContext, createContext } from "./src/game.js";
import { CLASSES_PATH, loadClasses } from "./src/package/class.js";
import { CONFIG_PATH, loadConfig } from "./src/package/config.js";
import { ClassCatalog } from "./src/registry/class.js";

export interface LoadOptions {
	configPath?: string;
	classesPath?: string;
	seed?: string | number;
	randomizer?: Randomizer;
}

export async function loadAllPackages(options: LoadOptions = {}): Promise<GameContext> {
	const config = await loadConfig(options.configPath ?? CONFIG_PATH);
	logger.debug("Loaded package: config");

	const catalog = new ClassCatalog();
	const count = await loadClasses(catalog, options.classesPath ?? CLASSES_PATH);
	if (count === 0) {
		logger.warn("No classes loaded; spawns will fail until classes are registered");
	}
	logger.debug("Loaded package: classes");

	return createContext({
		catalog,
		config,
		...(options.randomizer ? { randomizer: options.randomizer } : {}),
		...(options.seed !== undefined ? { seed: options.seed } : {}),
	});
}
