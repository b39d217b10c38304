/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it from the defaults when missing) and
 * merges it over `CONFIG_DEFAULT`.
 *
 * Behavior
 * - Merges only known keys of known sections; unknown keys are ignored
 *   with a warning
 * - A value whose type differs from the default's is ignored with a warning
 * - If the file is absent, writes the defaults to disk and returns them
 *
 * @example
 * import { loadConfig } from './package/config.js';
 * const config = await loadConfig();
 * console.log(config.encounter.baseChance);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import { CONFIG_DEFAULT, Config, createConfig } from "../registry/config.js";

export const CONFIG_PATH = join(getDataDirectory(), "config.yaml");

type SectionName = keyof Config;
const SECTIONS: ReadonlyArray<SectionName> = [
	"game",
	"encounter",
	"rewards",
	"bribe",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSection(key: string): key is SectionName {
	return SECTIONS.some((section) => section === key);
}

/**
 * Merge one parsed section over its defaults, field by field.
 */
function mergeSection<T extends Record<string, string | number>>(
	name: string,
	defaults: T,
	raw: Record<string, unknown>
): T {
	const result: T = { ...defaults };
	for (const [key, value] of Object.entries(raw)) {
		if (!(key in defaults)) {
			logger.warn(`Ignoring unknown config key ${name}.${key}`);
			continue;
		}
		const fallback = defaults[key];
		if (typeof value !== typeof fallback) {
			logger.warn(`Ignoring ${name}.${key}: expected a ${typeof fallback}`);
			continue;
		}
		if (value === fallback) {
			logger.debug(`DEFAULT ${name}.${key} = ${String(value)}`);
			continue;
		}
		Object.assign(result, { [key]: value });
		logger.debug(`Set ${name}.${key} = ${String(value)}`);
	}
	return result;
}

/**
 * Merge a parsed YAML document over the defaults.
 */
export function mergeConfig(parsed: unknown): Config {
	const config = createConfig();
	if (!isRecord(parsed)) return config;
	for (const [section, raw] of Object.entries(parsed)) {
		if (!isSection(section)) {
			logger.warn(`Ignoring unknown config section ${section}`);
			continue;
		}
		if (!isRecord(raw)) continue;
		switch (section) {
			case "game":
				config.game = mergeSection(section, config.game, raw);
				break;
			case "encounter":
				config.encounter = mergeSection(section, config.encounter, raw);
				break;
			case "rewards":
				config.rewards = mergeSection(section, config.rewards, raw);
				break;
			case "bribe":
				config.bribe = mergeSection(section, config.bribe, raw);
				break;
		}
	}
	return config;
}

/**
 * Load the config file, writing the defaults first when it does not exist.
 */
export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
	logger.debug(`Loading config from ${relative(getSafeRootDirectory(), path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			logger.info(`No config at ${path}; writing defaults`);
			await mkdir(dirname(path), { recursive: true });
			await writeFile(path, YAML.dump(CONFIG_DEFAULT), "utf-8");
			return createConfig();
		}
		throw error;
	}
	return mergeConfig(YAML.load(content));
}
