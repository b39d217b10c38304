/**
 * Package: class - YAML loader for the class catalog.
 *
 * Reads `data/classes.yaml`, normalizes every entry into an immutable class
 * definition and registers it in the given catalog. Entries with an unknown
 * category or without a name are skipped with a warning; negative growth is
 * clamped to zero so stats never shrink with level.
 *
 * File shape:
 * ```yaml
 * classes:
 *   - name: warrior
 *     category: player
 *     health: [50, 10]      # [base, growth] or { base, growth }
 *     strength: [12, 3]
 *     speed: [10, 2]
 *     mana: [0, 0]          # optional
 *   - name: snake
 *     category: common
 *     health: [18, 6]
 *     strength: [6, 2]
 *     speed: [14, 2]
 *     inflicts: { effect: poison, odds: 5 }
 * ```
 *
 * @module package/class
 */
import { join, relative } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import {
	BaseClassDefinition,
	StatCurve,
	StatusInfliction,
	isCategory,
} from "../core/class.js";
import { isStatusEffect } from "../core/effect.js";
import { ClassCatalog } from "../registry/class.js";

export const CLASSES_PATH = join(getDataDirectory(), "classes.yaml");

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function coerceNumber(value: unknown, fallback = 0): number {
	const result = Number(value);
	return Number.isFinite(result) ? result : fallback;
}

function normalizeCurve(raw: unknown): StatCurve {
	if (Array.isArray(raw)) {
		return {
			base: Math.max(0, coerceNumber(raw[0])),
			growth: Math.max(0, coerceNumber(raw[1])),
		};
	}
	if (isRecord(raw)) {
		return {
			base: Math.max(0, coerceNumber(raw.base)),
			growth: Math.max(0, coerceNumber(raw.growth)),
		};
	}
	return { base: 0, growth: 0 };
}

function normalizeInfliction(raw: unknown): StatusInfliction | undefined {
	if (!isRecord(raw)) return undefined;
	if (!isStatusEffect(raw.effect)) {
		logger.warn(`Unknown status effect in inflicts: ${String(raw.effect)}. Skipping.`);
		return undefined;
	}
	return {
		effect: raw.effect,
		odds: Math.max(1, Math.floor(coerceNumber(raw.odds, 1))),
	};
}

function normalizeClass(raw: unknown, index: number): BaseClassDefinition | undefined {
	if (!isRecord(raw)) {
		logger.warn(`Skipping class entry #${index}: not a mapping`);
		return undefined;
	}
	const name = String(raw.name ?? "").trim().toLowerCase();
	if (!name) {
		logger.warn(`Skipping class entry #${index}: missing name`);
		return undefined;
	}
	const category = String(raw.category ?? "").trim().toLowerCase();
	if (!isCategory(category)) {
		logger.warn(`Skipping class "${name}": unknown category "${category}"`);
		return undefined;
	}
	const inflicts = normalizeInfliction(raw.inflicts);
	return {
		name,
		category,
		health: normalizeCurve(raw.health),
		strength: normalizeCurve(raw.strength),
		speed: normalizeCurve(raw.speed),
		mana: normalizeCurve(raw.mana),
		...(inflicts ? { inflicts } : {}),
	};
}

/**
 * Parse the text of a classes file into class definitions.
 */
export function parseClasses(content: string): BaseClassDefinition[] {
	const data: unknown = YAML.load(content);
	const entries = isRecord(data) ? data.classes : undefined;
	if (!Array.isArray(entries)) {
		logger.warn("Classes file has no 'classes' list");
		return [];
	}
	const result: BaseClassDefinition[] = [];
	entries.forEach((entry: unknown, index: number) => {
		const definition = normalizeClass(entry, index);
		if (definition) result.push(definition);
	});
	return result;
}

/**
 * Load the classes file into a catalog.
 * @returns The number of classes registered
 */
export async function loadClasses(
	catalog: ClassCatalog,
	path: string = CLASSES_PATH
): Promise<number> {
	logger.debug(`Loading classes from ${relative(getSafeRootDirectory(), path)}`);
	const content = await readFile(path, "utf-8");
	const definitions = parseClasses(content);
	for (const definition of definitions) catalog.register(definition);
	logger.info(`Loaded ${definitions.length} classes`);
	return definitions.length;
}
