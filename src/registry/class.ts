/**
 * Registry: class - the class catalog
 *
 * Holds every player and enemy class by name. A catalog instance is filled
 * by the class package (from `data/classes.yaml`) and carried by the game
 * context; it must be loaded before the first spawn.
 *
 * @module registry/class
 */

import logger from "../logger.js";
import {
	BaseClassDefinition,
	CATEGORY,
	CharacterClass,
	freezeClass,
} from "../core/class.js";

/** Categories the random spawner draws from. */
const ENEMY_CATEGORIES: ReadonlySet<CATEGORY> = new Set([
	CATEGORY.COMMON,
	CATEGORY.RARE,
	CATEGORY.LEGENDARY,
]);

export class ClassCatalog {
	private readonly classes = new Map<string, CharacterClass>();

	constructor(definitions: ReadonlyArray<BaseClassDefinition> = []) {
		for (const definition of definitions) this.register(definition);
	}

	/**
	 * Register a class, replacing any class with the same name.
	 * @returns The frozen catalog entry
	 */
	register(definition: BaseClassDefinition): CharacterClass {
		const frozen = freezeClass(definition);
		if (this.classes.has(frozen.name)) {
			logger.warn(`Overriding existing class "${frozen.name}"`);
		}
		this.classes.set(frozen.name, frozen);
		logger.debug(`Registered class: ${frozen.name} (${frozen.category})`);
		return frozen;
	}

	get(name: string): CharacterClass | undefined {
		const cls = this.classes.get(name);
		if (!cls) {
			logger.warn(`Requested class '${name}' not found.`);
			return undefined;
		}
		return cls;
	}

	/**
	 * Look up a class the player may pick.
	 */
	playerByName(name: string): CharacterClass | undefined {
		const cls = this.classes.get(name);
		return cls?.category === CATEGORY.PLAYER ? cls : undefined;
	}

	/**
	 * The first player class in catalog order, used for new heroes and for
	 * the final boss and easter-egg spawns.
	 * @throws Error if no player class has been registered
	 */
	playerFirst(): CharacterClass {
		const first = this.byCategory(CATEGORY.PLAYER)[0];
		if (!first) {
			throw new Error(
				"Cannot get the first player class: class catalog not loaded. Call loadClasses() first."
			);
		}
		return first;
	}

	byCategory(category: CATEGORY): CharacterClass[] {
		return this.all().filter((cls) => cls.category === category);
	}

	/** Classes eligible for random spawns, in catalog order. */
	enemies(): CharacterClass[] {
		return this.all().filter((cls) => ENEMY_CATEGORIES.has(cls.category));
	}

	names(category: CATEGORY): string[] {
		return this.byCategory(category).map((cls) => cls.name);
	}

	all(): CharacterClass[] {
		return Array.from(this.classes.values());
	}

	get size(): number {
		return this.classes.size;
	}

	clear(): void {
		this.classes.clear();
		logger.debug("Cleared class catalog");
	}
}
