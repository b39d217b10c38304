/**
 * Game state and the context it runs in.
 *
 * A `GameContext` bundles what the systems need besides the game itself:
 * the class catalog, the randomizer and the configuration. Initialization
 * order is config, then catalog (see `loadAllPackages`), then games; no
 * spawn may happen before the catalog is filled.
 *
 * A `Game` owns everything one player action may mutate: location, hero,
 * gold, inventory, quests, tombstones and the encounter slot. Systems in
 * `src/systems/` operate on it one action at a time.
 *
 * @module game
 */
import logger from "./logger.js";
import { Character, SerializedCharacter } from "./core/character.js";
import { Encounter, IDLE, NPC } from "./core/encounter.js";
import { InvalidActionError, UnknownClassError } from "./core/errors.js";
import { GameEvent } from "./core/event.js";
import { Inventory, Item, ItemKind, itemKey } from "./core/item.js";
import { Location, createLocation } from "./core/location.js";
import { Quest, describeQuest } from "./core/quest.js";
import { Randomizer, SeededRandomizer } from "./core/randomizer.js";
import { Tombstone, TombstoneLedger } from "./core/tombstone.js";
import { ClassCatalog } from "./registry/class.js";
import { Config, createConfig } from "./registry/config.js";
import { QuestBook } from "./systems/quests.js";
import { DeepReadonly } from "./utils/types.js";

export interface GameContext {
	readonly catalog: ClassCatalog;
	readonly randomizer: Randomizer;
	readonly config: DeepReadonly<Config>;
}

export interface ContextOptions {
	catalog: ClassCatalog;
	config?: Config;
	/** Defaults to a `SeededRandomizer` tuned by the config */
	randomizer?: Randomizer;
	seed?: string | number;
}

export function createContext(options: ContextOptions): GameContext {
	const config = options.config ?? createConfig();
	return {
		catalog: options.catalog,
		config,
		randomizer:
			options.randomizer ?? new SeededRandomizer(options.seed, config.encounter),
	};
}

export const HOME_PATH = "~";

export interface GameOptions {
	home?: Location;
	/** Player class name; defaults to the first player class */
	className?: string;
	/** Starting quest list; defaults to the standard quests */
	quests?: ReadonlyArray<Quest>;
	/** Deaths leave no tombstone */
	hardcore?: boolean;
}

export interface SerializedLocation {
	path: string;
	distance: number;
	dataDir: boolean;
}

export type SerializedEncounter =
	| { state: "idle" }
	| { state: "in-combat"; enemy: SerializedCharacter }
	| { state: "in-npc-encounter"; npc: NPC };

/** Plain-data copy of a game, for an external persistence layer. */
export interface GameSnapshot {
	home: SerializedLocation;
	location: SerializedLocation;
	player: SerializedCharacter;
	gold: number;
	hardcore: boolean;
	inventory: Item[];
	quests: Quest[];
	tombstones: Tombstone[];
	encounter: SerializedEncounter;
}

function serializeLocation(location: Location): SerializedLocation {
	return {
		path: location.path,
		distance: location.distance.len,
		dataDir: location.isDataDir,
	};
}

function restoreLocation(data: SerializedLocation): Location {
	return createLocation({
		path: data.path,
		distance: data.distance,
		dataDir: data.dataDir,
	});
}

export class Game {
	readonly context: GameContext;
	readonly home: Location;
	location: Location;
	player: Character;
	gold = 0;
	readonly inventory: Inventory;
	readonly quests: QuestBook;
	readonly tombstones: TombstoneLedger;
	private _encounter: Encounter = IDLE;
	private _hardcore: boolean;

	constructor(context: GameContext, options: GameOptions = {}) {
		this.context = context;
		this.home = options.home ?? createLocation({ path: HOME_PATH, distance: 0 });
		this.location = this.home;
		const cls = options.className
			? context.catalog.playerByName(options.className)
			: context.catalog.playerFirst();
		if (!cls) {
			throw new UnknownClassError(options.className ?? "");
		}
		this.player = new Character({ class: cls });
		this.inventory = new Inventory();
		this.quests = new QuestBook(options.quests);
		this.tombstones = new TombstoneLedger();
		this._hardcore = options.hardcore ?? false;
	}

	/** In hardcore mode a death buries nothing and the gold is gone. */
	get hardcore(): boolean {
		return this._hardcore;
	}

	set hardcore(on: boolean) {
		this._hardcore = on;
		logger.info(`Hardcore mode ${on ? "enabled" : "disabled"}`);
	}

	get encounter(): Encounter {
		return this._encounter;
	}

	/** The enemy being fought, if any. */
	get enemy(): Character | undefined {
		return this._encounter.state === "in-combat" ? this._encounter.enemy : undefined;
	}

	get isIdle(): boolean {
		return this._encounter.state === "idle";
	}

	startCombat(enemy: Character): void {
		if (!this.isIdle) {
			throw new InvalidActionError("An encounter is already in progress.");
		}
		this._encounter = { state: "in-combat", enemy };
		logger.info(`${enemy.name}[${enemy.level}] appears`, {
			location: this.location.path,
			category: enemy.category,
		});
	}

	startNpcEncounter(npc: NPC): void {
		if (!this.isIdle) {
			throw new InvalidActionError("An encounter is already in progress.");
		}
		this._encounter = { state: "in-npc-encounter", npc };
		logger.info(`Met a ${npc}`, { location: this.location.path });
	}

	endEncounter(): void {
		this._encounter = IDLE;
	}

	/**
	 * Route an event through the quest book and credit the reward of every
	 * quest it completes.
	 * @returns The quests completed by the event
	 */
	emit(event: GameEvent): Quest[] {
		logger.debug(`Event ${event.type}`, { event });
		const completed = this.quests.dispatch(event);
		for (const quest of completed) {
			this.gold += quest.reward;
			logger.debug(`Credited ${quest.reward}g for "${describeQuest(quest.goal)}"`);
		}
		return completed;
	}

	/**
	 * Put an item in the inventory and announce it.
	 */
	addItem(item: Item): void {
		this.inventory.add(item);
		this.emit({ type: "item-added", item: item.kind, key: itemKey(item) });
	}

	/** Announce that an item of this kind was consumed or equipped. */
	itemUsed(kind: ItemKind, key: string): void {
		this.emit({ type: "item-used", item: kind, key });
	}

	snapshot(): GameSnapshot {
		const encounter = this._encounter;
		return {
			home: serializeLocation(this.home),
			location: serializeLocation(this.location),
			player: this.player.serialize(),
			gold: this.gold,
			hardcore: this._hardcore,
			inventory: this.inventory.list().map((item) => ({ ...item })),
			quests: this.quests.serialize(),
			tombstones: this.tombstones.list().map((stone) => ({ ...stone })),
			encounter:
				encounter.state === "in-combat"
					? { state: "in-combat", enemy: encounter.enemy.serialize() }
					: encounter.state === "in-npc-encounter"
						? { state: "in-npc-encounter", npc: encounter.npc }
						: { state: "idle" },
		};
	}

	static restore(context: GameContext, snapshot: GameSnapshot): Game {
		const game = new Game(context, {
			home: restoreLocation(snapshot.home),
			quests: snapshot.quests,
			hardcore: snapshot.hardcore,
		});
		return game.load(snapshot);
	}

	private load(snapshot: GameSnapshot): Game {
		this.location = restoreLocation(snapshot.location);
		this.player = Character.deserialize(snapshot.player);
		this.gold = snapshot.gold;
		for (const item of snapshot.inventory) this.inventory.add({ ...item });
		for (const stone of snapshot.tombstones) this.tombstones.bury(stone);
		const encounter = snapshot.encounter;
		switch (encounter.state) {
			case "in-combat":
				this._encounter = {
					state: "in-combat",
					enemy: Character.deserialize(encounter.enemy),
				};
				break;
			case "in-npc-encounter":
				this._encounter = { state: "in-npc-encounter", npc: encounter.npc };
				break;
			case "idle":
				this._encounter = IDLE;
				break;
		}
		return this;
	}
}
