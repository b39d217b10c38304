import { suite, test } from "node:test";
import assert from "node:assert";
import { Character } from "../core/character.js";
import { STATUS_EFFECT } from "../core/effect.js";
import { RING } from "../core/ring.js";
import { createConfig } from "../registry/config.js";
import { createTestGame, place } from "../utils/testing.js";
import { inspect, settleDeath } from "./death.js";

suite("systems/death.ts", () => {
	suite("settleDeath", () => {
		test("buries the gold and starts the hero over at home", () => {
			const { game } = createTestGame();
			const cave = place("~/cave", 2);
			game.location = cave;
			game.gold = 250;
			game.player.addExperience(30 + 84);
			game.player.equipRing(RING.GOLD);
			game.player.inflict(STATUS_EFFECT.POISON);
			game.addItem({ kind: "remedy" });
			const cls = game.context.catalog.get("orc");
			assert.ok(cls);
			game.startCombat(new Character({ class: cls }));

			const tombstone = settleDeath(game);

			assert.deepStrictEqual(tombstone, {
				location: "~/cave",
				gold: 250,
				hero: "warrior",
				level: 3,
			});
			assert.strictEqual(game.player.level, 1);
			assert.strictEqual(game.player.experience, 0);
			assert.strictEqual(game.player.health, 50);
			assert.deepStrictEqual(game.player.rings.rings, []);
			assert.strictEqual(game.player.statusEffect, undefined);
			assert.strictEqual(game.player.name, "warrior");
			assert.strictEqual(game.gold, 0);
			assert.strictEqual(game.inventory.isEmpty, true);
			assert.strictEqual(game.isIdle, true);
			assert.strictEqual(game.location, game.home);
		});
	});

	suite("hardcore", () => {
		test("a death buries nothing and the gold is lost", () => {
			const { game } = createTestGame({ hardcore: true });
			game.location = place("~/pit", 3);
			game.gold = 90;
			const tombstone = settleDeath(game);
			assert.deepStrictEqual(tombstone, {
				location: "~/pit",
				gold: 90,
				hero: "warrior",
				level: 1,
			});
			assert.strictEqual(game.tombstones.isEmpty, true);
			assert.strictEqual(game.gold, 0);
			assert.strictEqual(game.location, game.home);
			assert.strictEqual(game.hardcore, true);

			game.location = place("~/pit", 3);
			assert.deepStrictEqual(inspect(game), { tombstones: [], tombstoneGold: 0 });
		});

		test("turning it off buries again", () => {
			const { game } = createTestGame();
			game.hardcore = true;
			game.hardcore = false;
			game.location = place("~/pit", 3);
			game.gold = 90;
			settleDeath(game);
			assert.strictEqual(game.tombstones.at("~/pit").length, 1);
		});
	});

	suite("inspect", () => {
		test("recovers the gold of a fallen hero", () => {
			const { game } = createTestGame();
			const cave = place("~/cave", 2);
			game.location = cave;
			game.gold = 100;
			settleDeath(game);

			game.location = cave;
			const result = inspect(game);
			assert.strictEqual(result.tombstones.length, 1);
			assert.strictEqual(result.tombstoneGold, 100);
			assert.strictEqual(result.chest, undefined);
			// the gold plus the tombstone quest reward
			assert.strictEqual(game.gold, 300);
			assert.strictEqual(game.tombstones.isEmpty, true);
		});

		test("digs up every tombstone at once", () => {
			const { game } = createTestGame();
			const cave = place("~/cave", 2);
			game.location = cave;
			game.gold = 100;
			settleDeath(game);
			game.location = cave;
			game.gold = 40;
			settleDeath(game);

			game.location = cave;
			assert.strictEqual(inspect(game).tombstoneGold, 140);
			assert.strictEqual(game.gold, 340);
		});

		test("adds the configured bonus per tombstone", () => {
			const { game } = createTestGame({
				config: createConfig({ rewards: { tombstoneBonus: 25 } }),
			});
			game.location = place("~/cave", 2);
			game.gold = 100;
			settleDeath(game);
			game.location = place("~/cave", 2);
			assert.strictEqual(inspect(game).tombstoneGold, 125);
			assert.strictEqual(game.gold, 325);
		});

		test("finds nothing elsewhere", () => {
			const { game } = createTestGame();
			game.location = place("~/cave", 2);
			game.gold = 100;
			settleDeath(game);
			game.location = place("~/attic", 2);
			assert.deepStrictEqual(inspect(game), { tombstones: [], tombstoneGold: 0 });
			assert.strictEqual(game.tombstones.size, 1);
		});

		test("a far chest can hold the amulet", () => {
			const { game, randomizer } = createTestGame();
			randomizer.chest = true;
			game.location = place("~/a/b/c/d/e/f/g/h", 8);
			const result = inspect(game);
			assert.deepStrictEqual(result.chest, {
				gold: 400,
				items: [
					{ kind: "potion", level: 1 },
					{ kind: "remedy" },
					{ kind: "escape" },
					{ kind: "ring", ring: RING.VOID },
					{ kind: "amulet" },
				],
			});
			assert.strictEqual(game.inventory.count("amulet"), 1);
			// chest gold plus the amulet quest reward
			assert.strictEqual(game.gold, 5400);
		});

		test("a near chest never rolls for the amulet", () => {
			const { game, randomizer } = createTestGame();
			randomizer.chest = true;
			randomizer.ranges = [1, 1, 1, 1];
			game.location = place("~/a/b", 2);
			assert.deepStrictEqual(inspect(game).chest, { gold: 100, items: [] });
			assert.deepStrictEqual(randomizer.ranges, []);
			assert.strictEqual(game.gold, 100);
		});
	});
});
