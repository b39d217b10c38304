import { suite, test } from "node:test";
import assert from "node:assert";
import { NPC } from "../core/encounter.js";
import { InsufficientGoldError, InvalidActionError } from "../core/errors.js";
import { createTestGame } from "../utils/testing.js";
import { LORE, bet, brew, listen } from "./npc.js";

suite("systems/npc.ts", () => {
	suite("gambler", () => {
		test("a zero roll doubles the stake", () => {
			const { game, randomizer } = createTestGame();
			randomizer.ranges = [0];
			game.gold = 100;
			game.startNpcEncounter(NPC.GAMBLER);
			assert.deepStrictEqual(bet(game, 40), { won: true, delta: 40 });
			assert.strictEqual(game.gold, 140);
			assert.strictEqual(game.isIdle, true);
		});

		test("any other roll loses it", () => {
			const { game, randomizer } = createTestGame();
			randomizer.ranges = [1];
			game.gold = 100;
			game.startNpcEncounter(NPC.GAMBLER);
			assert.deepStrictEqual(bet(game, 40), { won: false, delta: -40 });
			assert.strictEqual(game.gold, 60);
		});

		test("the stake must be a number", () => {
			const { game } = createTestGame();
			game.gold = 10;
			game.startNpcEncounter(NPC.GAMBLER);
			assert.throws(() => bet(game, Number.NaN), InvalidActionError);
			assert.throws(() => bet(game, Number.POSITIVE_INFINITY), InvalidActionError);
			assert.strictEqual(game.gold, 10);
			assert.strictEqual(game.encounter.state, "in-npc-encounter");
		});

		test("cannot bet more than the purse", () => {
			const { game } = createTestGame();
			game.gold = 10;
			game.startNpcEncounter(NPC.GAMBLER);
			assert.throws(() => bet(game, 11), InsufficientGoldError);
			assert.strictEqual(game.gold, 10);
			assert.strictEqual(game.encounter.state, "in-npc-encounter");
		});
	});

	test("the witch brews a potion of the hero's level", () => {
		const { game } = createTestGame();
		game.player.addExperience(30);
		game.startNpcEncounter(NPC.WITCH);
		assert.deepStrictEqual(brew(game), { kind: "potion", level: 2 });
		assert.deepStrictEqual(game.inventory.list(), [{ kind: "potion", level: 2 }]);
		assert.strictEqual(game.isIdle, true);
	});

	test("the ghostly maiden tells one of three tales", () => {
		const { game, randomizer } = createTestGame();
		randomizer.ranges = [2];
		game.startNpcEncounter(NPC.GHOSTLY_MAIDEN);
		assert.strictEqual(
			listen(game),
			"She warns of a powerful dragon that guards the mountain pass."
		);
		assert.strictEqual(LORE.length, 3);
		assert.strictEqual(game.isIdle, true);
	});

	test("the wrong verb changes nothing", () => {
		const { game } = createTestGame();
		game.gold = 50;
		game.startNpcEncounter(NPC.WITCH);
		assert.throws(() => bet(game, 10), InvalidActionError);
		assert.throws(() => listen(game), InvalidActionError);
		assert.strictEqual(game.gold, 50);
		assert.deepStrictEqual(game.encounter, { state: "in-npc-encounter", npc: NPC.WITCH });
	});

	test("no NPC, no verb", () => {
		const { game } = createTestGame();
		assert.throws(() => brew(game), {
			name: "InvalidActionError",
			message: "There is no witch here.",
		});
	});
});
