import { suite, test } from "node:test";
import assert from "node:assert";
import { Character } from "../core/character.js";
import { STATUS_EFFECT, tickDamage } from "../core/effect.js";
import { CharacterDeadError } from "../core/errors.js";
import { createTestCatalog, createTestGame, place } from "../utils/testing.js";
import { applyStatusTick, tickHero } from "./effects.js";

function hero(level = 1): Character {
	return new Character({ class: createTestCatalog().playerFirst(), level });
}

suite("systems/effects.ts", () => {
	test("burn takes a twentieth, poison a tenth", () => {
		assert.strictEqual(tickDamage(STATUS_EFFECT.BURN, 100), 5);
		assert.strictEqual(tickDamage(STATUS_EFFECT.POISON, 100), 10);
		assert.strictEqual(tickDamage(STATUS_EFFECT.BURN, 10), 1);
	});

	test("no effect, no damage", () => {
		const character = hero();
		assert.strictEqual(applyStatusTick(character), 0);
		assert.strictEqual(character.health, 50);
	});

	test("a tick hurts and the effect persists", () => {
		const character = hero(6);
		character.inflict(STATUS_EFFECT.POISON);
		assert.strictEqual(applyStatusTick(character), 10);
		assert.strictEqual(applyStatusTick(character), 10);
		assert.strictEqual(character.health, 80);
		assert.strictEqual(character.statusEffect, STATUS_EFFECT.POISON);
	});

	test("a lethal tick buries the hero", () => {
		const { game } = createTestGame();
		game.location = place("~/swamp", 4);
		game.gold = 30;
		game.player.inflict(STATUS_EFFECT.BURN);
		game.player.takeDamage(48);
		assert.throws(() => tickHero(game), CharacterDeadError);
		assert.strictEqual(game.player.statusEffect, undefined);
		assert.strictEqual(game.player.health, 50);
		assert.deepStrictEqual(game.tombstones.at("~/swamp"), [
			{ location: "~/swamp", gold: 30, hero: "warrior", level: 1 },
		]);
	});
});
