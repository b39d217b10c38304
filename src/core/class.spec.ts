import { suite, test } from "node:test";
import assert from "node:assert";
import {
	BaseClassDefinition,
	CATEGORY,
	deriveClass,
	familyName,
	freezeClass,
	isCategory,
	statAt,
	tierFactor,
	tierRequirement,
} from "./class.js";
import { STATUS_EFFECT } from "./effect.js";

const WARRIOR: BaseClassDefinition = {
	name: "warrior",
	category: CATEGORY.PLAYER,
	health: { base: 50, growth: 10 },
	strength: { base: 12, growth: 3 },
	speed: { base: 10, growth: 2 },
	mana: { base: 0, growth: 0 },
};

suite("core/class.ts", () => {
	test("statAt grows linearly from level 1", () => {
		assert.strictEqual(statAt({ base: 50, growth: 10 }, 1), 50);
		assert.strictEqual(statAt({ base: 50, growth: 10 }, 3), 70);
		assert.strictEqual(statAt({ base: 50, growth: 10 }, 0), 50);
	});

	test("freezeClass floors and clamps curves", () => {
		const frozen = freezeClass({
			...WARRIOR,
			health: { base: 10.7, growth: -2 },
		});
		assert.deepStrictEqual(frozen.health, { base: 10, growth: 0 });
		assert.ok(Object.isFrozen(frozen));
		assert.ok(Object.isFrozen(frozen.health));
		assert.strictEqual(frozen.inflicts, undefined);
	});

	test("deriveClass scales base values and keeps growth", () => {
		const source = freezeClass(WARRIOR);
		const doubled = deriveClass(source, {
			name: "gorthaur",
			category: CATEGORY.LEGENDARY,
			scale: { health: 2, strength: 2 },
		});
		assert.strictEqual(doubled.name, "gorthaur");
		assert.strictEqual(doubled.category, CATEGORY.LEGENDARY);
		assert.deepStrictEqual(doubled.health, { base: 100, growth: 10 });
		assert.deepStrictEqual(doubled.strength, { base: 24, growth: 3 });
		assert.deepStrictEqual(doubled.speed, { base: 10, growth: 2 });
		// the source is untouched
		assert.strictEqual(source.health.base, 50);
		assert.strictEqual(source.name, "warrior");
	});

	test("deriveClass halves with floor", () => {
		const halved = deriveClass(freezeClass({ ...WARRIOR, strength: { base: 13, growth: 3 } }), {
			scale: { health: 0.5, strength: 0.5, speed: 0.5 },
		});
		assert.strictEqual(halved.health.base, 25);
		assert.strictEqual(halved.strength.base, 6);
		assert.strictEqual(halved.speed.base, 5);
	});

	test("deriveClass keeps status inflictions", () => {
		const snake = freezeClass({
			...WARRIOR,
			name: "snake",
			category: CATEGORY.COMMON,
			inflicts: { effect: STATUS_EFFECT.POISON, odds: 5 },
		});
		assert.deepStrictEqual(deriveClass(snake).inflicts, {
			effect: STATUS_EFFECT.POISON,
			odds: 5,
		});
	});

	test("tier requirements and factors", () => {
		assert.strictEqual(tierRequirement(CATEGORY.COMMON), 1);
		assert.strictEqual(tierRequirement(CATEGORY.RARE), 5);
		assert.strictEqual(tierRequirement(CATEGORY.LEGENDARY), 10);
		assert.strictEqual(tierFactor(CATEGORY.COMMON), 1);
		assert.strictEqual(tierFactor(CATEGORY.RARE), 2);
		assert.strictEqual(tierFactor(CATEGORY.LEGENDARY), 5);
		assert.strictEqual(tierFactor(CATEGORY.BOSS), 5);
		assert.strictEqual(tierFactor(CATEGORY.PLAYER), 1);
	});

	test("familyName is the first word", () => {
		assert.strictEqual(familyName(freezeClass({ ...WARRIOR, name: "orc captain" })), "orc");
		assert.strictEqual(familyName(freezeClass(WARRIOR)), "warrior");
	});

	test("isCategory", () => {
		assert.strictEqual(isCategory("rare"), true);
		assert.strictEqual(isCategory("epic"), false);
		assert.strictEqual(isCategory(3), false);
	});
});
