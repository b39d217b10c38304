import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CATEGORY } from "../core/class.js";
import { STATUS_EFFECT } from "../core/effect.js";
import { ClassCatalog } from "../registry/class.js";
import { CLASSES_PATH, loadClasses, parseClasses } from "./class.js";

suite("package/class.ts", () => {
	suite("parseClasses", () => {
		test("accepts lists and mappings for curves", () => {
			const [snake] = parseClasses(
				[
					"classes:",
					"  - name: Snake",
					"    category: COMMON",
					"    health: [18, 6]",
					"    strength: { base: 6, growth: 2 }",
					"    speed: [14, 2]",
					"    inflicts: { effect: poison, odds: 5 }",
				].join("\n")
			);
			assert.deepStrictEqual(snake, {
				name: "snake",
				category: CATEGORY.COMMON,
				health: { base: 18, growth: 6 },
				strength: { base: 6, growth: 2 },
				speed: { base: 14, growth: 2 },
				mana: { base: 0, growth: 0 },
				inflicts: { effect: STATUS_EFFECT.POISON, odds: 5 },
			});
		});

		test("skips entries without a name or with an unknown category", () => {
			const parsed = parseClasses(
				[
					"classes:",
					"  - category: common",
					"  - name: dragon",
					"    category: mythic",
					"  - name: bat",
					"    category: common",
					"  - just a string",
				].join("\n")
			);
			assert.deepStrictEqual(
				parsed.map((cls) => cls.name),
				["bat"]
			);
		});

		test("clamps negative growth and drops unknown effects", () => {
			const [ghoul] = parseClasses(
				[
					"classes:",
					"  - name: ghoul",
					"    category: rare",
					"    health: [40, -3]",
					"    inflicts: { effect: frost, odds: 3 }",
				].join("\n")
			);
			assert.deepStrictEqual(ghoul.health, { base: 40, growth: 0 });
			assert.strictEqual(ghoul.inflicts, undefined);
		});

		test("a document without a class list yields nothing", () => {
			assert.deepStrictEqual(parseClasses("name: nothing"), []);
			assert.deepStrictEqual(parseClasses(""), []);
		});
	});

	suite("loadClasses", () => {
		let dir: string;

		before(async () => {
			dir = await mkdtemp(join(tmpdir(), "dirquest-classes-"));
		});

		after(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		test("registers every parsed class", async () => {
			const path = join(dir, "classes.yaml");
			await writeFile(
				path,
				[
					"classes:",
					"  - name: knight",
					"    category: player",
					"    health: [60, 12]",
					"  - name: slime",
					"    category: common",
					"    health: [8, 2]",
				].join("\n"),
				"utf-8"
			);
			const catalog = new ClassCatalog();
			assert.strictEqual(await loadClasses(catalog, path), 2);
			assert.strictEqual(catalog.playerFirst().name, "knight");
			assert.deepStrictEqual(
				catalog.enemies().map((cls) => cls.name),
				["slime"]
			);
		});

		test("the bundled catalog has players, enemies and the guardian", async () => {
			const catalog = new ClassCatalog();
			await loadClasses(catalog, CLASSES_PATH);
			assert.strictEqual(catalog.playerFirst().name, "warrior");
			assert.ok(catalog.enemies().length > 0);
			assert.strictEqual(catalog.get("guardian")?.category, CATEGORY.BOSS);
		});

		test("a missing file rejects", async () => {
			await assert.rejects(loadClasses(new ClassCatalog(), join(dir, "missing.yaml")));
		});
	});
});
