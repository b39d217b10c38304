import { suite, test } from "node:test";
import assert from "node:assert";
import { CATEGORY } from "../core/class.js";
import { GameEvent } from "../core/event.js";
import { GUARDIAN_QUEST, createQuest } from "../core/quest.js";
import { QuestBook } from "./quests.js";

function won(name: string, category = CATEGORY.COMMON): GameEvent {
	return {
		type: "battle-won",
		enemy: { name, category, level: 1 },
		location: "~/a",
		xp: 10,
		gold: 10,
		levelsUp: 0,
	};
}

suite("systems/quests.ts", () => {
	test("a new book has every quest open", () => {
		const book = new QuestBook();
		assert.strictEqual(book.todo().length, 9);
		assert.deepStrictEqual(book.done(), []);
		assert.deepStrictEqual(book.list()[0], {
			description: "Win a battle.",
			completed: false,
			reward: 100,
		});
	});

	test("one event can complete several quests, in list order", () => {
		const book = new QuestBook();
		const completed = book.dispatch(won("shadow", CATEGORY.RARE));
		assert.deepStrictEqual(
			completed.map((quest) => quest.reward),
			[100, 1000]
		);
		assert.deepStrictEqual(
			book.done().map((entry) => entry.description),
			["Win a battle.", "Defeat the shadow."]
		);
	});

	test("completed quests stay completed and are not reported again", () => {
		const book = new QuestBook();
		book.dispatch({ type: "skill-learned", skill: "fireball" });
		assert.deepStrictEqual(book.dispatch({ type: "skill-learned", skill: "heal" }), []);
		assert.strictEqual(book.isOpen("Learn a skill."), false);
		assert.deepStrictEqual(
			book.done().map((entry) => entry.description),
			["Learn a skill."]
		);
	});

	test("win ten battles counts every victory", () => {
		const book = new QuestBook();
		for (let i = 0; i < 9; i++) book.dispatch(won("rat"));
		assert.strictEqual(book.isOpen("Win 10 battles."), true);
		assert.deepStrictEqual(book.serialize()[5].goal, {
			kind: "win-battles",
			target: 10,
			won: 9,
		});
		assert.deepStrictEqual(
			book.dispatch(won("rat")).map((quest) => quest.reward),
			[500]
		);
	});

	test("reaching a level completes at or past the threshold", () => {
		const book = new QuestBook();
		book.dispatch({ type: "level-up", level: 4 });
		assert.strictEqual(book.isOpen("Reach level 5."), true);
		book.dispatch({ type: "level-up", level: 6 });
		assert.strictEqual(book.isOpen("Reach level 5."), false);
	});

	test("the guardian quest gates the boss", () => {
		const book = new QuestBook();
		assert.strictEqual(book.isOpen(GUARDIAN_QUEST), true);
		book.dispatch(won("guardian", CATEGORY.BOSS));
		assert.strictEqual(book.isOpen(GUARDIAN_QUEST), false);
	});

	test("only the amulet completes the amulet quest", () => {
		const book = new QuestBook();
		assert.deepStrictEqual(
			book.dispatch({ type: "item-added", item: "potion", key: "potion" }),
			[]
		);
		assert.strictEqual(
			book.dispatch({ type: "item-added", item: "amulet", key: "amulet" })[0].reward,
			5000
		);
	});

	test("completed quests are handed out as copies", () => {
		const book = new QuestBook();
		const [quest] = book.dispatch(won("rat"));
		quest.completed = false;
		quest.reward = 0;
		assert.strictEqual(book.isOpen("Win a battle."), false);
		assert.deepStrictEqual(book.dispatch(won("rat")), []);
		assert.strictEqual(book.done()[0].reward, 100);
	});

	test("unknown descriptions are never open", () => {
		assert.strictEqual(new QuestBook().isOpen("Slay the dragon."), false);
	});

	test("serialize copies the progress", () => {
		const book = new QuestBook([createQuest({ kind: "win-battles", target: 2, won: 0 }, 50)]);
		book.dispatch(won("rat"));
		const saved = book.serialize();
		assert.deepStrictEqual(saved, [
			{ goal: { kind: "win-battles", target: 2, won: 1 }, reward: 50, completed: false },
		]);

		const restored = new QuestBook(saved);
		restored.dispatch(won("rat"));
		assert.strictEqual(restored.done().length, 1);
		assert.deepStrictEqual(saved[0].goal, { kind: "win-battles", target: 2, won: 1 });
		assert.strictEqual(book.done().length, 0);
	});
});
