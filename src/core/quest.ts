/**
 * Quests and how each kind reacts to gameplay events.
 *
 * Quest kinds form a closed union matched exhaustively in `advanceQuest`.
 * The description doubles as the quest's identity key, and completion is
 * permanent: once a quest is completed no event can reopen it.
 *
 * @module core/quest
 */
import { GameEvent } from "./event.js";

export type QuestGoal =
	| { kind: "win-battles"; target: number; won: number }
	| { kind: "beat-enemy"; enemy: string }
	| { kind: "reach-level"; level: number }
	| { kind: "visit-tombstone" }
	| { kind: "defeat-guardian" }
	| { kind: "find-amulet" }
	| { kind: "bribe-enemy" }
	| { kind: "learn-skill" };

export interface Quest {
	goal: QuestGoal;
	/** Gold credited when the quest completes */
	reward: number;
	completed: boolean;
}

export const GUARDIAN_CLASS = "guardian";
export const GUARDIAN_QUEST = "Defeat the Guardian.";

export function describeQuest(goal: QuestGoal): string {
	switch (goal.kind) {
		case "win-battles":
			return goal.target === 1 ? "Win a battle." : `Win ${goal.target} battles.`;
		case "beat-enemy":
			return `Defeat the ${goal.enemy}.`;
		case "reach-level":
			return `Reach level ${goal.level}.`;
		case "visit-tombstone":
			return "Visit the tombstone of a fallen hero.";
		case "defeat-guardian":
			return GUARDIAN_QUEST;
		case "find-amulet":
			return "Find the Amulet of Power.";
		case "bribe-enemy":
			return "Bribe an enemy.";
		case "learn-skill":
			return "Learn a skill.";
	}
}

function goalReached(goal: QuestGoal, event: GameEvent): boolean {
	switch (goal.kind) {
		case "win-battles":
			if (event.type === "battle-won") goal.won += 1;
			return goal.won >= goal.target;
		case "beat-enemy":
			return event.type === "battle-won" && event.enemy.name === goal.enemy;
		case "reach-level":
			return event.type === "level-up" && event.level >= goal.level;
		case "visit-tombstone":
			return event.type === "tombstone-found";
		case "defeat-guardian":
			return event.type === "battle-won" && event.enemy.name === GUARDIAN_CLASS;
		case "find-amulet":
			return event.type === "item-added" && event.item === "amulet";
		case "bribe-enemy":
			return event.type === "enemy-bribed";
		case "learn-skill":
			return event.type === "skill-learned";
	}
}

/**
 * Feed one event to a quest.
 * @returns Whether the quest is complete after the event
 */
export function advanceQuest(quest: Quest, event: GameEvent): boolean {
	if (quest.completed) return true;
	if (goalReached(quest.goal, event)) quest.completed = true;
	return quest.completed;
}

export function createQuest(goal: QuestGoal, reward: number): Quest {
	return { goal: { ...goal }, reward, completed: false };
}

/** The quest list every new game starts with. */
export function createInitialQuests(): Quest[] {
	return [
		createQuest({ kind: "win-battles", target: 1, won: 0 }, 100),
		createQuest({ kind: "learn-skill" }, 100),
		createQuest({ kind: "bribe-enemy" }, 100),
		createQuest({ kind: "visit-tombstone" }, 200),
		createQuest({ kind: "reach-level", level: 5 }, 500),
		createQuest({ kind: "win-battles", target: 10, won: 0 }, 500),
		createQuest({ kind: "beat-enemy", enemy: "shadow" }, 1000),
		createQuest({ kind: "defeat-guardian" }, 2000),
		createQuest({ kind: "find-amulet" }, 5000),
	];
}
