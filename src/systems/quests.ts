/**
 * Quest event bus.
 *
 * The quest book owns the game's quest list and delivers each event to
 * every open quest in list order. Completed quests are never visited again.
 * Beyond the list itself the book keeps no state between events.
 *
 * @module systems/quests
 */
import logger from "../logger.js";
import { GameEvent } from "../core/event.js";
import {
	Quest,
	advanceQuest,
	createInitialQuests,
	describeQuest,
} from "../core/quest.js";

export interface QuestEntry {
	description: string;
	completed: boolean;
	reward: number;
}

function copyQuest(quest: Quest): Quest {
	return { ...quest, goal: { ...quest.goal } };
}

export class QuestBook {
	private readonly quests: Quest[];

	constructor(quests: ReadonlyArray<Quest> = createInitialQuests()) {
		this.quests = quests.map(copyQuest);
	}

	/**
	 * Deliver an event to every open quest.
	 * @returns Copies of the quests this event completed, in list order
	 */
	dispatch(event: GameEvent): Quest[] {
		const completed: Quest[] = [];
		for (const quest of this.quests) {
			if (quest.completed) continue;
			if (advanceQuest(quest, event)) {
				completed.push(copyQuest(quest));
				logger.info(`Quest completed: ${describeQuest(quest.goal)}`, {
					event: event.type,
					reward: quest.reward,
				});
			}
		}
		return completed;
	}

	/**
	 * Whether a quest with this description exists and is not yet completed.
	 */
	isOpen(description: string): boolean {
		return this.quests.some(
			(quest) => !quest.completed && describeQuest(quest.goal) === description
		);
	}

	list(): QuestEntry[] {
		return this.quests.map((quest) => ({
			description: describeQuest(quest.goal),
			completed: quest.completed,
			reward: quest.reward,
		}));
	}

	todo(): QuestEntry[] {
		return this.list().filter((entry) => !entry.completed);
	}

	done(): QuestEntry[] {
		return this.list().filter((entry) => entry.completed);
	}

	/** Deep copy of the quest list. */
	serialize(): Quest[] {
		return this.quests.map(copyQuest);
	}
}
