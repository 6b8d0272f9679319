import {
  ConversationMessage,
  ImageContentBlock,
  MessageContentBlock,
  TextContentBlock,
  createImageBlock,
  createTextBlock,
  createToolResultBlock,
} from '@procdoc/shared';
import { Observation, Task, TurnRecord } from './agent.types';

export const ONE_ACTION_PER_TURN =
  'Ignored: only the first tool call of a response is executed. Issue one action per turn.';

export function describeObservation(observation: Observation): string {
  return `Screenshot after turn ${observation.turnIndex}. Cursor at (${observation.cursor.x}, ${observation.cursor.y}).`;
}

/**
 * The run's append-only turn log. It also renders the transcript sent to the
 * model, where only the most recent screenshots keep their image.
 */
export class ConversationHistory {
  private initial: Observation | null = null;
  private readonly records: TurnRecord[] = [];

  recordInitialObservation(observation: Observation): void {
    if (this.initial) {
      throw new Error('The initial observation is already recorded');
    }
    this.initial = observation;
  }

  append(record: TurnRecord): void {
    const expected = this.records.length + 1;
    if (record.turnIndex !== expected) {
      throw new Error(
        `Turn ${record.turnIndex} cannot follow turn ${expected - 1}`,
      );
    }
    if (!this.initial) {
      throw new Error('A turn cannot be recorded before the first observation');
    }
    this.records.push(record);
  }

  get turns(): readonly TurnRecord[] {
    return [...this.records];
  }

  get length(): number {
    return this.records.length;
  }

  latestObservation(): Observation | null {
    const last = this.records[this.records.length - 1];
    return last ? last.observation : this.initial;
  }

  toMessages(task: Task, recentScreenshots: number): ConversationMessage[] {
    if (!this.initial) {
      throw new Error('No observation recorded yet');
    }

    // Observation 0 is the initial screenshot, observation i follows turn i
    const total = this.records.length + 1;
    const keepFrom = total - Math.max(recentScreenshots, 1);
    const render = (
      observation: Observation,
      position: number,
    ): (TextContentBlock | ImageContentBlock)[] =>
      position >= keepFrom
        ? [
            createImageBlock(observation.screenshot),
            createTextBlock(describeObservation(observation)),
          ]
        : [
            createTextBlock(
              `[Screenshot from turn ${observation.turnIndex} omitted] ${describeObservation(observation)}`,
            ),
          ];

    const messages: ConversationMessage[] = [
      {
        role: 'user',
        content: [createTextBlock(task.text), ...render(this.initial, 0)],
      },
    ];

    this.records.forEach((record, index) => {
      messages.push({ role: 'assistant', content: record.response });
      if (!record.toolUseId) {
        return;
      }
      const content: MessageContentBlock[] = [
        createToolResultBlock(record.toolUseId, [
          createTextBlock(record.resultText),
          ...render(record.observation, index + 1),
        ]),
        ...record.ignoredToolUseIds.map((id) =>
          createToolResultBlock(id, [createTextBlock(ONE_ACTION_PER_TURN)], true),
        ),
      ];
      messages.push({ role: 'user', content });
    });

    return messages;
  }
}
