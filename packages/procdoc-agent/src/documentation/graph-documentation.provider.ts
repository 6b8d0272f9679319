import { Logger } from '@nestjs/common';
import { NavigationDirection, getTextContent } from '@procdoc/shared';
import { Task, TurnRecord } from '../agent/agent.types';
import { DocumentationLoadError } from '../common/procdoc.errors';
import { formatContext } from './context-formatter';
import {
  ContextBlock,
  DocumentationProvider,
  GraphDocumentation,
  GraphQueryResult,
  NavigationResult,
  ProcessNavigator,
  ProcessStep,
} from './documentation.types';
import { GraphClient, GraphRow } from './neo4j.service';
import {
  CURRENT_STEP_QUERY,
  FIRST_STEP_QUERY,
  FULL_SCOPE_QUERY,
  NEXT_STEP_QUERY,
  PREVIOUS_STEP_QUERY,
  WINDOW_SCOPE_QUERY,
  buildTaskScopeQuery,
} from './process-graph.queries';

const STOP_WORDS = new Set([
  'about',
  'after',
  'again',
  'also',
  'before',
  'each',
  'from',
  'have',
  'into',
  'just',
  'make',
  'more',
  'must',
  'only',
  'please',
  'should',
  'some',
  'than',
  'that',
  'their',
  'them',
  'then',
  'there',
  'these',
  'this',
  'under',
  'until',
  'using',
  'want',
  'what',
  'when',
  'where',
  'which',
  'while',
  'will',
  'with',
  'would',
  'your',
]);

export const NAVIGATION_MESSAGES = {
  empty: 'The process graph contains no steps.',
  next: 'There is no next step. Go back to the last step.',
  prev: 'There is no previous step. Go back to the last step.',
  curr: 'The current step no longer exists in the process graph.',
} as const;

/**
 * Lower-cased words of at least four letters, stop-words removed, in order
 * of first appearance.
 */
export function extractTaskKeywords(text: string): string[] {
  const words = text.toLowerCase().match(/\p{L}{4,}/gu) ?? [];
  return [...new Set(words)].filter((word) => !STOP_WORDS.has(word));
}

function readString(row: GraphRow, key: string): string | null {
  const value = row[key];
  if (typeof value === 'string') {
    return value;
  }
  return typeof value === 'number' ? String(value) : null;
}

export function toProcessStep(row: GraphRow, position: number): ProcessStep {
  const id = readString(row, 'id');
  if (id === null) {
    throw new DocumentationLoadError(
      `Process graph returned a step without an id (row ${position})`,
    );
  }
  const seq = row.seq;
  const next = Array.isArray(row.next) ? row.next : [];
  return {
    id,
    description: readString(row, 'description') ?? '',
    seq: typeof seq === 'number' ? seq : position,
    next: next.flatMap((value: unknown) =>
      typeof value === 'string' || typeof value === 'number'
        ? [String(value)]
        : [],
    ),
  };
}

export class GraphDocumentationProvider
  implements DocumentationProvider, ProcessNavigator
{
  readonly kind = 'graph';
  private readonly logger = new Logger(GraphDocumentationProvider.name);
  private cursor: string | null = null;
  private cached: ContextBlock | null = null;
  private cursorMoved = false;

  constructor(
    private readonly client: GraphClient,
    private readonly source: GraphDocumentation,
  ) {}

  /** Navigation moves the cursor mid-run, so its context is checked every turn. */
  get refreshesPerTurn(): boolean {
    const { requery, navigation } = this.source.retrieval;
    return requery || navigation;
  }

  get navigator(): ProcessNavigator | null {
    return this.source.retrieval.navigation ? this : null;
  }

  get currentStep(): string | null {
    return this.cursor;
  }

  /** Places the cursor on the first step of the process. */
  async initializeCursor(): Promise<void> {
    const [first] = await this.client.read(FIRST_STEP_QUERY, {
      process: this.source.process,
    });
    this.cursor = first ? readString(first, 'id') : null;
    this.logger.log(
      this.cursor === null
        ? 'Process graph is empty, navigation has no starting step'
        : `Navigation cursor starts at step ${this.cursor}`,
    );
  }

  async query(
    task: Task,
    history: readonly TurnRecord[],
  ): Promise<GraphQueryResult> {
    const { scope, hops } = this.source.retrieval;
    const process = this.source.process;
    let rows: GraphRow[];

    switch (scope) {
      case 'full':
        rows = await this.client.read(FULL_SCOPE_QUERY, { process });
        break;
      case 'task': {
        // The latest model remarks sharpen the match once the run is underway
        const latest = history[history.length - 1];
        const keywords = extractTaskKeywords(
          latest ? `${task.text}\n${getTextContent(latest.response)}` : task.text,
        );
        rows =
          keywords.length === 0
            ? []
            : await this.client.read(buildTaskScopeQuery(hops), {
                process,
                keywords,
              });
        break;
      }
      case 'window':
        rows =
          this.cursor === null
            ? []
            : await this.client.read(WINDOW_SCOPE_QUERY, {
                process,
                cursor: this.cursor,
              });
        break;
    }

    const steps = rows.map(toProcessStep);
    this.logger.debug(`Graph query (${scope}) returned ${steps.length} steps`);
    return { kind: 'graph-query', scope, steps, cursor: this.cursor };
  }

  async groundingContext(
    task: Task,
    history: readonly TurnRecord[],
  ): Promise<ContextBlock> {
    if (this.cached && !this.source.retrieval.requery && !this.cursorMoved) {
      return this.cached;
    }
    this.cursorMoved = false;
    const block = formatContext(await this.query(task, history));
    if (this.cached && this.cached.text !== block.text) {
      this.logger.log('Process documentation context changed');
    }
    if (!this.cached || this.cached.text !== block.text) {
      this.cached = block;
    }
    return this.cached;
  }

  async navigate(direction: NavigationDirection): Promise<NavigationResult> {
    if (this.cursor === null) {
      return { stepId: null, text: NAVIGATION_MESSAGES.empty };
    }

    const query =
      direction === 'next'
        ? NEXT_STEP_QUERY
        : direction === 'prev'
          ? PREVIOUS_STEP_QUERY
          : CURRENT_STEP_QUERY;
    const [row] = await this.client.read(query, {
      process: this.source.process,
      cursor: this.cursor,
    });
    const id = row ? readString(row, 'id') : null;

    if (!row || id === null) {
      this.logger.log(`Navigation ${direction} found no step from ${this.cursor}`);
      return { stepId: null, text: NAVIGATION_MESSAGES[direction] };
    }

    if (id !== this.cursor) {
      this.cursor = id;
      this.cursorMoved = true;
    }
    this.logger.log(`Navigation ${direction} moved the cursor to step ${id}`);
    return {
      stepId: id,
      text: `Step ${id}: ${readString(row, 'description') ?? ''}`.trimEnd(),
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
