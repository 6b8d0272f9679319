import { Injectable, Logger } from '@nestjs/common';
import { isTerminateAction } from '@procdoc/shared';
import { promises as fs } from 'fs';
import {
  ProcdocError,
  TaskLoadError,
  UnparseableResponseError,
  describeError,
} from '../common/procdoc.errors';
import { DocumentationService } from '../documentation/documentation.service';
import {
  DocumentationDescriptor,
  DocumentationProvider,
} from '../documentation/documentation.types';
import {
  AgentState,
  RunResult,
  RunStatus,
  Task,
  TurnSettings,
} from './agent.types';
import {
  RunSession,
  TurnDecision,
  TurnProtocolEngine,
} from './turn-protocol.engine';

export interface RunOptions {
  taskFile: string;
  documentation: DocumentationDescriptor;
  settings: TurnSettings;
}

export async function loadTask(taskFile: string): Promise<Task> {
  let content: string;
  try {
    content = await fs.readFile(taskFile, 'utf8');
  } catch (error) {
    throw new TaskLoadError(
      `Cannot read task file ${taskFile}: ${describeError(error)}`,
      { cause: error },
    );
  }
  const text = content.trim();
  if (!text) {
    throw new TaskLoadError(`Task file ${taskFile} is empty`);
  }
  return { text, sourcePath: taskFile };
}

/**
 * Runs the state machine Init → AwaitingModel ⇄ Executing → Terminated.
 * Known failures become a Failed result; anything else propagates, as does a
 * task file that cannot be loaded, which is an input error.
 */
@Injectable()
export class AgentLoopDriver {
  private readonly logger = new Logger(AgentLoopDriver.name);

  constructor(
    private readonly documentationService: DocumentationService,
    private readonly engine: TurnProtocolEngine,
  ) {}

  async run(options: RunOptions): Promise<RunResult> {
    const task = await loadTask(options.taskFile);
    let state: AgentState = AgentState.Init;
    let provider: DocumentationProvider | null = null;
    let session: RunSession | null = null;

    try {
      const source = await this.documentationService.load(
        options.documentation,
      );
      provider = await this.documentationService.open(source);
      session = await this.engine.startSession(
        task,
        provider,
        options.settings,
      );
      state = this.transition(state, AgentState.AwaitingModel);

      let decision: TurnDecision | null = null;
      for (;;) {
        if (state === AgentState.AwaitingModel) {
          if (session.turnCount >= options.settings.maxSteps) {
            this.transition(state, AgentState.Terminated);
            return this.finish(session, RunStatus.MaxStepsExceeded, null);
          }

          decision = await this.engine.requestDecision(session);
          const { action } = decision.parsed;
          if (isTerminateAction(action)) {
            await this.engine.complete(session, decision, action);
            this.transition(state, AgentState.Terminated);
            return this.finish(session, RunStatus.Completed, null);
          }
          state = this.transition(state, AgentState.Executing);
          continue;
        }

        if (!decision) {
          throw new Error('Executing without a model decision');
        }
        const { action } = decision.parsed;
        if (isTerminateAction(action)) {
          throw new Error('A completion cannot be executed');
        }
        await this.engine.execute(session, decision, action);
        decision = null;
        state = this.transition(state, AgentState.AwaitingModel);
      }
    } catch (error) {
      const turn = session ? session.turnCount : 0;
      if (error instanceof ProcdocError) {
        const detail =
          error instanceof UnparseableResponseError ? ` (${error.detail})` : '';
        this.logger.error(`Run failed on turn ${turn}: ${error.message}${detail}`);
        return this.finish(session, RunStatus.Failed, error.message);
      }
      this.logger.error(
        `Run aborted on turn ${turn} by an unrecovered error: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    } finally {
      if (provider) {
        await provider.close();
      }
    }
  }

  private transition(from: AgentState, to: AgentState): AgentState {
    this.logger.debug(`State ${from} -> ${to}`);
    return to;
  }

  private finish(
    session: RunSession | null,
    status: RunStatus,
    reason: string | null,
  ): RunResult {
    const result: RunResult = {
      status,
      reason,
      turnCount: session ? session.turnCount : 0,
      actionCount: session ? session.actionCount : 0,
      finalObservation: session ? session.history.latestObservation() : null,
      history: session ? session.history.turns : [],
    };
    this.logger.log(
      `Run finished: ${status}${reason ? ` (${reason})` : ''} after ${result.turnCount} turns and ${result.actionCount} computer actions`,
    );
    return result;
  }
}
