import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ComputerAction,
  NavigateDocumentationAction,
  TerminateAction,
  describeAction,
  isNavigateDocumentationAction,
} from '@procdoc/shared';
import { AgentConfig, agentConfig } from '../config/agent.config';
import {
  ContextBlock,
  DocumentationProvider,
} from '../documentation/documentation.types';
import { buildAgentSystemPrompt } from './agent.constants';
import { buildAgentTools } from './agent.tools';
import {
  AGENT_MODEL_SERVICE,
  AgentModelService,
  COMPUTER_ACTION_EXECUTOR,
  ComputerActionExecutor,
  ModelRequest,
  ModelResponse,
  Observation,
  Task,
  TurnRecord,
  TurnSettings,
} from './agent.types';
import { ConversationHistory } from './conversation-history';
import { ParsedResponse, parseModelResponse } from './tool-call.parser';

/** Everything one run owns. The engine mutates it; nothing else does. */
export interface RunSession {
  readonly task: Task;
  readonly documentation: DocumentationProvider;
  readonly history: ConversationHistory;
  readonly settings: TurnSettings;
  context: ContextBlock;
  turnCount: number;
  actionCount: number;
}

export interface TurnDecision {
  turnIndex: number;
  response: ModelResponse;
  parsed: ParsedResponse;
}

@Injectable()
export class TurnProtocolEngine {
  private readonly logger = new Logger(TurnProtocolEngine.name);

  constructor(
    @Inject(AGENT_MODEL_SERVICE)
    private readonly modelService: AgentModelService,
    @Inject(COMPUTER_ACTION_EXECUTOR)
    private readonly executor: ComputerActionExecutor,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  /**
   * Builds the first context block, checks the display and records the
   * initial screenshot as observation 0.
   */
  async startSession(
    task: Task,
    documentation: DocumentationProvider,
    settings: TurnSettings,
  ): Promise<RunSession> {
    const history = new ConversationHistory();
    const context = await documentation.groundingContext(task, history.turns);
    await this.executor.verifyDisplay();
    history.recordInitialObservation(await this.executor.capture(0));

    this.logger.log(
      `Session started: ${documentation.kind} documentation, ${context.text.length} context characters, at most ${settings.maxSteps} turns`,
    );
    return {
      task,
      documentation,
      history,
      settings,
      context,
      turnCount: 0,
      actionCount: 0,
    };
  }

  buildRequest(session: RunSession): ModelRequest {
    const navigation = session.documentation.navigator !== null;
    return {
      model: session.settings.model,
      maxTokens: session.settings.maxTokens,
      systemPrompt: buildAgentSystemPrompt({
        currentDate: new Date().toISOString().slice(0, 10),
        display: this.config.display,
        documentation:
          session.context.source === 'none' ? null : session.context,
        navigation,
      }),
      messages: session.history.toMessages(
        session.task,
        this.config.recentScreenshots,
      ),
      tools: buildAgentTools({ display: this.config.display, navigation }),
    };
  }

  /** One model call. The turn counts as soon as the request goes out. */
  async requestDecision(session: RunSession): Promise<TurnDecision> {
    const turnIndex = session.turnCount + 1;

    if (session.documentation.refreshesPerTurn) {
      const context = await session.documentation.groundingContext(
        session.task,
        session.history.turns,
      );
      if (context.text !== session.context.text) {
        session.context = context;
      }
    }

    const request = this.buildRequest(session);
    session.turnCount = turnIndex;
    this.logger.log(
      `=== Turn ${turnIndex}/${session.settings.maxSteps} (${session.actionCount} computer actions) ===`,
    );

    const response = await this.modelService.generateMessage(request);
    this.logger.debug(
      `Turn ${turnIndex}: ${response.tokenUsage.totalTokens} tokens, stop reason ${response.stopReason ?? 'none'}`,
    );

    const parsed = await parseModelResponse(response.contentBlocks, {
      display: this.config.display,
      navigation: session.documentation.navigator !== null,
    });
    return { turnIndex, response, parsed };
  }

  /** Records a completion; nothing is executed and no screenshot is taken. */
  async complete(
    session: RunSession,
    decision: TurnDecision,
    action: TerminateAction,
  ): Promise<TurnRecord> {
    await this.executor.execute(action, decision.turnIndex);
    return this.record(
      session,
      decision,
      this.requireObservation(session),
      action.summary || 'Task completed.',
    );
  }

  async execute(
    session: RunSession,
    decision: TurnDecision,
    action: ComputerAction | NavigateDocumentationAction,
  ): Promise<TurnRecord> {
    this.requireObservation(session);

    if (isNavigateDocumentationAction(action)) {
      const navigator = session.documentation.navigator;
      if (!navigator) {
        throw new Error('Documentation navigation is not enabled for this run');
      }
      const result = await navigator.navigate(action.direction);
      const observation = await this.executor.capture(decision.turnIndex);
      return this.record(session, decision, observation, result.text);
    }

    const observation = await this.executor.execute(action, decision.turnIndex);
    session.actionCount += 1;
    return this.record(
      session,
      decision,
      observation,
      `Done: ${describeAction(action)}.`,
    );
  }

  // Actions are only dispatched against a screen the model has seen
  private requireObservation(session: RunSession): Observation {
    const observation = session.history.latestObservation();
    if (!observation) {
      throw new Error('No observation recorded before the action');
    }
    return observation;
  }

  private record(
    session: RunSession,
    decision: TurnDecision,
    observation: Observation,
    resultText: string,
  ): TurnRecord {
    const { parsed } = decision;
    const record: TurnRecord = {
      turnIndex: decision.turnIndex,
      observation,
      action: parsed.action,
      response: decision.response.contentBlocks,
      toolUseId: parsed.toolUse ? parsed.toolUse.id : null,
      ignoredToolUseIds: parsed.ignoredToolUses.map((block) => block.id),
      resultText,
    };
    session.history.append(record);

    if (parsed.ignoredToolUses.length > 0) {
      this.logger.warn(
        `Turn ${decision.turnIndex}: ignored ${parsed.ignoredToolUses.length} extra tool calls`,
      );
    }
    return record;
  }
}
