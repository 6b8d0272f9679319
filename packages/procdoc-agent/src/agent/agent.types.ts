import {
  ActionRequest,
  ComputerAction,
  ConversationMessage,
  Coordinates,
  MessageContentBlock,
  TerminateAction,
} from '@procdoc/shared';
import { AgentToolDefinition } from './agent.tools';

export interface Task {
  text: string;
  sourcePath: string;
}

export interface Observation {
  /** PNG, base64 encoded */
  screenshot: string;
  cursor: Coordinates;
  turnIndex: number;
  capturedAt: Date;
}

/** One completed model turn. Turn indices start at 1 and have no gaps. */
export interface TurnRecord {
  turnIndex: number;
  observation: Observation;
  action: ActionRequest;
  response: MessageContentBlock[];
  /** The tool call that was acted on; null for a text-only completion. */
  toolUseId: string | null;
  /** Tool calls beyond the first, answered with an error result. */
  ignoredToolUseIds: string[];
  resultText: string;
}

export interface ModelRequest {
  model: string;
  maxTokens: number;
  systemPrompt: string;
  messages: ConversationMessage[];
  tools: AgentToolDefinition[];
}

export interface ModelResponse {
  contentBlocks: MessageContentBlock[];
  stopReason: string | null;
  tokenUsage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

export interface AgentModelService {
  generateMessage(request: ModelRequest): Promise<ModelResponse>;
}

export interface ComputerActionExecutor {
  verifyDisplay(): Promise<void>;
  capture(turnIndex: number): Promise<Observation>;
  /** Terminate touches nothing and yields no observation. */
  execute(action: TerminateAction, turnIndex: number): Promise<null>;
  execute(action: ComputerAction, turnIndex: number): Promise<Observation>;
}

export enum AgentState {
  Init = 'init',
  AwaitingModel = 'awaiting_model',
  Executing = 'executing',
  Terminated = 'terminated',
}

export enum RunStatus {
  Completed = 'completed',
  MaxStepsExceeded = 'max_steps_exceeded',
  Failed = 'failed',
}

export interface RunResult {
  status: RunStatus;
  reason: string | null;
  turnCount: number;
  actionCount: number;
  finalObservation: Observation | null;
  history: readonly TurnRecord[];
}

export interface TurnSettings {
  model: string;
  maxTokens: number;
  maxSteps: number;
}

export const AGENT_MODEL_SERVICE = Symbol('AGENT_MODEL_SERVICE');
export const COMPUTER_ACTION_EXECUTOR = Symbol('COMPUTER_ACTION_EXECUTOR');
