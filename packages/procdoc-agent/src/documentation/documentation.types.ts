import { NavigationDirection } from '@procdoc/shared';
import { Task, TurnRecord } from '../agent/agent.types';

export type DocumentationKind = 'none' | 'text' | 'graph';

/** Which part of the process graph is retrieved for the model. */
export type GraphScope = 'full' | 'task' | 'window';

export interface GraphRetrievalOptions {
  scope: GraphScope;
  /** Re-run the retrieval before every model call. */
  requery: boolean;
  /** NEXT hops expanded around task-matched steps. */
  hops: number;
  /** Expose the process_documentation navigation tool. */
  navigation: boolean;
}

export interface GraphConnection {
  uri: string;
  user: string;
  password: string;
  database: string | null;
}

export interface NoDocumentation {
  kind: 'none';
}

export interface TextDocumentation {
  kind: 'text';
  content: string;
}

export interface GraphDocumentation {
  kind: 'graph';
  connection: GraphConnection;
  /** Restricts retrieval to steps of one named process. */
  process: string | null;
  retrieval: GraphRetrievalOptions;
}

export type DocumentationSource =
  | NoDocumentation
  | TextDocumentation
  | GraphDocumentation;

/** What the operator asked for on the command line. */
export type DocumentationDescriptor =
  | { kind: 'none' }
  | { kind: 'text'; path: string }
  | { kind: 'graph'; path: string; password: string };

export interface ProcessStep {
  id: string;
  description: string;
  /** Position in the source document, used to break ordering ties. */
  seq: number;
  next: string[];
}

export interface GraphQueryResult {
  kind: 'graph-query';
  scope: GraphScope;
  steps: ProcessStep[];
  cursor: string | null;
}

export interface ContextBlock {
  source: DocumentationKind;
  text: string;
}

export interface NavigationResult {
  /** The step the cursor points at after the move, or null if it stayed. */
  stepId: string | null;
  text: string;
}

export interface ProcessNavigator {
  navigate(direction: NavigationDirection): Promise<NavigationResult>;
}

/**
 * Produces the grounding context for a run. One provider is opened per run
 * and closed when the run ends.
 */
export interface DocumentationProvider {
  readonly kind: DocumentationKind;
  /** True when the context must be checked for changes before every model call. */
  readonly refreshesPerTurn: boolean;
  readonly navigator: ProcessNavigator | null;
  groundingContext(
    task: Task,
    history: readonly TurnRecord[],
  ): Promise<ContextBlock>;
  close(): Promise<void>;
}
