import { promises as fs } from 'fs';
import { RunResult, RunStatus } from '../agent/agent.types';
import { GraphUnavailableError, ProcdocError } from '../common/procdoc.errors';
import { DocumentationKind } from '../documentation/documentation.types';

export const EXIT_CODES = {
  completed: 0,
  uncaught: 1,
  maxStepsExceeded: 2,
  failed: 3,
  usage: 64,
} as const;

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case RunStatus.Completed:
      return EXIT_CODES.completed;
    case RunStatus.MaxStepsExceeded:
      return EXIT_CODES.maxStepsExceeded;
    case RunStatus.Failed:
      return EXIT_CODES.failed;
  }
}

/** Exit code for a known error raised outside a run's turn loop. */
export function exitCodeForError(error: ProcdocError): number {
  return error instanceof GraphUnavailableError
    ? EXIT_CODES.failed
    : EXIT_CODES.usage;
}

export interface RunReport {
  status: RunStatus;
  reason: string | null;
  turnCount: number;
  actionCount: number;
  documentation: DocumentationKind;
  model: string;
  startedAt: string;
  finishedAt: string;
}

export function buildRunReport(
  result: RunResult,
  details: {
    documentation: DocumentationKind;
    model: string;
    startedAt: Date;
    finishedAt: Date;
  },
): RunReport {
  return {
    status: result.status,
    reason: result.reason,
    turnCount: result.turnCount,
    actionCount: result.actionCount,
    documentation: details.documentation,
    model: details.model,
    startedAt: details.startedAt.toISOString(),
    finishedAt: details.finishedAt.toISOString(),
  };
}

export async function writeRunReport(
  filePath: string,
  report: RunReport,
): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
}
