import { parseArgs } from 'util';
import { UsageError, describeError } from '../common/procdoc.errors';

export const USAGE = `Usage:
  procdoc-agent run --api-key-file <file> --prompt-file <file>
                    [--text-file <file> | --graph-file <file> --db-password-file <file>]
                    [--max-steps <n>] [--max-tokens <n>] [--model <name>] [--report-file <file>]
  procdoc-agent import-graph --graph-file <file> --db-password-file <file>`;

export type DocumentationFlags =
  | { kind: 'none' }
  | { kind: 'text'; path: string }
  | { kind: 'graph'; path: string; passwordFile: string };

export interface RunCommand {
  name: 'run';
  apiKeyFile: string;
  promptFile: string;
  documentation: DocumentationFlags;
  maxSteps: number | null;
  maxTokens: number | null;
  model: string | null;
  reportFile: string | null;
}

export interface ImportGraphCommand {
  name: 'import-graph';
  graphFile: string;
  passwordFile: string;
}

export type CliCommand = RunCommand | ImportGraphCommand | { name: 'help' };

function parsePositiveInt(flag: string, raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function required(flag: string, value: string | undefined): string {
  if (!value) {
    throw new UsageError(`--${flag} is required`);
  }
  return value;
}

export function parseCliArguments(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (error) {
    throw new UsageError(describeError(error), { cause: error });
  }
  const { values, positionals } = parsed;

  if (values.help) {
    return { name: 'help' };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument "${positionals[1]}"`);
  }

  const command = positionals[0] ?? 'run';
  switch (command) {
    case 'run': {
      if (values['text-file'] && values['graph-file']) {
        throw new UsageError('--text-file and --graph-file cannot be combined');
      }
      let documentation: DocumentationFlags = { kind: 'none' };
      if (values['text-file']) {
        documentation = { kind: 'text', path: values['text-file'] };
      } else if (values['graph-file']) {
        documentation = {
          kind: 'graph',
          path: values['graph-file'],
          passwordFile: required(
            'db-password-file',
            values['db-password-file'],
          ),
        };
      }
      return {
        name: 'run',
        apiKeyFile: required('api-key-file', values['api-key-file']),
        promptFile: required('prompt-file', values['prompt-file']),
        documentation,
        maxSteps: parsePositiveInt('max-steps', values['max-steps']),
        maxTokens: parsePositiveInt('max-tokens', values['max-tokens']),
        model: values.model ?? null,
        reportFile: values['report-file'] ?? null,
      };
    }
    case 'import-graph':
      return {
        name: 'import-graph',
        graphFile: required('graph-file', values['graph-file']),
        passwordFile: required('db-password-file', values['db-password-file']),
      };
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'api-key-file': { type: 'string' },
      'prompt-file': { type: 'string', short: 'p' },
      'text-file': { type: 'string', short: 't' },
      'graph-file': { type: 'string', short: 'g' },
      'db-password-file': { type: 'string' },
      'max-steps': { type: 'string' },
      'max-tokens': { type: 'string' },
      model: { type: 'string' },
      'report-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
