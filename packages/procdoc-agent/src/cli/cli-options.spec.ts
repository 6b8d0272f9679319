import { UsageError } from '../common/procdoc.errors';
import { parseCliArguments } from './cli-options';

describe('parseCliArguments', () => {
  it('parses a full run command', () => {
    expect(
      parseCliArguments([
        'run',
        '--api-key-file',
        'key.txt',
        '--prompt-file',
        'task.txt',
        '--graph-file',
        'graph.yaml',
        '--db-password-file',
        'db.txt',
        '--max-steps',
        '25',
        '--max-tokens',
        '2048',
        '--model',
        'claude-test',
        '--report-file',
        'report.json',
      ]),
    ).toEqual({
      name: 'run',
      apiKeyFile: 'key.txt',
      promptFile: 'task.txt',
      documentation: { kind: 'graph', path: 'graph.yaml', passwordFile: 'db.txt' },
      maxSteps: 25,
      maxTokens: 2048,
      model: 'claude-test',
      reportFile: 'report.json',
    });
  });

  it('runs by default and accepts short flags', () => {
    expect(
      parseCliArguments(['--api-key-file', 'key.txt', '-p', 'task.txt', '-t', 'doc.txt']),
    ).toEqual({
      name: 'run',
      apiKeyFile: 'key.txt',
      promptFile: 'task.txt',
      documentation: { kind: 'text', path: 'doc.txt' },
      maxSteps: null,
      maxTokens: null,
      model: null,
      reportFile: null,
    });
  });

  it('runs without documentation when no source is given', () => {
    const command = parseCliArguments(['--api-key-file', 'key.txt', '-p', 'task.txt']);
    expect(command).toMatchObject({ documentation: { kind: 'none' } });
  });

  it('parses the import command', () => {
    expect(
      parseCliArguments(['import-graph', '-g', 'graph.yaml', '--db-password-file', 'db.txt']),
    ).toEqual({ name: 'import-graph', graphFile: 'graph.yaml', passwordFile: 'db.txt' });
  });

  it('answers --help before anything else', () => {
    expect(parseCliArguments(['deploy', '--help'])).toEqual({ name: 'help' });
  });

  const invalid: Array<[string[], string]> = [
    [['-p', 'task.txt'], '--api-key-file is required'],
    [
      ['--api-key-file', 'key.txt', '-p', 'task.txt', '-g', 'graph.yaml'],
      '--db-password-file is required',
    ],
    [
      ['--api-key-file', 'key.txt', '-p', 'task.txt', '-t', 'doc.txt', '-g', 'graph.yaml'],
      '--text-file and --graph-file cannot be combined',
    ],
    [
      ['--api-key-file', 'key.txt', '-p', 'task.txt', '--max-steps', '0'],
      '--max-steps must be a positive integer, got "0"',
    ],
    [
      ['--api-key-file', 'key.txt', '-p', 'task.txt', '--max-tokens', '1.5'],
      '--max-tokens must be a positive integer, got "1.5"',
    ],
    [['deploy'], 'Unknown command "deploy"'],
    [['run', 'extra'], 'Unexpected argument "extra"'],
  ];

  it.each(invalid)('rejects %j', (argv, message) => {
    expect(() => parseCliArguments(argv)).toThrow(new UsageError(message));
  });

  it('reports unknown options as usage errors', () => {
    expect(() => parseCliArguments(['--verbose'])).toThrow(UsageError);
  });
});
