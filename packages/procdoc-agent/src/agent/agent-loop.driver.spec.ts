import { ActionRequest, MessageContentBlock, MessageContentType } from '@procdoc/shared';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AgentConfig, agentConfig } from '../config/agent.config';
import {
  ExecutionError,
  GraphUnavailableError,
  TaskLoadError,
} from '../common/procdoc.errors';
import { DocumentationService } from '../documentation/documentation.service';
import { GraphFileLoader } from '../documentation/graph-file.loader';
import { Neo4jService } from '../documentation/neo4j.service';
import { TextDocumentationLoader } from '../documentation/text-documentation.loader';
import { AgentLoopDriver, RunOptions, loadTask } from './agent-loop.driver';
import { ModelResponse, Observation, RunStatus } from './agent.types';
import { TurnProtocolEngine } from './turn-protocol.engine';

const config: AgentConfig = {
  ...agentConfig(),
  display: { width: 1280, height: 800 },
};

function observation(turnIndex: number): Observation {
  return {
    screenshot: `shot-${turnIndex}`,
    cursor: { x: 0, y: 0 },
    turnIndex,
    capturedAt: new Date(0),
  };
}

function reply(...contentBlocks: MessageContentBlock[]): ModelResponse {
  return {
    contentBlocks,
    stopReason: 'end_turn',
    tokenUsage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
  };
}

const screenshotCall: MessageContentBlock = {
  type: MessageContentType.ToolUse,
  id: 'toolu_1',
  name: 'computer_screenshot',
  input: {},
};

describe('AgentLoopDriver', () => {
  let dir: string;
  let taskFile: string;
  let neo4jService: Neo4jService;
  let modelService: { generateMessage: jest.Mock };
  let executor: {
    verifyDisplay: jest.Mock;
    capture: jest.Mock;
    execute: jest.Mock;
  };
  let driver: AgentLoopDriver;

  function options(overrides: Partial<RunOptions> = {}): RunOptions {
    return {
      taskFile,
      documentation: { kind: 'none' },
      settings: { model: 'claude-test', maxTokens: 1024, maxSteps: 5 },
      ...overrides,
    };
  }

  async function writeFile(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, content);
    return file;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'procdoc-run-'));
    taskFile = await writeFile('task.txt', 'Save the invoice\n');

    neo4jService = new Neo4jService();
    modelService = { generateMessage: jest.fn() };
    executor = {
      verifyDisplay: jest.fn().mockResolvedValue(undefined),
      capture: jest
        .fn()
        .mockImplementation(async (turnIndex: number) => observation(turnIndex)),
      execute: jest
        .fn()
        .mockImplementation(async (action: ActionRequest, turnIndex: number) =>
          action.kind === 'terminate' ? null : observation(turnIndex),
        ),
    };
    const documentationService = new DocumentationService(
      new TextDocumentationLoader(),
      new GraphFileLoader(config),
      neo4jService,
      config,
    );
    driver = new AgentLoopDriver(
      documentationService,
      new TurnProtocolEngine(modelService, executor, config),
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('completes when the model finishes the task', async () => {
    modelService.generateMessage
      .mockResolvedValueOnce(reply(screenshotCall))
      .mockResolvedValueOnce(
        reply({ type: MessageContentType.Text, text: 'The invoice is saved.' }),
      );

    const result = await driver.run(options());

    expect(result.status).toBe(RunStatus.Completed);
    expect(result.reason).toBeNull();
    expect(result.turnCount).toBe(2);
    expect(result.actionCount).toBe(1);
    expect(result.history.map((record) => record.action.kind)).toEqual([
      'screenshot',
      'terminate',
    ]);
    expect(result.finalObservation).toEqual(observation(1));
  });

  it('fails on a reply it cannot parse', async () => {
    modelService.generateMessage.mockResolvedValue(reply());

    const result = await driver.run(
      options({ settings: { model: 'claude-test', maxTokens: 1024, maxSteps: 3 } }),
    );

    expect(result).toMatchObject({
      status: RunStatus.Failed,
      reason: 'unparseable model response',
      turnCount: 1,
      actionCount: 0,
    });
    expect(result.history).toEqual([]);
    expect(modelService.generateMessage).toHaveBeenCalledTimes(1);
  });

  it('stops after the step limit', async () => {
    modelService.generateMessage.mockResolvedValue(reply(screenshotCall));

    const result = await driver.run(
      options({ settings: { model: 'claude-test', maxTokens: 1024, maxSteps: 2 } }),
    );

    expect(result.status).toBe(RunStatus.MaxStepsExceeded);
    expect(result.turnCount).toBe(2);
    expect(result.actionCount).toBe(2);
    expect(modelService.generateMessage).toHaveBeenCalledTimes(2);
  });

  it('fails when an action cannot be performed', async () => {
    modelService.generateMessage.mockResolvedValue(reply(screenshotCall));
    executor.execute.mockRejectedValue(
      new ExecutionError('Failed to take screenshot: no display'),
    );

    const result = await driver.run(options());

    expect(result.status).toBe(RunStatus.Failed);
    expect(result.reason).toBe('Failed to take screenshot: no display');
    expect(result.turnCount).toBe(1);
  });

  it('fails before the first turn when the graph is unreachable', async () => {
    const graphFile = await writeFile(
      'graph.yaml',
      'steps:\n  - id: a\n    description: Open the list\n',
    );
    jest
      .spyOn(neo4jService, 'connect')
      .mockRejectedValue(
        new GraphUnavailableError(
          'Cannot reach process graph at bolt://localhost:7687: refused',
        ),
      );

    const result = await driver.run(
      options({
        documentation: { kind: 'graph', path: graphFile, password: 'test-secret' },
      }),
    );

    expect(result).toEqual({
      status: RunStatus.Failed,
      reason: 'Cannot reach process graph at bolt://localhost:7687: refused',
      turnCount: 0,
      actionCount: 0,
      finalObservation: null,
      history: [],
    });
    expect(modelService.generateMessage).not.toHaveBeenCalled();
    expect(executor.capture).not.toHaveBeenCalled();
  });

  it('fails on empty text documentation', async () => {
    const textFile = await writeFile('process.txt', ' \n');

    const result = await driver.run(
      options({ documentation: { kind: 'text', path: textFile } }),
    );

    expect(result.status).toBe(RunStatus.Failed);
    expect(result.reason).toBe(`Text documentation ${textFile} is empty`);
  });

  it('rejects an empty task file before the run starts', async () => {
    taskFile = await writeFile('empty-task.txt', '\n\n');

    const run = driver.run(options());

    await expect(run).rejects.toBeInstanceOf(TaskLoadError);
    await expect(run).rejects.toThrow(`Task file ${taskFile} is empty`);
    expect(executor.verifyDisplay).not.toHaveBeenCalled();
    expect(modelService.generateMessage).not.toHaveBeenCalled();
  });

  it('propagates model errors and still closes the graph connection', async () => {
    const graphFile = await writeFile(
      'graph.yaml',
      'steps:\n  - id: a\n    description: Open the list\n',
    );
    const client = {
      read: jest.fn().mockResolvedValue([{ id: 'a', description: 'Open the list' }]),
      write: jest.fn(),
      runSchema: jest.fn(),
      close: jest.fn().mockResolvedValue(undefined),
    };
    jest.spyOn(neo4jService, 'connect').mockResolvedValue(client);
    modelService.generateMessage.mockRejectedValue(new Error('rate limited'));

    await expect(
      driver.run(
        options({
          documentation: { kind: 'graph', path: graphFile, password: 'test-secret' },
        }),
      ),
    ).rejects.toThrow('rate limited');
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('sends no documentation section in none mode', async () => {
    modelService.generateMessage.mockResolvedValue(
      reply({ type: MessageContentType.Text, text: 'Nothing to do.' }),
    );

    await driver.run(options());

    const [request] = modelService.generateMessage.mock.calls[0];
    expect(request.systemPrompt).not.toContain('PROCESS_DOCUMENTATION');
  });
});

describe('loadTask', () => {
  it('trims the task text', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'procdoc-task-'));
    const file = path.join(dir, 'task.txt');
    await fs.writeFile(file, '\n  Save the invoice  \n');

    await expect(loadTask(file)).resolves.toEqual({
      text: 'Save the invoice',
      sourcePath: file,
    });
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('rejects a missing file', async () => {
    await expect(
      loadTask(path.join(os.tmpdir(), 'procdoc-no-such-task.txt')),
    ).rejects.toThrow(/^Cannot read task file /);
  });
});
