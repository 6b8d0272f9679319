#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AgentLoopDriver } from './agent/agent-loop.driver';
import { AnthropicService } from './anthropic/anthropic.service';
import { AppModule } from './app.module';
import {
  CliCommand,
  ImportGraphCommand,
  RunCommand,
  USAGE,
  parseCliArguments,
} from './cli/cli-options';
import { readSecretFile } from './cli/credentials';
import {
  EXIT_CODES,
  buildRunReport,
  exitCodeFor,
  exitCodeForError,
  writeRunReport,
} from './cli/run-report';
import { ProcdocError, describeError } from './common/procdoc.errors';
import { AgentConfig, agentConfig } from './config/agent.config';
import { DocumentationDescriptor } from './documentation/documentation.types';
import { GraphFileLoader } from './documentation/graph-file.loader';
import { GraphImportService } from './documentation/graph-import.service';
import { SecretRedactor } from './logger/secret-redactor';

const logger = new Logger('Bootstrap');

async function runAgent(app: INestApplicationContext, command: RunCommand): Promise<number> {
  const config = app.get<AgentConfig>(agentConfig.KEY);
  const redactor = app.get(SecretRedactor);
  const apiKey = await readSecretFile(command.apiKeyFile, 'API key');
  redactor.register(apiKey);
  app.get(AnthropicService).useApiKey(apiKey);

  let documentation: DocumentationDescriptor;
  switch (command.documentation.kind) {
    case 'none':
      documentation = { kind: 'none' };
      break;
    case 'text':
      documentation = { kind: 'text', path: command.documentation.path };
      break;
    case 'graph': {
      const password = await readSecretFile(
        command.documentation.passwordFile,
        'database password',
      );
      redactor.register(password);
      documentation = {
        kind: 'graph',
        path: command.documentation.path,
        password,
      };
      break;
    }
  }

  const settings = {
    model: command.model ?? config.model,
    maxTokens: command.maxTokens ?? config.maxTokens,
    maxSteps: command.maxSteps ?? config.maxSteps,
  };
  const startedAt = new Date();
  const result = await app.get(AgentLoopDriver).run({
    taskFile: command.promptFile,
    documentation,
    settings,
  });

  if (command.reportFile) {
    await writeRunReport(
      command.reportFile,
      buildRunReport(result, {
        documentation: documentation.kind,
        model: settings.model,
        startedAt,
        finishedAt: new Date(),
      }),
    );
    logger.log(`Run report written to ${command.reportFile}`);
  }
  return exitCodeFor(result.status);
}

async function importGraph(
  app: INestApplicationContext,
  command: ImportGraphCommand,
): Promise<number> {
  const graphFile = await app.get(GraphFileLoader).load(command.graphFile);
  const password = await readSecretFile(
    command.passwordFile,
    'database password',
  );
  app.get(SecretRedactor).register(password);
  const summary = await app
    .get(GraphImportService)
    .importGraph(graphFile, password);
  logger.log(
    `Graph import finished: ${summary.steps} steps, ${summary.edges} relationships`,
  );
  return EXIT_CODES.completed;
}

async function bootstrap(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArguments(process.argv.slice(2));
  } catch (error) {
    logger.error(describeError(error));
    console.error(USAGE);
    return EXIT_CODES.usage;
  }
  if (command.name === 'help') {
    console.log(USAGE);
    return EXIT_CODES.completed;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  try {
    return command.name === 'run'
      ? await runAgent(app, command)
      : await importGraph(app, command);
  } catch (error) {
    if (error instanceof ProcdocError) {
      logger.error(error.message);
      return exitCodeForError(error);
    }
    throw error;
  } finally {
    await app.close();
  }
}

bootstrap().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(
      `procdoc-agent stopped: ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = EXIT_CODES.uncaught;
  },
);
