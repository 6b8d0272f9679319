import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { promises as fs } from 'fs';
import { parse } from 'yaml';
import { AgentConfig, agentConfig } from '../config/agent.config';
import { DocumentationLoadError, describeError } from '../common/procdoc.errors';
import { flattenValidationErrors, isPlainRecord } from '../common/validation';
import { GraphFileDto } from './dto/graph-file.dto';
import { GraphRetrievalOptions, ProcessStep } from './documentation.types';

export interface GraphFile {
  connection: {
    uri: string;
    user: string;
    database: string | null;
  };
  process: string | null;
  retrieval: GraphRetrievalOptions;
  steps: ProcessStep[];
}

export const DEFAULT_RETRIEVAL: GraphRetrievalOptions = {
  scope: 'full',
  requery: false,
  hops: 1,
  navigation: false,
};

@Injectable()
export class GraphFileLoader {
  private readonly logger = new Logger(GraphFileLoader.name);

  constructor(
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  async load(filePath: string): Promise<GraphFile> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new DocumentationLoadError(
        `Cannot read graph file ${filePath}: ${describeError(error)}`,
        { cause: error },
      );
    }
    return this.parse(content, filePath);
  }

  async parse(content: string, filePath: string): Promise<GraphFile> {
    let raw: unknown;
    try {
      // YAML forbids tabs in indentation
      raw = parse(content.replace(/\t/g, '    '));
    } catch (error) {
      throw new DocumentationLoadError(
        `Invalid YAML in graph file ${filePath}: ${describeError(error)}`,
        { cause: error },
      );
    }

    // A bare list is shorthand for { steps: [...] }
    const document = Array.isArray(raw) ? { steps: raw } : raw;
    if (!isPlainRecord(document)) {
      throw new DocumentationLoadError(
        `Graph file ${filePath} must contain a mapping or a list of steps`,
      );
    }

    const dto = plainToInstance(GraphFileDto, document);
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new DocumentationLoadError(
        `Invalid graph file ${filePath}: ${flattenValidationErrors(errors).join('; ')}`,
      );
    }

    const steps: ProcessStep[] = (dto.steps ?? []).map((step, index) => ({
      id: step.id,
      description: step.description ?? '',
      seq: index,
      next: step.next ?? [],
    }));

    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new DocumentationLoadError(
          `Duplicate step id "${step.id}" in graph file ${filePath}`,
        );
      }
      seen.add(step.id);
    }

    const graphFile: GraphFile = {
      connection: {
        uri: dto.connection?.uri ?? this.config.graph.uri,
        user: dto.connection?.user ?? this.config.graph.user,
        database: dto.connection?.database ?? this.config.graph.database,
      },
      process: dto.process ?? null,
      retrieval: {
        scope: dto.retrieval?.scope ?? DEFAULT_RETRIEVAL.scope,
        requery: dto.retrieval?.requery ?? DEFAULT_RETRIEVAL.requery,
        hops: dto.retrieval?.hops ?? DEFAULT_RETRIEVAL.hops,
        navigation: dto.retrieval?.navigation ?? DEFAULT_RETRIEVAL.navigation,
      },
      steps,
    };

    this.logger.log(
      `Loaded graph file ${filePath}: ${graphFile.connection.uri}, scope ${graphFile.retrieval.scope}, ${steps.length} steps`,
    );
    return graphFile;
  }
}
