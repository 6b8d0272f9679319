import { Inject, Injectable, Logger } from '@nestjs/common';
import { AgentConfig, agentConfig } from '../config/agent.config';
import { DocumentationLoadError } from '../common/procdoc.errors';
import { GraphFile } from './graph-file.loader';
import { Neo4jService } from './neo4j.service';
import {
  MERGE_NEXT_EDGES,
  MERGE_STEPS,
  STEP_ID_CONSTRAINT,
} from './process-graph.queries';

export interface GraphImportSummary {
  steps: number;
  edges: number;
}

@Injectable()
export class GraphImportService {
  private readonly logger = new Logger(GraphImportService.name);

  constructor(
    private readonly neo4jService: Neo4jService,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  /**
   * Writes the steps of a graph file into the database. Every NEXT target is
   * checked before anything is written.
   */
  async importGraph(
    graphFile: GraphFile,
    password: string,
  ): Promise<GraphImportSummary> {
    if (graphFile.steps.length === 0) {
      throw new DocumentationLoadError('Graph file contains no steps');
    }

    const ids = new Set(graphFile.steps.map((step) => step.id));
    const edges = graphFile.steps.flatMap((step) =>
      step.next.map((to) => ({ from: step.id, to })),
    );
    const unknown = edges.find((edge) => !ids.has(edge.to));
    if (unknown) {
      throw new DocumentationLoadError(
        `Step "${unknown.from}" points to unknown step "${unknown.to}"`,
      );
    }

    const client = await this.neo4jService.connect(
      { ...graphFile.connection, password },
      this.config.graph,
    );
    try {
      await client.runSchema(STEP_ID_CONSTRAINT);
      await client.write([
        {
          query: MERGE_STEPS,
          params: {
            steps: graphFile.steps.map((step) => ({
              id: step.id,
              description: step.description,
              seq: step.seq,
              process: graphFile.process,
            })),
          },
        },
        { query: MERGE_NEXT_EDGES, params: { edges } },
      ]);
    } finally {
      await client.close();
    }

    this.logger.log(
      `Imported ${graphFile.steps.length} steps and ${edges.length} NEXT relationships`,
    );
    return { steps: graphFile.steps.length, edges: edges.length };
  }
}
