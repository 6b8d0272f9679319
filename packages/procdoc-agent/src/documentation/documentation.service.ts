import { Inject, Injectable, Logger } from '@nestjs/common';
import { AgentConfig, agentConfig } from '../config/agent.config';
import {
  DocumentationDescriptor,
  DocumentationProvider,
  DocumentationSource,
} from './documentation.types';
import { GraphDocumentationProvider } from './graph-documentation.provider';
import { GraphFileLoader } from './graph-file.loader';
import { Neo4jService } from './neo4j.service';
import {
  NoDocumentationProvider,
  TextDocumentationProvider,
} from './static-documentation.providers';
import { TextDocumentationLoader } from './text-documentation.loader';

@Injectable()
export class DocumentationService {
  private readonly logger = new Logger(DocumentationService.name);

  constructor(
    private readonly textLoader: TextDocumentationLoader,
    private readonly graphFileLoader: GraphFileLoader,
    private readonly neo4jService: Neo4jService,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  async load(descriptor: DocumentationDescriptor): Promise<DocumentationSource> {
    switch (descriptor.kind) {
      case 'none':
        return { kind: 'none' };
      case 'text': {
        const content = await this.textLoader.load(descriptor.path);
        return { kind: 'text', content };
      }
      case 'graph': {
        const graphFile = await this.graphFileLoader.load(descriptor.path);
        return {
          kind: 'graph',
          connection: { ...graphFile.connection, password: descriptor.password },
          process: graphFile.process,
          retrieval: graphFile.retrieval,
        };
      }
    }
  }

  /** Opens the provider for one run; graph mode connects here. */
  async open(source: DocumentationSource): Promise<DocumentationProvider> {
    this.logger.log(`Documentation mode: ${source.kind}`);
    switch (source.kind) {
      case 'none':
        return new NoDocumentationProvider();
      case 'text':
        return new TextDocumentationProvider(source);
      case 'graph': {
        const client = await this.neo4jService.connect(
          source.connection,
          this.config.graph,
        );
        const provider = new GraphDocumentationProvider(client, source);
        if (source.retrieval.navigation || source.retrieval.scope === 'window') {
          try {
            await provider.initializeCursor();
          } catch (error) {
            await provider.close();
            throw error;
          }
        }
        return provider;
      }
    }
  }
}
