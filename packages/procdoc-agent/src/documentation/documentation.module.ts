import { Module } from '@nestjs/common';
import { DocumentationService } from './documentation.service';
import { GraphFileLoader } from './graph-file.loader';
import { GraphImportService } from './graph-import.service';
import { Neo4jService } from './neo4j.service';
import { TextDocumentationLoader } from './text-documentation.loader';

@Module({
  providers: [
    DocumentationService,
    GraphFileLoader,
    GraphImportService,
    Neo4jService,
    TextDocumentationLoader,
  ],
  exports: [DocumentationService, GraphFileLoader, GraphImportService],
})
export class DocumentationModule {}
