import { formatContext } from './context-formatter';
import {
  ContextBlock,
  DocumentationProvider,
  TextDocumentation,
} from './documentation.types';

export class NoDocumentationProvider implements DocumentationProvider {
  readonly kind = 'none';
  readonly refreshesPerTurn = false;
  readonly navigator = null;
  private readonly block = formatContext({ kind: 'none' });

  async groundingContext(): Promise<ContextBlock> {
    return this.block;
  }

  async close(): Promise<void> {}
}

export class TextDocumentationProvider implements DocumentationProvider {
  readonly kind = 'text';
  readonly refreshesPerTurn = false;
  readonly navigator = null;
  private readonly block: ContextBlock;

  constructor(source: TextDocumentation) {
    this.block = formatContext(source);
  }

  async groundingContext(): Promise<ContextBlock> {
    return this.block;
  }

  async close(): Promise<void> {}
}
