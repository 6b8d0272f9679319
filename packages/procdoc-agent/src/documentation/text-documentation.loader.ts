import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { DocumentationLoadError, describeError } from '../common/procdoc.errors';

@Injectable()
export class TextDocumentationLoader {
  private readonly logger = new Logger(TextDocumentationLoader.name);

  async load(filePath: string): Promise<string> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new DocumentationLoadError(
        `Cannot read text documentation ${filePath}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (content.includes('\uFFFD')) {
      throw new DocumentationLoadError(
        `Text documentation ${filePath} is not valid UTF-8`,
      );
    }
    if (content.trim() === '') {
      throw new DocumentationLoadError(
        `Text documentation ${filePath} is empty`,
      );
    }

    this.logger.log(
      `Loaded text documentation from ${filePath} (${content.length} characters)`,
    );
    return content;
  }
}
