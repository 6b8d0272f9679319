import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import {
  ConversationMessage,
  ImageContentBlock,
  MessageContentBlock,
  MessageContentType,
  TextContentBlock,
} from '@procdoc/shared';
import {
  AgentModelService,
  ModelRequest,
  ModelResponse,
} from '../agent/agent.types';
import { describeError } from '../common/procdoc.errors';

type CacheableBlockParam =
  | Anthropic.TextBlockParam
  | Anthropic.ImageBlockParam;

@Injectable()
export class AnthropicService implements AgentModelService {
  private anthropic: Anthropic | null = null;
  private readonly logger = new Logger(AnthropicService.name);

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (apiKey) {
      this.anthropic = this.createClient(apiKey);
    }
  }

  /** Replaces the client; the CLI passes the key read from --api-key-file. */
  useApiKey(apiKey: string): void {
    this.anthropic = this.createClient(apiKey);
  }

  async generateMessage(request: ModelRequest): Promise<ModelResponse> {
    const anthropicClient = this.getAnthropicClient();
    const lastTool = request.tools.length - 1;

    try {
      const response = await anthropicClient.messages.create({
        model: request.model,
        max_tokens: request.maxTokens,
        system: [
          {
            type: 'text',
            text: request.systemPrompt,
            cache_control: { type: 'ephemeral' },
          },
        ],
        messages: this.formatMessagesForAnthropic(request.messages),
        tools: request.tools.map(
          (tool, index): Anthropic.Tool =>
            index === lastTool
              ? { ...tool, cache_control: { type: 'ephemeral' } }
              : tool,
        ),
      });

      return {
        contentBlocks: this.formatAnthropicResponse(response.content),
        stopReason: response.stop_reason,
        tokenUsage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens:
            response.usage.input_tokens + response.usage.output_tokens,
        },
      };
    } catch (error) {
      this.logger.error(
        `Error sending message to Anthropic: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }

  // Retries would hide rate limits from the operator
  private createClient(apiKey: string): Anthropic {
    return new Anthropic({ apiKey, maxRetries: 0 });
  }

  private getAnthropicClient(): Anthropic {
    if (!this.anthropic) {
      throw new Error(
        'No Anthropic API key configured. Pass --api-key-file or set ANTHROPIC_API_KEY.',
      );
    }
    return this.anthropic;
  }

  /**
   * Convert our MessageContentBlock format to Anthropic's message format.
   * The last block of the last message carries the cache breakpoint.
   */
  formatMessagesForAnthropic(
    messages: ConversationMessage[],
  ): Anthropic.MessageParam[] {
    return messages.map((message, messageIndex) => {
      const isLastMessage = messageIndex === messages.length - 1;
      return {
        role: message.role,
        content: message.content.map((block, blockIndex) =>
          this.formatBlock(
            block,
            isLastMessage && blockIndex === message.content.length - 1,
          ),
        ),
      };
    });
  }

  private formatBlock(
    block: MessageContentBlock,
    cache: boolean,
  ): Anthropic.ContentBlockParam {
    const cacheControl = cache
      ? { cache_control: { type: 'ephemeral' as const } }
      : {};

    switch (block.type) {
      case MessageContentType.Text:
      case MessageContentType.Image:
        return { ...this.formatCacheable(block), ...cacheControl };
      case MessageContentType.ToolUse:
        return {
          type: 'tool_use',
          id: block.id,
          name: block.name,
          input: block.input,
          ...cacheControl,
        };
      case MessageContentType.ToolResult:
        return {
          type: 'tool_result',
          tool_use_id: block.tool_use_id,
          content: block.content.map((part) => this.formatCacheable(part)),
          ...(block.is_error ? { is_error: true } : {}),
          ...cacheControl,
        };
      case MessageContentType.Thinking:
        return {
          type: 'thinking',
          thinking: block.thinking,
          signature: block.signature,
        };
      case MessageContentType.RedactedThinking:
        return { type: 'redacted_thinking', data: block.data };
    }
  }

  private formatCacheable(
    block: TextContentBlock | ImageContentBlock,
  ): CacheableBlockParam {
    if (block.type === MessageContentType.Text) {
      return { type: 'text', text: block.text };
    }
    return {
      type: 'image',
      source: {
        type: 'base64',
        media_type: block.source.media_type,
        data: block.source.data,
      },
    };
  }

  /**
   * Convert Anthropic's response content to our MessageContentBlock format.
   * Server-side tool blocks have no counterpart and are dropped.
   */
  formatAnthropicResponse(
    content: Anthropic.ContentBlock[],
  ): MessageContentBlock[] {
    return content.flatMap((block): MessageContentBlock[] => {
      switch (block.type) {
        case 'text':
          return [{ type: MessageContentType.Text, text: block.text }];
        case 'tool_use':
          return [
            {
              type: MessageContentType.ToolUse,
              id: block.id,
              name: block.name,
              input: block.input,
            },
          ];
        case 'thinking':
          return [
            {
              type: MessageContentType.Thinking,
              thinking: block.thinking,
              signature: block.signature,
            },
          ];
        case 'redacted_thinking':
          return [
            { type: MessageContentType.RedactedThinking, data: block.data },
          ];
        default:
          return [];
      }
    });
  }
}
