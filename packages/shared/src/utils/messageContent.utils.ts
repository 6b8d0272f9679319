import {
  ImageContentBlock,
  MessageContentBlock,
  MessageContentType,
  TextContentBlock,
  ToolResultContentBlock,
  ToolUseContentBlock,
} from "../types/messageContent.types";

/**
 * Type guard to check if an object is a TextContentBlock
 */
export function isTextContentBlock(
  block: MessageContentBlock,
): block is TextContentBlock {
  return block.type === MessageContentType.Text;
}

export function isToolUseContentBlock(
  block: MessageContentBlock,
): block is ToolUseContentBlock {
  return block.type === MessageContentType.ToolUse;
}

export function createTextBlock(text: string): TextContentBlock {
  return { type: MessageContentType.Text, text };
}

export function createImageBlock(base64: string): ImageContentBlock {
  return {
    type: MessageContentType.Image,
    source: {
      type: "base64",
      media_type: "image/png",
      data: base64,
    },
  };
}

export function createToolResultBlock(
  toolUseId: string,
  content: (TextContentBlock | ImageContentBlock)[],
  isError = false,
): ToolResultContentBlock {
  return {
    type: MessageContentType.ToolResult,
    tool_use_id: toolUseId,
    content,
    ...(isError ? { is_error: true } : {}),
  };
}

/**
 * Joins the text blocks of a response, ignoring every other block type.
 */
export function getTextContent(blocks: MessageContentBlock[]): string {
  return blocks
    .filter(isTextContentBlock)
    .map((block) => block.text)
    .join("\n")
    .trim();
}
