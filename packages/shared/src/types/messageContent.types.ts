// Content block types
export enum MessageContentType {
  Text = "text",
  Image = "image",
  ToolUse = "tool_use",
  ToolResult = "tool_result",
  Thinking = "thinking",
  RedactedThinking = "redacted_thinking",
}

export type MessageRole = "user" | "assistant";

export type TextContentBlock = {
  type: MessageContentType.Text;
  text: string;
};

export type ImageContentBlock = {
  type: MessageContentType.Image;
  source: {
    media_type: "image/png";
    type: "base64";
    data: string;
  };
};

export type ThinkingContentBlock = {
  type: MessageContentType.Thinking;
  thinking: string;
  signature: string;
};

export type RedactedThinkingContentBlock = {
  type: MessageContentType.RedactedThinking;
  data: string;
};

// input is whatever the model produced; it is validated before use
export type ToolUseContentBlock = {
  type: MessageContentType.ToolUse;
  name: string;
  id: string;
  input: unknown;
};

export type ToolResultContentBlock = {
  type: MessageContentType.ToolResult;
  tool_use_id: string;
  content: (TextContentBlock | ImageContentBlock)[];
  is_error?: boolean;
};

export type MessageContentBlock =
  | TextContentBlock
  | ImageContentBlock
  | ThinkingContentBlock
  | RedactedThinkingContentBlock
  | ToolUseContentBlock
  | ToolResultContentBlock;

export type ConversationMessage = {
  role: MessageRole;
  content: MessageContentBlock[];
};
