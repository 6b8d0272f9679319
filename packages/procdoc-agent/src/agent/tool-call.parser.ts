import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  ActionRequest,
  Coordinates,
  MessageContentBlock,
  ToolUseContentBlock,
  getTextContent,
  isToolUseContentBlock,
} from '@procdoc/shared';
import { UnparseableResponseError } from '../common/procdoc.errors';
import { flattenValidationErrors, isPlainRecord } from '../common/validation';
import { DisplaySize } from '../config/agent.config';
import { AgentToolName } from './agent.tools';
import {
  ClickMouseInputDto,
  MoveMouseInputDto,
  PressKeysInputDto,
  ProcessDocumentationInputDto,
  ScrollInputDto,
  SetTaskStatusInputDto,
  TypeTextInputDto,
  WaitInputDto,
} from './dto/tool-input.dto';

export interface ParsedResponse {
  action: ActionRequest;
  /** The tool call the action came from; null for a text-only answer. */
  toolUse: ToolUseContentBlock | null;
  ignoredToolUses: ToolUseContentBlock[];
}

export interface ParseOptions {
  display: DisplaySize;
  navigation: boolean;
}

async function validateInput<T extends object>(
  dtoClass: ClassConstructor<T>,
  toolUse: ToolUseContentBlock,
): Promise<T> {
  if (!isPlainRecord(toolUse.input)) {
    throw new UnparseableResponseError(
      `${toolUse.name} input is not an object`,
    );
  }
  const dto = plainToInstance(dtoClass, toolUse.input);
  const errors = await validate(dto);
  if (errors.length > 0) {
    throw new UnparseableResponseError(
      `invalid ${toolUse.name} input: ${flattenValidationErrors(errors).join('; ')}`,
    );
  }
  return dto;
}

function checkBounds(
  coordinates: Coordinates,
  display: DisplaySize,
  toolName: string,
): Coordinates {
  if (coordinates.x >= display.width || coordinates.y >= display.height) {
    throw new UnparseableResponseError(
      `${toolName} coordinates (${coordinates.x}, ${coordinates.y}) are outside the ${display.width}x${display.height} display`,
    );
  }
  return { x: coordinates.x, y: coordinates.y };
}

async function toActionRequest(
  toolUse: ToolUseContentBlock,
  options: ParseOptions,
): Promise<ActionRequest> {
  const { display } = options;

  switch (toolUse.name) {
    case AgentToolName.ClickMouse: {
      const input = await validateInput(ClickMouseInputDto, toolUse);
      return {
        kind: 'click',
        coordinates:
          input.coordinates &&
          checkBounds(input.coordinates, display, toolUse.name),
        button: input.button ?? 'left',
        clickCount: input.clickCount ?? 1,
      };
    }
    case AgentToolName.MoveMouse: {
      const input = await validateInput(MoveMouseInputDto, toolUse);
      return {
        kind: 'move',
        coordinates: checkBounds(input.coordinates, display, toolUse.name),
      };
    }
    case AgentToolName.TypeText: {
      const input = await validateInput(TypeTextInputDto, toolUse);
      return { kind: 'type', text: input.text, sensitive: input.isSensitive };
    }
    case AgentToolName.Scroll: {
      const input = await validateInput(ScrollInputDto, toolUse);
      return {
        kind: 'scroll',
        direction: input.direction,
        amount: input.scrollCount,
        coordinates:
          input.coordinates &&
          checkBounds(input.coordinates, display, toolUse.name),
      };
    }
    case AgentToolName.PressKeys: {
      const input = await validateInput(PressKeysInputDto, toolUse);
      return { kind: 'key', key: input.key.trim() };
    }
    case AgentToolName.Wait: {
      const input = await validateInput(WaitInputDto, toolUse);
      return { kind: 'wait', seconds: input.duration };
    }
    case AgentToolName.Screenshot:
      return { kind: 'screenshot' };
    case AgentToolName.SetTaskStatus: {
      const input = await validateInput(SetTaskStatusInputDto, toolUse);
      return { kind: 'terminate', summary: input.description ?? '' };
    }
    case AgentToolName.ProcessDocumentation: {
      if (!options.navigation) {
        break;
      }
      const input = await validateInput(ProcessDocumentationInputDto, toolUse);
      return { kind: 'navigate_documentation', direction: input.direction };
    }
  }

  throw new UnparseableResponseError(`unknown tool "${toolUse.name}"`);
}

/**
 * Turns a model response into the single action of this turn. The first
 * tool call wins; a response with text and no tool call completes the task.
 */
export async function parseModelResponse(
  blocks: MessageContentBlock[],
  options: ParseOptions,
): Promise<ParsedResponse> {
  const [toolUse, ...ignoredToolUses] = blocks.filter(isToolUseContentBlock);

  if (!toolUse) {
    const text = getTextContent(blocks);
    if (!text) {
      throw new UnparseableResponseError(
        'response contains neither a tool call nor text',
      );
    }
    return {
      action: { kind: 'terminate', summary: text },
      toolUse: null,
      ignoredToolUses: [],
    };
  }

  return {
    action: await toActionRequest(toolUse, options),
    toolUse,
    ignoredToolUses,
  };
}
