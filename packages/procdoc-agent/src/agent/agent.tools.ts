import { DisplaySize } from '../config/agent.config';

export type AgentToolDefinition = {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

export const AgentToolName = {
  ClickMouse: 'computer_click_mouse',
  MoveMouse: 'computer_move_mouse',
  TypeText: 'computer_type_text',
  Scroll: 'computer_scroll',
  PressKeys: 'computer_press_keys',
  Wait: 'computer_wait',
  Screenshot: 'computer_screenshot',
  SetTaskStatus: 'set_task_status',
  ProcessDocumentation: 'process_documentation',
} as const;

export type AgentToolName = (typeof AgentToolName)[keyof typeof AgentToolName];

export const MAX_WAIT_SECONDS = 30;
export const MAX_SCROLL_AMOUNT = 30;

/**
 * Common schema definitions for reuse
 */
const coordinateSchema = (display: DisplaySize) => ({
  type: 'object' as const,
  properties: {
    x: {
      type: 'integer' as const,
      description: `The x-coordinate, 0 to ${display.width - 1}`,
    },
    y: {
      type: 'integer' as const,
      description: `The y-coordinate, 0 to ${display.height - 1}`,
    },
  },
  required: ['x', 'y'],
});

export function buildAgentTools(options: {
  display: DisplaySize;
  navigation: boolean;
}): AgentToolDefinition[] {
  const coordinates = coordinateSchema(options.display);

  const tools: AgentToolDefinition[] = [
    {
      name: AgentToolName.ClickMouse,
      description:
        'Clicks a mouse button, moving to the coordinates first when they are given',
      input_schema: {
        type: 'object',
        properties: {
          coordinates: {
            ...coordinates,
            description: 'Optional click target (defaults to the current position)',
          },
          button: {
            type: 'string',
            enum: ['left', 'right', 'middle'],
            description: 'The mouse button (default left)',
          },
          clickCount: {
            type: 'integer',
            minimum: 1,
            maximum: 3,
            description: 'Number of clicks, 2 for a double click (default 1)',
          },
        },
      },
    },
    {
      name: AgentToolName.MoveMouse,
      description: 'Moves the mouse cursor to the specified coordinates',
      input_schema: {
        type: 'object',
        properties: { coordinates },
        required: ['coordinates'],
      },
    },
    {
      name: AgentToolName.TypeText,
      description:
        'Types the text as keystrokes into the focused element; a newline presses Enter',
      input_schema: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'The text to type' },
          isSensitive: {
            type: 'boolean',
            description: 'Set for passwords and other secrets',
          },
        },
        required: ['text'],
      },
    },
    {
      name: AgentToolName.Scroll,
      description: 'Scrolls the mouse wheel, optionally at the given coordinates',
      input_schema: {
        type: 'object',
        properties: {
          direction: {
            type: 'string',
            enum: ['up', 'down', 'left', 'right'],
            description: 'The direction to scroll',
          },
          scrollCount: {
            type: 'integer',
            minimum: 1,
            maximum: MAX_SCROLL_AMOUNT,
            description: 'Number of wheel steps',
          },
          coordinates: {
            ...coordinates,
            description: 'Optional position to scroll at',
          },
        },
        required: ['direction', 'scrollCount'],
      },
    },
    {
      name: AgentToolName.PressKeys,
      description:
        'Presses a key or a key combination, e.g. "Return", "Tab" or "ctrl+l"',
      input_schema: {
        type: 'object',
        properties: {
          key: {
            type: 'string',
            description: 'Key name, or names joined with "+" for a combination',
          },
        },
        required: ['key'],
      },
    },
    {
      name: AgentToolName.Wait,
      description: 'Waits before taking the next screenshot',
      input_schema: {
        type: 'object',
        properties: {
          duration: {
            type: 'number',
            minimum: 0,
            maximum: MAX_WAIT_SECONDS,
            description: 'Seconds to wait',
          },
        },
        required: ['duration'],
      },
    },
    {
      name: AgentToolName.Screenshot,
      description: 'Takes a new screenshot without touching anything',
      input_schema: { type: 'object', properties: {} },
    },
    {
      name: AgentToolName.SetTaskStatus,
      description:
        'Marks the task as completed. Call it only once the task is verifiably done',
      input_schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['completed'],
            description: 'The task status',
          },
          description: {
            type: 'string',
            description: 'Short summary of what was done',
          },
        },
        required: ['status', 'description'],
      },
    },
  ];

  if (options.navigation) {
    tools.push({
      name: AgentToolName.ProcessDocumentation,
      description:
        'Reads the process documentation one step at a time: "curr" returns the current step, "next" and "prev" move to the following or preceding step and return it',
      input_schema: {
        type: 'object',
        properties: {
          direction: {
            type: 'string',
            enum: ['next', 'prev', 'curr'],
            description: 'Which step to read',
          },
        },
        required: ['direction'],
      },
    });
  }

  return tools;
}
