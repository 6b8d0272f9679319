import {
  MessageContentBlock,
  MessageContentType,
  ToolUseContentBlock,
} from '@procdoc/shared';
import { UnparseableResponseError } from '../common/procdoc.errors';
import { ParseOptions, parseModelResponse } from './tool-call.parser';

const options: ParseOptions = {
  display: { width: 1280, height: 800 },
  navigation: false,
};

function toolUse(name: string, input: unknown, id = 'toolu_1'): ToolUseContentBlock {
  return { type: MessageContentType.ToolUse, id, name, input };
}

async function parseAction(name: string, input: unknown, parseOptions = options) {
  const parsed = await parseModelResponse([toolUse(name, input)], parseOptions);
  return parsed.action;
}

describe('parseModelResponse', () => {
  describe('tool calls', () => {
    it('maps a click with defaults', async () => {
      await expect(
        parseAction('computer_click_mouse', { coordinates: { x: 100, y: 200 } }),
      ).resolves.toEqual({
        kind: 'click',
        coordinates: { x: 100, y: 200 },
        button: 'left',
        clickCount: 1,
      });
    });

    it('clicks in place when no coordinates are given', async () => {
      await expect(
        parseAction('computer_click_mouse', { button: 'right', clickCount: 2 }),
      ).resolves.toEqual({ kind: 'click', button: 'right', clickCount: 2 });
    });

    it('maps scroll, key, wait and type inputs', async () => {
      await expect(
        parseAction('computer_scroll', { direction: 'down', scrollCount: 3 }),
      ).resolves.toEqual({ kind: 'scroll', direction: 'down', amount: 3 });
      await expect(
        parseAction('computer_press_keys', { key: ' ctrl+l ' }),
      ).resolves.toEqual({ kind: 'key', key: 'ctrl+l' });
      await expect(
        parseAction('computer_wait', { duration: 2 }),
      ).resolves.toEqual({ kind: 'wait', seconds: 2 });
      await expect(
        parseAction('computer_type_text', { text: 'hunter', isSensitive: true }),
      ).resolves.toEqual({ kind: 'type', text: 'hunter', sensitive: true });
    });

    it('maps a screenshot request', async () => {
      await expect(parseAction('computer_screenshot', {})).resolves.toEqual({
        kind: 'screenshot',
      });
    });

    it('turns set_task_status into terminate', async () => {
      await expect(
        parseAction('set_task_status', {
          status: 'completed',
          description: 'Invoice saved',
        }),
      ).resolves.toEqual({ kind: 'terminate', summary: 'Invoice saved' });
    });

    it('offers navigation only when it is enabled', async () => {
      await expect(
        parseAction('process_documentation', { direction: 'next' }),
      ).rejects.toMatchObject({ detail: 'unknown tool "process_documentation"' });
      await expect(
        parseAction(
          'process_documentation',
          { direction: 'next' },
          { ...options, navigation: true },
        ),
      ).resolves.toEqual({ kind: 'navigate_documentation', direction: 'next' });
    });

    it('acts on the first tool call and reports the rest', async () => {
      const first = toolUse('computer_screenshot', {}, 'toolu_1');
      const second = toolUse('computer_wait', { duration: 1 }, 'toolu_2');
      const blocks: MessageContentBlock[] = [
        { type: MessageContentType.Thinking, thinking: 'look first', signature: 'sig' },
        { type: MessageContentType.Text, text: 'Let me look.' },
        first,
        second,
      ];

      await expect(parseModelResponse(blocks, options)).resolves.toEqual({
        action: { kind: 'screenshot' },
        toolUse: first,
        ignoredToolUses: [second],
      });
    });
  });

  describe('text answers', () => {
    it('treats text without a tool call as completion', async () => {
      await expect(
        parseModelResponse(
          [{ type: MessageContentType.Text, text: ' All done. ' }],
          options,
        ),
      ).resolves.toEqual({
        action: { kind: 'terminate', summary: 'All done.' },
        toolUse: null,
        ignoredToolUses: [],
      });
    });
  });

  describe('unparseable responses', () => {
    it('rejects an empty response', async () => {
      const result = parseModelResponse([], options);

      await expect(result).rejects.toBeInstanceOf(UnparseableResponseError);
      await expect(result).rejects.toMatchObject({
        message: 'unparseable model response',
        detail: 'response contains neither a tool call nor text',
      });
    });

    it('rejects unknown tools', async () => {
      await expect(parseAction('browse', {})).rejects.toMatchObject({
        detail: 'unknown tool "browse"',
      });
    });

    it('rejects input that is not an object', async () => {
      await expect(
        parseAction('computer_click_mouse', 'left'),
      ).rejects.toMatchObject({
        detail: 'computer_click_mouse input is not an object',
      });
    });

    it('rejects input that fails validation', async () => {
      await expect(
        parseAction('computer_scroll', { direction: 'sideways', scrollCount: 3 }),
      ).rejects.toMatchObject({
        detail: expect.stringContaining(
          'invalid computer_scroll input: direction: direction must be one of the following values',
        ),
      });
    });

    it('rejects coordinates outside the display', async () => {
      await expect(
        parseAction('computer_move_mouse', { coordinates: { x: 1280, y: 10 } }),
      ).rejects.toMatchObject({
        detail:
          'computer_move_mouse coordinates (1280, 10) are outside the 1280x800 display',
      });
    });

    it('rejects a move without coordinates', async () => {
      const result = parseAction('computer_move_mouse', {});

      await expect(result).rejects.toBeInstanceOf(UnparseableResponseError);
      await expect(result).rejects.toMatchObject({
        detail: expect.stringContaining(
          'invalid computer_move_mouse input: coordinates: coordinates must be an object',
        ),
      });
    });

    it('rejects null coordinates on click and scroll', async () => {
      await expect(
        parseAction('computer_click_mouse', { coordinates: null }),
      ).rejects.toMatchObject({
        detail: expect.stringContaining(
          'coordinates: coordinates must be an object',
        ),
      });
      await expect(
        parseAction('computer_scroll', {
          direction: 'up',
          scrollCount: 1,
          coordinates: null,
        }),
      ).rejects.toBeInstanceOf(UnparseableResponseError);
    });

    it('rejects a wait longer than allowed', async () => {
      await expect(
        parseAction('computer_wait', { duration: 31 }),
      ).rejects.toBeInstanceOf(UnparseableResponseError);
    });
  });
});
