import { Injectable, Logger } from '@nestjs/common';
import {
  Button as NutButton,
  FileType,
  Key,
  Point,
  keyboard,
  mouse,
  screen,
} from '@nut-tree-fork/nut-js';
import { Button, Coordinates, ScrollDirection } from '@procdoc/shared';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describeError } from '../common/procdoc.errors';

// Key names the model tends to use, mapped onto nut-js key names
const KEY_ALIASES: Record<string, string> = {
  ctrl: 'LeftControl',
  control: 'LeftControl',
  shift: 'LeftShift',
  alt: 'LeftAlt',
  option: 'LeftAlt',
  cmd: 'LeftMeta',
  meta: 'LeftMeta',
  super: 'LeftSuper',
  win: 'LeftSuper',
  windows: 'LeftSuper',
  enter: 'Enter',
  return: 'Enter',
  ret: 'Enter',
  esc: 'Escape',
  spacebar: 'Space',
  backspace: 'Backspace',
  del: 'Delete',
  pageup: 'PageUp',
  page_up: 'PageUp',
  pagedown: 'PageDown',
  page_down: 'PageDown',
  arrowup: 'Up',
  arrowdown: 'Down',
  arrowleft: 'Left',
  arrowright: 'Right',
};

// nut-js Key is a numeric enum; keep the name → value half only
const NutKeyMapLowercase: Record<string, Key> = {};
for (const [name, value] of Object.entries(Key)) {
  if (typeof value !== 'string') {
    NutKeyMapLowercase[name.toLowerCase()] = value;
  }
}

type KeyInfo = { keyCode: Key; withShift: boolean };

const SPECIAL_CHARACTERS: Record<string, KeyInfo> = {
  ' ': { keyCode: Key.Space, withShift: false },
  '.': { keyCode: Key.Period, withShift: false },
  ',': { keyCode: Key.Comma, withShift: false },
  ';': { keyCode: Key.Semicolon, withShift: false },
  "'": { keyCode: Key.Quote, withShift: false },
  '`': { keyCode: Key.Grave, withShift: false },
  '-': { keyCode: Key.Minus, withShift: false },
  '=': { keyCode: Key.Equal, withShift: false },
  '[': { keyCode: Key.LeftBracket, withShift: false },
  ']': { keyCode: Key.RightBracket, withShift: false },
  '\\': { keyCode: Key.Backslash, withShift: false },
  '/': { keyCode: Key.Slash, withShift: false },
  '!': { keyCode: Key.Num1, withShift: true },
  '@': { keyCode: Key.Num2, withShift: true },
  '#': { keyCode: Key.Num3, withShift: true },
  $: { keyCode: Key.Num4, withShift: true },
  '%': { keyCode: Key.Num5, withShift: true },
  '^': { keyCode: Key.Num6, withShift: true },
  '&': { keyCode: Key.Num7, withShift: true },
  '*': { keyCode: Key.Num8, withShift: true },
  '(': { keyCode: Key.Num9, withShift: true },
  ')': { keyCode: Key.Num0, withShift: true },
  _: { keyCode: Key.Minus, withShift: true },
  '+': { keyCode: Key.Equal, withShift: true },
  '{': { keyCode: Key.LeftBracket, withShift: true },
  '}': { keyCode: Key.RightBracket, withShift: true },
  '|': { keyCode: Key.Backslash, withShift: true },
  ':': { keyCode: Key.Semicolon, withShift: true },
  '"': { keyCode: Key.Quote, withShift: true },
  '<': { keyCode: Key.Comma, withShift: true },
  '>': { keyCode: Key.Period, withShift: true },
  '?': { keyCode: Key.Slash, withShift: true },
  '~': { keyCode: Key.Grave, withShift: true },
  '\n': { keyCode: Key.Enter, withShift: false },
  '\r': { keyCode: Key.Enter, withShift: false },
};

const BUTTONS: Record<Button, NutButton> = {
  left: NutButton.LEFT,
  right: NutButton.RIGHT,
  middle: NutButton.MIDDLE,
};

/**
 * Thin wrapper over nut-js. Methods throw plain errors; the action executor
 * decides what a failure means for the run.
 */
@Injectable()
export class NutService {
  private readonly logger = new Logger(NutService.name);
  private readonly captureDir = path.join(os.tmpdir(), 'procdoc-captures');

  constructor() {
    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 100;
  }

  /**
   * Presses a key or a "+"-joined combination ("ctrl+shift+t") and
   * releases it again.
   */
  async sendKeys(combination: string): Promise<void> {
    const keys = this.parseKeyInput(combination).map((name) =>
      this.validateKey(name),
    );
    if (keys.length === 0) {
      throw new Error(`No keys in "${combination}"`);
    }
    this.logger.log(`Sending keys: ${combination}`);
    await keyboard.pressKey(...keys);
    await this.delay(100);
    await keyboard.releaseKey(...keys);
  }

  private parseKeyInput(keyInput: string): string[] {
    // "+" on its own is a key, not a separator
    if (keyInput.trim() === '+') {
      return ['Add'];
    }
    return keyInput
      .split('+')
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);
  }

  private validateKey(name: string): Key {
    const lower = name.toLowerCase();
    const nutKey =
      NutKeyMapLowercase[(KEY_ALIASES[lower] ?? name).toLowerCase()];
    if (nutKey === undefined) {
      throw new Error(`Invalid key: '${name}'`);
    }
    return nutKey;
  }

  private charToKeyInfo(char: string): KeyInfo | null {
    if (/^[a-z0-9]$/.test(char)) {
      return {
        keyCode: this.validateKey(/^[0-9]$/.test(char) ? `Num${char}` : char),
        withShift: false,
      };
    }
    if (/^[A-Z]$/.test(char)) {
      return { keyCode: this.validateKey(char.toLowerCase()), withShift: true };
    }
    return SPECIAL_CHARACTERS[char] ?? null;
  }

  /**
   * Types text key by key. A newline presses Enter; "\r\n" counts once.
   */
  async typeText(text: string, delayMs = 0): Promise<void> {
    this.logger.log(`Typing ${text.length} characters`);
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '\r' && text[i + 1] === '\n') {
        continue;
      }
      const keyInfo = this.charToKeyInfo(char);
      if (!keyInfo) {
        throw new Error(
          `No key mapping for character code ${char.charCodeAt(0)}`,
        );
      }

      const keys = keyInfo.withShift
        ? [Key.LeftShift, keyInfo.keyCode]
        : [keyInfo.keyCode];
      await keyboard.pressKey(...keys);
      await keyboard.releaseKey(...keys);

      if (delayMs > 0 && i < text.length - 1) {
        await this.delay(delayMs);
      }
    }
  }

  async mouseMoveEvent({ x, y }: Coordinates): Promise<void> {
    this.logger.log(`Moving mouse to coordinates: (${x}, ${y})`);
    await mouse.setPosition(new Point(x, y));
  }

  async mouseClickEvent(button: Button, clickCount = 1): Promise<void> {
    this.logger.log(`Mouse ${button} click x${clickCount}`);
    if (clickCount === 2) {
      await mouse.doubleClick(BUTTONS[button]);
      return;
    }
    for (let i = 0; i < clickCount; i++) {
      await mouse.click(BUTTONS[button]);
    }
  }

  async mouseWheelEvent(
    direction: ScrollDirection,
    amount: number,
  ): Promise<void> {
    this.logger.log(`Mouse wheel event: ${direction} ${amount}`);
    switch (direction) {
      case 'up':
        await mouse.scrollUp(amount);
        break;
      case 'down':
        await mouse.scrollDown(amount);
        break;
      case 'left':
        await mouse.scrollLeft(amount);
        break;
      case 'right':
        await mouse.scrollRight(amount);
        break;
    }
  }

  /**
   * Takes a screenshot of the screen.
   *
   * @returns the PNG bytes
   */
  async screendump(): Promise<Buffer> {
    const filename = `screenshot-${Date.now()}`;
    await fs.mkdir(this.captureDir, { recursive: true });
    const filepath = await screen.capture(
      filename,
      FileType.PNG,
      this.captureDir,
    );
    try {
      return await fs.readFile(filepath);
    } finally {
      await fs.unlink(filepath).catch((error: unknown) => {
        this.logger.warn(
          `Failed to remove temporary screenshot file: ${describeError(error)}`,
        );
      });
    }
  }

  async getCursorPosition(): Promise<Coordinates> {
    const position = await mouse.getPosition();
    return { x: position.x, y: position.y };
  }

  async getScreenSize(): Promise<{ width: number; height: number }> {
    const [width, height] = await Promise.all([screen.width(), screen.height()]);
    return { width, height };
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
