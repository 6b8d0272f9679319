import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ComputerAction,
  TerminateAction,
  describeAction,
  isTerminateAction,
} from '@procdoc/shared';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ComputerActionExecutor, Observation } from '../agent/agent.types';
import { AgentConfig, agentConfig } from '../config/agent.config';
import { ExecutionError, describeError } from '../common/procdoc.errors';
import { NutService } from './nut.service';

@Injectable()
export class ActionExecutorService implements ComputerActionExecutor {
  private readonly logger = new Logger(ActionExecutorService.name);

  constructor(
    private readonly nutService: NutService,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  /** Fails fast when the screen does not match the model's coordinate space. */
  async verifyDisplay(): Promise<void> {
    const expected = this.config.display;
    let actual: { width: number; height: number };
    try {
      actual = await this.nutService.getScreenSize();
    } catch (error) {
      throw new ExecutionError(
        `Cannot read the display size: ${describeError(error)}`,
        { cause: error },
      );
    }
    if (actual.width !== expected.width || actual.height !== expected.height) {
      throw new ExecutionError(
        `Display is ${actual.width}x${actual.height}, expected ${expected.width}x${expected.height}`,
      );
    }
    this.logger.log(`Display verified at ${actual.width}x${actual.height}`);
  }

  execute(action: TerminateAction, turnIndex: number): Promise<null>;
  execute(action: ComputerAction, turnIndex: number): Promise<Observation>;
  async execute(
    action: ComputerAction | TerminateAction,
    turnIndex: number,
  ): Promise<Observation | null> {
    if (isTerminateAction(action)) {
      this.logger.log(`Turn ${turnIndex}: task completed`);
      return null;
    }

    this.logger.log(`Turn ${turnIndex}: ${describeAction(action)}`);
    try {
      switch (action.kind) {
        case 'move':
          await this.nutService.mouseMoveEvent(action.coordinates);
          break;
        case 'click':
          if (action.coordinates) {
            await this.nutService.mouseMoveEvent(action.coordinates);
          }
          await this.nutService.mouseClickEvent(
            action.button,
            action.clickCount,
          );
          break;
        case 'type':
          await this.nutService.typeText(
            action.text,
            this.config.typingDelayMs,
          );
          break;
        case 'scroll':
          if (action.coordinates) {
            await this.nutService.mouseMoveEvent(action.coordinates);
          }
          await this.nutService.mouseWheelEvent(
            action.direction,
            action.amount,
          );
          break;
        case 'key':
          await this.nutService.sendKeys(action.key);
          break;
        case 'wait':
          await this.delay(action.seconds * 1000);
          break;
        case 'screenshot':
          break;
      }
    } catch (error) {
      throw new ExecutionError(
        `Failed to ${describeAction(action)}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (action.kind !== 'screenshot' && action.kind !== 'wait') {
      await this.delay(this.config.actionSettleMs);
    }
    return this.capture(turnIndex);
  }

  async capture(turnIndex: number): Promise<Observation> {
    let image: Buffer;
    let cursor: Observation['cursor'];
    try {
      image = await this.nutService.screendump();
      cursor = await this.nutService.getCursorPosition();
    } catch (error) {
      throw new ExecutionError(
        `Failed to take screenshot: ${describeError(error)}`,
        { cause: error },
      );
    }

    const observation: Observation = {
      screenshot: image.toString('base64'),
      cursor,
      turnIndex,
      capturedAt: new Date(),
    };
    if (this.config.screenshotDir) {
      await this.persist(this.config.screenshotDir, image, observation);
    }
    return observation;
  }

  private async persist(
    directory: string,
    image: Buffer,
    observation: Observation,
  ): Promise<void> {
    const file = path.join(
      directory,
      `turn-${String(observation.turnIndex).padStart(3, '0')}-${observation.capturedAt.getTime()}.png`,
    );
    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(file, image);
      this.logger.debug(`Saved screenshot to ${file}`);
    } catch (error) {
      this.logger.warn(
        `Failed to save screenshot ${file}: ${describeError(error)}`,
      );
    }
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
