import { Module } from '@nestjs/common';
import { COMPUTER_ACTION_EXECUTOR } from '../agent/agent.types';
import { ActionExecutorService } from './action-executor.service';
import { NutService } from './nut.service';

@Module({
  providers: [
    NutService,
    ActionExecutorService,
    { provide: COMPUTER_ACTION_EXECUTOR, useExisting: ActionExecutorService },
  ],
  exports: [COMPUTER_ACTION_EXECUTOR],
})
export class ExecutorModule {}
