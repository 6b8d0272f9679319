import { Module } from '@nestjs/common';
import { AGENT_MODEL_SERVICE } from '../agent/agent.types';
import { AnthropicService } from './anthropic.service';

@Module({
  providers: [
    AnthropicService,
    { provide: AGENT_MODEL_SERVICE, useExisting: AnthropicService },
  ],
  exports: [AnthropicService, AGENT_MODEL_SERVICE],
})
export class AnthropicModule {}
