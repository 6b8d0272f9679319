import { Module } from '@nestjs/common';
import { AnthropicModule } from '../anthropic/anthropic.module';
import { DocumentationModule } from '../documentation/documentation.module';
import { ExecutorModule } from '../executor/executor.module';
import { AgentLoopDriver } from './agent-loop.driver';
import { TurnProtocolEngine } from './turn-protocol.engine';

@Module({
  imports: [AnthropicModule, DocumentationModule, ExecutorModule],
  providers: [TurnProtocolEngine, AgentLoopDriver],
  exports: [AgentLoopDriver],
})
export class AgentModule {}
