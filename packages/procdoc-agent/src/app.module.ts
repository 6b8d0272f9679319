import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentModule } from './agent/agent.module';
import { AnthropicModule } from './anthropic/anthropic.module';
import { agentConfig } from './config/agent.config';
import { DocumentationModule } from './documentation/documentation.module';
import { LoggerModule } from './logger/logger.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [agentConfig],
    }),
    LoggerModule,
    AgentModule,
    AnthropicModule,
    DocumentationModule,
  ],
})
export class AppModule {}
