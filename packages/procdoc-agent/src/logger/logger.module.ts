import { Global, Module } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { AgentConfig, agentConfig } from '../config/agent.config';
import { SecretRedactor } from './secret-redactor';
import { createWinstonLogger } from './winston-logger.service';

@Global()
@Module({
  providers: [SecretRedactor],
  exports: [SecretRedactor],
})
export class SecretRedactionModule {}

@Module({
  imports: [
    SecretRedactionModule,
    WinstonModule.forRootAsync({
      imports: [SecretRedactionModule],
      inject: [agentConfig.KEY, SecretRedactor],
      useFactory: (config: AgentConfig, redactor: SecretRedactor) => ({
        instance: createWinstonLogger(config.logging, redactor),
      }),
    }),
  ],
  exports: [WinstonModule, SecretRedactionModule],
})
export class LoggerModule {}
