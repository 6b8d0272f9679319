import { Injectable } from '@nestjs/common';
import * as winston from 'winston';

export const REDACTED = '[redacted]';

/**
 * Masks credentials read at startup wherever they would reach a log line,
 * including error messages and stacks that quote them.
 */
@Injectable()
export class SecretRedactor {
  private readonly secrets = new Set<string>();

  register(secret: string): void {
    const value = secret.trim();
    if (value) {
      this.secrets.add(value);
    }
  }

  redact(text: string): string {
    let result = text;
    for (const secret of this.secrets) {
      result = result.replaceAll(secret, REDACTED);
    }
    return result;
  }

  format(): winston.Logform.Format {
    return winston.format((info) => {
      if (typeof info.message === 'string') {
        info.message = this.redact(info.message);
      }
      if (typeof info.stack === 'string') {
        info.stack = this.redact(info.stack);
      }
      return info;
    })();
  }
}
