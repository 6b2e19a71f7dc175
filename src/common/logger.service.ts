import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { createLogger, format, transports, Logger as WinstonLogger } from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: WinstonLogger;

  constructor(private readonly config: ConfigService) {
    const logTransports: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
      new transports.Console()
    ];

    if (this.config.get<boolean>('logToFile') ?? true) {
      const logDir = this.config.get<string>('logDir') || path.join(process.cwd(), 'logs');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      logTransports.push(new transports.File({ filename: path.join(logDir, 'app.log') }));
    }

    this.logger = createLogger({
      level: this.config.get<string>('logLevel') || 'info',
      silent: this.config.get<boolean>('logSilent') ?? false,
      format: format.combine(format.timestamp(), format.json()),
      transports: logTransports
    });
  }

  log(message: string, ...meta: unknown[]) {
    this.logger.info(message, meta.length ? { meta } : undefined);
  }

  error(message: string, trace?: string, ...meta: unknown[]) {
    this.logger.error(message, { trace, ...(meta.length ? { meta } : {}) });
  }

  warn(message: string, ...meta: unknown[]) {
    this.logger.warn(message, meta.length ? { meta } : undefined);
  }

  debug(message: string, ...meta: unknown[]) {
    this.logger.debug(message, meta.length ? { meta } : undefined);
  }

  verbose(message: string, ...meta: unknown[]) {
    this.logger.verbose(message, meta.length ? { meta } : undefined);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
