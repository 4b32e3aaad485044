import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { logConfig } from '../connections/config/app.config';

type LogMeta = Record<string, unknown>;

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private toFile: boolean;
  private logDir: string;

  constructor() {
    this.logLevel = logConfig.level;
    this.rotation = logConfig.rotation;
    this.retention = logConfig.retention;
    this.compression = logConfig.compression;
    this.toFile = logConfig.toFile;
    this.logDir = path.resolve(process.cwd(), logConfig.dir);

    if (this.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackLabel}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(prefix: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
    }));

    if (this.toFile) {
      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
      // combined log takes every level
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }
}

const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export const getModuleLogger = (name: string): winston.Logger => logger.child({ module: name });

/**
 * The subset of the logger that engine components write to.
 * Tests hand in doubles for it.
 */
export type EngineLogger = Pick<winston.Logger, 'info' | 'warn' | 'error'>;

export function auditLog(event: string, details: LogMeta = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
