import { ConsoleLogger } from '@nestjs/common';
import { LogBuffer } from './log-buffer';

type Level = 'log' | 'error' | 'warn' | 'debug' | 'verbose';

function parseLevels(raw: string | undefined, fallback: string): Set<string> {
  return new Set(
    (raw ?? fallback)
      .toLowerCase()
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  );
}

/**
 * В консоль идут уровни из LOG_LEVEL_CONSOLE (по умолчанию log,warn,error),
 * в буфер в памяти — из LOG_LEVEL_BUFFER (по умолчанию log,warn,error).
 */
export class BufferLogger extends ConsoleLogger {
  private readonly consoleLevels = parseLevels(process.env.LOG_LEVEL_CONSOLE, 'log,warn,error');
  private readonly bufferLevels = parseLevels(process.env.LOG_LEVEL_BUFFER, 'log,warn,error');

  private toBuffer(level: Level, message: unknown, context?: string): void {
    if (!this.bufferLevels.has(level)) return;
    LogBuffer.append(level.toUpperCase(), typeof message === 'string' ? message : JSON.stringify(message), context);
  }

  override log(message: unknown, context?: string): void {
    if (this.consoleLevels.has('log')) super.log(message, context);
    this.toBuffer('log', message, context);
  }

  override error(message: unknown, trace?: string, context?: string): void {
    if (this.consoleLevels.has('error')) super.error(message, trace, context);
    this.toBuffer('error', trace ? `${String(message)} ${trace}` : message, context);
  }

  override warn(message: unknown, context?: string): void {
    if (this.consoleLevels.has('warn')) super.warn(message, context);
    this.toBuffer('warn', message, context);
  }

  override debug(message: unknown, context?: string): void {
    if (this.consoleLevels.has('debug')) super.debug(message, context);
    this.toBuffer('debug', message, context);
  }

  override verbose(message: unknown, context?: string): void {
    if (this.consoleLevels.has('verbose')) super.verbose(message, context);
    this.toBuffer('verbose', message, context);
  }
}
