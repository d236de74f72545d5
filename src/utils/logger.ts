/**
 * Levelled console logging. Child loggers join their names onto the
 * parent's prefix (`hydrate:trace`) and start at the parent's level.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Channel = Exclude<LogLevel, 'silent'>;

interface ChannelStyle {
  label: string;
  paint: (text: string) => string;
  emit: (line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const CHANNELS: Record<Channel, ChannelStyle> = {
  debug: { label: 'DEBUG', paint: (text) => chalk.gray(text), emit: (line) => console.log(line) },
  info: { label: 'INFO', paint: (text) => chalk.blue(text), emit: (line) => console.log(line) },
  warn: { label: 'WARN', paint: (text) => chalk.yellow(text), emit: (line) => console.warn(line) },
  error: { label: 'ERROR', paint: (text) => chalk.red(text), emit: (line) => console.error(line) },
};

export class Logger {
  constructor(
    private readonly prefix: string = '',
    private level: LogLevel = 'info'
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(name: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${name}` : name, this.level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  /** An Error cause is written as its stack. */
  error(message: string, cause?: Error | Record<string, unknown>): void {
    this.write('error', message, cause instanceof Error ? cause.stack ?? cause.message : cause);
  }

  private write(channel: Channel, message: string, detail?: string | Record<string, unknown>): void {
    if (SEVERITY[channel] < SEVERITY[this.level]) return;

    const { label, paint, emit } = CHANNELS[channel];
    const scope = this.prefix ? `[${this.prefix}] ` : '';
    emit(paint(`[${label}] ${scope}${message}`));
    if (detail !== undefined) {
      emit(paint(typeof detail === 'string' ? detail : JSON.stringify(detail, null, 2)));
    }
  }
}

export const logger = new Logger();
