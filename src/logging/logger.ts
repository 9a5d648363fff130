import chalk from 'chalk';
import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { userInfo } from 'os';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  DEBUG: chalk.cyan,
  INFO: chalk.green,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  FATAL: chalk.bold.red
};

const RULE = '==========================================';

export interface LoggerOptions {
  /** Append-only log file; omitted means terminal only */
  logFile?: string;
  /** Minimum level written anywhere, INFO by default */
  level?: LogLevel;
  /** Scope shown in the file's caller column */
  scope?: string;
  /** Terminal writer; false silences the terminal */
  terminal?: ((line: string) => void) | false;
}

export interface SessionDetails {
  command: string;
  region: string;
  runId: string;
  startedAt?: Date;
}

interface LoggerCore {
  level: LogLevel;
  logFile?: string;
  terminal?: (line: string) => void;
}

/**
 * Leveled logger writing colored lines to the terminal and plain lines to the
 * log file. Children share level and destinations with their parent.
 */
export class Logger {
  private constructor(private readonly core: LoggerCore, readonly scope: string) {}

  static create(options: LoggerOptions = {}): Logger {
    const terminal = options.terminal === false
      ? undefined
      : options.terminal ?? ((line: string) => console.log(line));

    if (options.logFile) {
      mkdirSync(dirname(options.logFile), { recursive: true });
    }

    return new Logger(
      { level: options.level ?? 'INFO', logFile: options.logFile, terminal },
      options.scope ?? 'main'
    );
  }

  child(scope: string): Logger {
    return new Logger(this.core, scope);
  }

  get level(): LogLevel {
    return this.core.level;
  }

  get logFile(): string | undefined {
    return this.core.logFile;
  }

  setLevel(level: LogLevel): void {
    this.core.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.core.level);
  }

  debug(message: string): void {
    this.write('DEBUG', message);
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string): void {
    this.write('ERROR', message);
  }

  fatal(message: string): void {
    this.write('FATAL', message);
  }

  startSession(details: SessionDetails): void {
    if (!this.core.logFile) {
      return;
    }

    const header = [
      '',
      RULE,
      `Log Session Started: ${formatTimestamp(details.startedAt ?? new Date())}`,
      `Command: ${details.command}`,
      `User: ${currentUser()}`,
      `Region: ${details.region || 'Not Set'}`,
      `Session: ${details.runId}`,
      RULE,
      ''
    ];
    appendFileSync(this.core.logFile, header.join('\n') + '\n');
  }

  section(name: string): void {
    this.blank();
    this.info(`>>> Starting: ${name}`);
  }

  sectionEnd(name: string, succeeded: boolean): void {
    if (succeeded) {
      this.info(`<<< Completed: ${name} [SUCCESS]`);
    } else {
      this.error(`<<< Completed: ${name} [FAILED]`);
    }
  }

  summary(title: string, lines: string[]): void {
    this.blank();
    this.info(RULE);
    this.info(title);
    this.info(RULE);
    for (const line of lines) {
      this.info(line);
    }
    this.info(RULE);
  }

  blank(): void {
    this.core.terminal?.('');
    if (this.core.logFile) {
      appendFileSync(this.core.logFile, '\n');
    }
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = formatTimestamp(new Date());

    if (this.core.logFile) {
      appendFileSync(this.core.logFile, `[${timestamp}] [${level}] [${this.scope}] ${message}\n`);
    }

    this.core.terminal?.(`${LEVEL_COLORS[level](`[${timestamp}] [${level}]`)} ${message}`);
  }
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? 'unknown';
  }
}
