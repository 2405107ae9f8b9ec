/**
 * Course Slots Logger - structured logging for the fetch and merge runs
 * Provides component-tagged levels, colors, progress bars and file output
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

const LEVEL_COLORS: Record<Exclude<LogLevel, LogLevel.SILENT>, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.dim,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.DEBUG_SLOTS === 'true') return LogLevel.DEBUG;
  const named = env.LOG_LEVEL ? LEVELS_BY_NAME[env.LOG_LEVEL.toLowerCase()] : undefined;
  return named ?? LogLevel.INFO;
}

export class Logger {
  private minLevel: LogLevel;
  private logDir: string;
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  constructor(minLevel: LogLevel = levelFromEnv(), logDir: string = path.join(process.cwd(), 'logs')) {
    this.minLevel = minLevel;
    this.logDir = logDir;
  }

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  /**
   * Start a new log session with timestamped file
   */
  startSession(name: string = 'slots') {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${timestamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: Exclude<LogLevel, LogLevel.SILENT>, component: string, message: string, data?: unknown) {
    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];

    // Session file keeps everything, console honours the level
    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data });
    }

    if (level < this.minLevel) return;

    const prefix = `${chalk.dim(timestamp)} ${LEVEL_COLORS[level](levelName.padEnd(5))}`;
    const line = `${prefix} ${chalk.cyan(`[${component}]`)} ${message}`;

    // stderr for problems so stdout stays clean for piping
    if (level >= LogLevel.WARN) {
      console.error(line);
    } else {
      console.log(line);
    }

    if (data !== undefined && this.minLevel === LogLevel.DEBUG) {
      console.log(chalk.dim(`  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}`));
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Log progress for batch operations
   */
  progress(component: string, current: number, total: number, item: string, extra?: string) {
    if (this.logFile) {
      this.logBuffer.push({
        timestamp: this.formatTime(),
        level: 'INFO',
        component,
        message: `${current}/${total} ${item}${extra ? ` (${extra})` : ''}`,
      });
    }
    if (LogLevel.INFO < this.minLevel) return;

    const pct = total > 0 ? Math.round((current / total) * 100) : 100;
    const filled = Math.floor(pct / 5);
    const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
    const extraStr = extra ? ` ${chalk.dim(`(${extra})`)}` : '';
    console.log(`${chalk.dim(this.formatTime())} ${chalk.blue(bar)} ${current}/${total} ${item}${extraStr}`);
  }

  /**
   * Log a summary table
   */
  summary(title: string, data: Record<string, number | string>) {
    if (LogLevel.INFO < this.minLevel) return;

    console.log(`\n${chalk.cyan(`╭${'─'.repeat(48)}╮`)}`);
    console.log(`${chalk.cyan('│')} ${chalk.green(title.padEnd(47))}${chalk.cyan('│')}`);
    console.log(chalk.cyan(`├${'─'.repeat(48)}┤`));

    for (const [key, value] of Object.entries(data)) {
      const valueStr = typeof value === 'number' ? value.toLocaleString() : value;
      console.log(`${chalk.cyan('│')}  ${key.padEnd(25)} ${String(valueStr).padStart(20)} ${chalk.cyan('│')}`);
    }

    console.log(`${chalk.cyan(`╰${'─'.repeat(48)}╯`)}\n`);
  }

  /**
   * Flush log buffer to file
   */
  flush() {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer.map(entry =>
        `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`
      ).join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
