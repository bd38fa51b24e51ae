import path from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import pino from 'pino';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

// ANSI color codes
const colors = {
  blue: '\x1b[34m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  bold: '\x1b[1m',
  reset: '\x1b[0m',
};

// Color helper functions for use across the codebase
export const red = (text: string): string =>
  `${colors.red}${text}${colors.reset}`;
export const green = (text: string): string =>
  `${colors.green}${text}${colors.reset}`;
export const yellow = (text: string): string =>
  `${colors.yellow}${text}${colors.reset}`;
export const blue = (text: string): string =>
  `${colors.blue}${text}${colors.reset}`;
export const bold = (text: string): string =>
  `${colors.bold}${text}${colors.reset}`;

type RunLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Detailed per-run log. Every message goes here regardless of console
 * verbosity, so the file holds all decisions, retries and failures.
 */
let runLog: pino.Logger | null = null;
let runLogFile: ReturnType<typeof pino.destination> | null = null;

export function createRunLogPath(logDir: string, date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return path.join(logDir, `backup-verify-${stamp}.log`);
}

/**
 * Attach the run log. A string is treated as a file path; anything else is
 * used as the pino destination directly.
 */
export function attachRunLog(
  destination: string | pino.DestinationStream,
): pino.Logger {
  detachRunLog();
  let stream: pino.DestinationStream;
  if (typeof destination === 'string') {
    runLogFile = pino.destination({ dest: destination, sync: true, mkdir: true });
    stream = runLogFile;
  } else {
    stream = destination;
  }

  runLog = pino(
    {
      level: 'debug',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  );
  return runLog;
}

export function detachRunLog(): void {
  runLog = null;
  runLogFile?.end();
  runLogFile = null;
}

function record(level: RunLogLevel, message: string): void {
  const text = stripVTControlCharacters(message).trim();
  if (!runLog || text === '') {
    return;
  }
  runLog[level](text);
}

/**
 * Dry runs report their decisions on the console, so Normal is raised to
 * Info. Quiet and Verbose are left as requested.
 */
export function consoleVerbosity(requested: number, dryRun: boolean): number {
  return dryRun && requested === Verbosity.Normal ? Verbosity.Info : requested;
}

// Duplicate message tracking
const recentMessages = new Set<string>();
const MAX_RECENT_MESSAGES = 10;
const DUPLICATE_TIMEOUT = 1000;

function clearOldMessages(): void {
  if (recentMessages.size > MAX_RECENT_MESSAGES) {
    recentMessages.clear();
  }
  setTimeout(() => {
    recentMessages.clear();
  }, DUPLICATE_TIMEOUT).unref();
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
  allowDuplicates: boolean = true,
): void {
  if (currentVerbosity >= level) {
    if (!allowDuplicates && recentMessages.has(message)) {
      return;
    }

    const formattedMessage = message.endsWith('\n') ? message : message + '\n';
    process.stdout.write(formattedMessage);

    if (!allowDuplicates) {
      recentMessages.add(message);
      clearOldMessages();
    }
  }
}

export function error(message: string): void {
  record('error', message);
  process.stdout.write(red(`❌ ${message}`) + '\n');
}

export function warning(message: string, currentVerbosity: number): void {
  record('warn', message);
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function info(message: string, currentVerbosity: number): void {
  record('info', message);
  log(blue(`ℹ️  ${message}`), Verbosity.Info, currentVerbosity, false);
}

export function success(message: string, currentVerbosity: number): void {
  record('info', message);
  log(green(`✅ ${message}`), Verbosity.Info, currentVerbosity, true);
}

export function verbose(message: string, currentVerbosity: number): void {
  record('debug', message);
  log(message, Verbosity.Verbose, currentVerbosity, true);
}

export function always(message: string): void {
  record('info', message);
  const formattedMessage = message.endsWith('\n') ? message : message + '\n';
  process.stdout.write(formattedMessage);
}
