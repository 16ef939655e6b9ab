/**
 * Debug logger for the Flowport CLI
 * Writes debug output to .flowport/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const FLOWPORT_DIR = '.flowport';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Override the log file location. Passing null restores discovery.
 */
export function setLogPath(filePath: string | null): void {
  logFilePath = filePath;
  sessionStarted = false;
}

/**
 * Get the debug log file path
 * FLOWPORT_LOG_DIR wins, then a local .flowport directory, then the home directory
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const envDir = process.env.FLOWPORT_LOG_DIR;
    const localDir = path.join(process.cwd(), FLOWPORT_DIR);

    let dir: string;
    if (envDir) {
      dir = envDir;
    } else if (fs.existsSync(localDir)) {
      dir = localDir;
    } else {
      dir = path.join(homedir(), FLOWPORT_DIR);
    }

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    logFilePath = path.join(dir, DEBUG_LOG_FILE);
  }
  return logFilePath;
}

/**
 * Initialize logging session with separator
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();

  // Rotate log if too large
  if (fs.existsSync(logPath) && fs.statSync(logPath).size > MAX_LOG_SIZE) {
    const backupPath = logPath + '.old';
    fs.rmSync(backupPath, { force: true });
    fs.renameSync(logPath, backupPath);
  }

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  fs.appendFileSync(logPath, `\n${separator}\n[${timestamp}] Flowport CLI Session Started\n${separator}\n`);
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown, timestamp = new Date()): string {
  let entry = `[${timestamp.toISOString()}] [${level}] ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      entry += `\n  Error: ${data.message}`;
      if (data.stack) {
        entry += `\n  Stack: ${data.stack}`;
      }
    } else if (typeof data === 'object') {
      let serialized: string;
      try {
        serialized = JSON.stringify(data, null, 2).split('\n').join('\n  ');
      } catch {
        serialized = '[Could not serialize]';
      }
      entry += `\n  Data: ${serialized}`;
    } else {
      entry += `\n  Data: ${String(data)}`;
    }
  }

  return entry + '\n';
}

/**
 * Write to the debug log
 */
function writeLog(level: string, message: string, data?: unknown): void {
  try {
    initSession();
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch (err) {
    if (process.env.FLOWPORT_DEBUG) {
      process.stderr.write(`flowport: debug log unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(context: string, error: unknown, additionalData?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  debug: (message: string, data?: unknown) => void;
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
  };
}
