/**
 * Debug logger for the solbuild CLI
 * Writes debug output to .solbuild/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import type { ResolverLogger } from '@solbuild/resolver';

const SOLBUILD_DIR = '.solbuild';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    // Prefer a project-local .solbuild, otherwise the home directory
    const localDir = path.join(process.cwd(), SOLBUILD_DIR);
    const homeDir = path.join(homedir(), SOLBUILD_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

/**
 * Point the logger somewhere else. Resets the session.
 */
export function setLogPath(filepath: string): void {
  logFilePath = filepath;
  sessionStarted = false;
}

function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) {
    return;
  }
  const backupPath = `${logPath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();
  rotate(logPath);

  const separator = '='.repeat(80);
  fs.appendFileSync(logPath, `\n${separator}\n[${new Date().toISOString()}] solbuild session started\n${separator}\n`);
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown, now = new Date()): string {
  let entry = `[${now.toISOString()}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (typeof data === 'object' && data !== null) {
    entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
  } else if (data !== undefined) {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

/**
 * Write failures are only reported when SOLBUILD_DEBUG is set
 */
function writeLog(level: string, message: string, data?: unknown): void {
  try {
    initSession();
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch (error) {
    if (process.env.SOLBUILD_DEBUG) {
      console.error(`solbuild: could not write debug log: ${String(error)}`);
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

export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(context: string, error: unknown, additionalData?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = { context, ...additionalData };

  if (error instanceof Error) {
    errorData.errorName = error.name;
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger extends ResolverLogger {
  error(message: string, data?: unknown): void;
  command(cmd: string, args?: Record<string, unknown>): void;
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
    command: (cmd, args) => logCommand(`[${commandName}] ${cmd}`, args),
  };
}
