/**
 * Logger Utility
 * Category-tagged, timestamped log lines on the console and in a daily log file
 */

import * as fs from 'fs';
import * as path from 'path';
import { ENV } from '../config/env.js';

const LOG_FILE = path.join(ENV.LOG_DIR, `robot-link-${new Date().toISOString().slice(0, 10)}.log`);

let fileLogging = ENV.LOG_TO_FILE;

if (fileLogging) {
  try {
    if (!fs.existsSync(ENV.LOG_DIR)) {
      fs.mkdirSync(ENV.LOG_DIR, { recursive: true });
    }
  } catch (e) {
    console.error('Failed to create log directory, file logging disabled:', e);
    fileLogging = false;
  }
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
  ts: number;
}

export type LogListener = (entry: LogEntry) => void;
const listeners: Set<LogListener> = new Set();

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => listeners.delete(listener);
}

function formatTime(ts: number): string {
  const d = new Date(ts);
  return d.toISOString().slice(11, 23); // HH:mm:ss.SSS
}

// Frames and audio uploads are summarized, never dumped
export function simplifyData(data: unknown): unknown {
  if (data === undefined || data === null) return data;

  if (data instanceof Uint8Array) {
    return `[binary ${data.byteLength} bytes]`;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (typeof data === 'string') {
    return data.length > 500 ? data.slice(0, 500) + '...' : data;
  }

  if (typeof data === 'object') {
    if (Array.isArray(data)) {
      return data.slice(0, 10).map(simplifyData);
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = simplifyData(value);
    }
    return result;
  }

  return data;
}

function emit(entry: LogEntry): void {
  const prefix = `[${formatTime(entry.ts)}] [${entry.level}] [${entry.category}]`;

  const logFn = entry.level === 'ERROR' ? console.error :
                entry.level === 'WARN' ? console.warn :
                console.log;

  const simplifiedData = simplifyData(entry.data);

  if (simplifiedData !== undefined) {
    logFn(`${prefix} ${entry.message}`, simplifiedData);
  } else {
    logFn(`${prefix} ${entry.message}`);
  }

  if (fileLogging) {
    try {
      const dataStr = simplifiedData !== undefined ? ` ${JSON.stringify(simplifiedData)}` : '';
      fs.appendFileSync(LOG_FILE, `${prefix} ${entry.message}${dataStr}\n`);
    } catch (e) {
      fileLogging = false;
      console.error(`Failed to write ${LOG_FILE}, file logging disabled:`, e);
    }
  }

  listeners.forEach(l => l({ ...entry, data: simplifiedData }));
}

export function debug(category: string, message: string, data?: unknown): void {
  if (!ENV.DEBUG) return;
  emit({ level: 'DEBUG', category, message, data, ts: Date.now() });
}

export function info(category: string, message: string, data?: unknown): void {
  emit({ level: 'INFO', category, message, data, ts: Date.now() });
}

export function warn(category: string, message: string, data?: unknown): void {
  emit({ level: 'WARN', category, message, data, ts: Date.now() });
}

export function error(category: string, message: string, data?: unknown): void {
  emit({ level: 'ERROR', category, message, data, ts: Date.now() });
}

export const logger = { debug, info, warn, error, addLogListener };
