import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogRecord {
  level: LogLevel;
  message: string;
  target?: string;
  metadata?: Record<string, unknown>;
}

export interface Logger {
  debug: (record: LogRecord) => void;
  info: (record: LogRecord) => void;
  warn: (record: LogRecord) => void;
  error: (record: LogRecord) => void;
}

/**
 * JSON-lines logger configured from `CGI_CLIENT_LOG_*` variables. Records
 * go to stdout and, when `CGI_CLIENT_LOG_FILE` is set, to a size-rotated
 * file. Metadata that can carry request or response data is redacted
 * unless `CGI_CLIENT_LOG_DEBUG_PAYLOADS` is enabled.
 */
export function createLogger(): Logger {
  const config = resolveConfig();
  return {
    debug: (record) => emit({ ...record, level: 'debug' }, config),
    info: (record) => emit({ ...record, level: 'info' }, config),
    warn: (record) => emit({ ...record, level: 'warn' }, config),
    error: (record) => emit({ ...record, level: 'error' }, config)
  };
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];
const SENSITIVE_KEY_PATTERN = /content|payload|body|stdin|stderr|stdout|query|cookie/i;
const SENSITIVE_EXACT_KEYS = new Set(['environment', 'env', 'input']);
const REDACTED = '[redacted]';

interface LoggerConfig {
  threshold: LogLevel;
  logPath?: string;
  maxBytes: number;
  maxFiles: number;
  debugPayloads: boolean;
}

type EmittedRecord = LogRecord & { timestamp: string };

function emit(record: LogRecord, config: LoggerConfig): void {
  if (LOG_LEVELS.indexOf(record.level) > LOG_LEVELS.indexOf(config.threshold)) {
    return;
  }

  const { metadata, redactedKeys } = redactMetadata(record.metadata, config.debugPayloads);
  if (redactedKeys.length > 0) {
    console.warn('Redacted sensitive metadata keys', redactedKeys);
  }

  const line = JSON.stringify({ ...record, metadata, timestamp: new Date().toISOString() } satisfies EmittedRecord);
  console.log(line);
  if (!config.logPath) {
    return;
  }

  try {
    appendLine(config.logPath, line, config);
  } catch (error) {
    console.error('Failed to write log file', error);
  }
}

function resolveConfig(): LoggerConfig {
  const logPath = process.env.CGI_CLIENT_LOG_FILE || undefined;
  if (logPath) {
    try {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
    } catch (error) {
      console.error('Failed to initialize log file', error);
    }
  }

  return {
    threshold: parseLogLevel(process.env.CGI_CLIENT_LOG_LEVEL) ?? 'info',
    logPath,
    maxBytes: parsePositiveInt(process.env.CGI_CLIENT_LOG_MAX_BYTES, 5 * 1024 * 1024),
    maxFiles: parsePositiveInt(process.env.CGI_CLIENT_LOG_MAX_FILES, 100),
    debugPayloads: parseBoolean(process.env.CGI_CLIENT_LOG_DEBUG_PAYLOADS)
  };
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseBoolean(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

function redactMetadata(
  metadata: Record<string, unknown> | undefined,
  debugPayloads: boolean
): { metadata?: Record<string, unknown>; redactedKeys: string[] } {
  if (!metadata || debugPayloads) {
    return { metadata, redactedKeys: [] };
  }

  const redacted: Record<string, unknown> = {};
  const redactedKeys: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (isSensitiveKey(key)) {
      redacted[key] = REDACTED;
      redactedKeys.push(key);
    } else {
      redacted[key] = value;
    }
  }
  return { metadata: redacted, redactedKeys };
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_EXACT_KEYS.has(key.toLowerCase()) || SENSITIVE_KEY_PATTERN.test(key);
}

function appendLine(logPath: string, line: string, config: LoggerConfig): void {
  const data = `${line}\n`;
  if (needsRotation(logPath, Buffer.byteLength(data), config.maxBytes)) {
    rotate(logPath, config.maxFiles);
  }
  fs.appendFileSync(logPath, data, { encoding: 'utf-8' });
}

function needsRotation(logPath: string, nextWriteBytes: number, maxBytes: number): boolean {
  try {
    return fs.existsSync(logPath) && fs.statSync(logPath).size + nextWriteBytes > maxBytes;
  } catch (error) {
    console.error('Failed to stat log file for rotation', error);
    return false;
  }
}

// file.N-1 -> file.N for each kept generation, then file -> file.1.
function rotate(logPath: string, maxFiles: number): void {
  try {
    fs.rmSync(`${logPath}.${maxFiles}`, { force: true });
    for (let index = maxFiles - 1; index >= 1; index -= 1) {
      const source = `${logPath}.${index}`;
      if (fs.existsSync(source)) {
        fs.renameSync(source, `${logPath}.${index + 1}`);
      }
    }
    fs.renameSync(logPath, `${logPath}.1`);
  } catch (error) {
    console.error('Failed to rotate log file', error);
  }
}
