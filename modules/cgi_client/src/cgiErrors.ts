export type CgiErrorClassification =
  | 'CONFIG'
  | 'INVOCATION'
  | 'EXIT_STATUS'
  | 'DECODE';

export interface CgiErrorOptions {
  cause?: unknown;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  status?: number;
  stderr?: string;
}

export class CgiError extends Error {
  public readonly classification: CgiErrorClassification;
  public readonly exitCode?: number | null;
  public readonly signal?: NodeJS.Signals | null;
  public readonly status?: number;
  public readonly stderr?: string;

  constructor(message: string, classification: CgiErrorClassification, options: CgiErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CgiError';
    this.classification = classification;
    this.exitCode = options.exitCode;
    this.signal = options.signal;
    this.status = options.status;
    this.stderr = options.stderr;
  }
}

export function isCgiError(error: unknown): error is CgiError {
  return error instanceof CgiError;
}

export function configError(message: string, cause?: unknown): CgiError {
  return new CgiError(message, 'CONFIG', { cause });
}

export function invocationError(message: string, cause?: unknown): CgiError {
  return new CgiError(message, 'INVOCATION', { cause });
}

export function decodeError(message: string): CgiError {
  return new CgiError(message, 'DECODE');
}
