import type { FailureReason } from './types.js';

export type FetchFailure = Extract<FailureReason, 'NetworkError' | 'Timeout' | 'TooLarge' | 'HttpError'>;
export type ToolFailure = Extract<FailureReason, 'ToolInvocationError' | 'ToolOutputUnparseable'>;

export class FetchError extends Error {
  readonly reason: FetchFailure;
  readonly url: string;
  readonly statusCode: number | null;

  constructor(reason: FetchFailure, url: string, message: string, statusCode: number | null = null) {
    super(message);
    this.name = 'FetchError';
    this.reason = reason;
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ToolError extends Error {
  readonly reason: ToolFailure;
  readonly tool: string;

  constructor(reason: ToolFailure, tool: string, message: string) {
    super(message);
    this.name = 'ToolError';
    this.reason = reason;
    this.tool = tool;
  }
}

// Invalid invocation or unreachable start URL; the only error that aborts a run
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}
