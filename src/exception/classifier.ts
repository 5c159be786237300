import { DriverError, DriverTimeoutError } from './errors.js';

export type FailureKind = 'timeout' | 'driver' | 'unexpected';

const TIMEOUT_PATTERNS = [
  'timeout',
  'timed out',
  'waiting for selector',
  'waiting for locator',
];

const DRIVER_PATTERNS = [
  'target closed',
  'target page, context or browser has been closed',
  'frame was detached',
  'execution context was destroyed',
  'net::err_',
  'navigation failed',
  'strict mode violation',
];

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof DriverTimeoutError) return 'timeout';
  if (error instanceof DriverError) return 'driver';

  const text = extractMessage(error).toLowerCase();
  if (error instanceof Error && error.name === 'TimeoutError') return 'timeout';
  if (TIMEOUT_PATTERNS.some((p) => text.includes(p))) return 'timeout';
  if (DRIVER_PATTERNS.some((p) => text.includes(p))) return 'driver';
  return 'unexpected';
}

/**
 * Human-readable reason for a step that threw, in the form shown to operators
 * and used as the `Stop` reason.
 */
export function describeStepFailure(error: unknown, action: string): string {
  const message = extractMessage(error);
  switch (classifyFailure(error)) {
    case 'timeout':
      return `Timeout in action ${action}: ${message}`;
    case 'driver':
      return `Driver error in ${action}: ${message}`;
    default:
      return message || 'unknown reason';
  }
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
