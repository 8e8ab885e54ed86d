/**
 * Outbound Service Call Handling
 *
 * Every call to a collaborator (document analyzer, doctor registry, case
 * store) goes through guardServiceCall, which never throws: it returns a
 * tagged ServiceResult whose failure side is one of timeout / connection /
 * call. The workflow pattern-matches on the tag to build a technical result.
 */

import { logger } from './logger';
import { serviceFailuresCounter } from './metrics';
import type { ServiceFailureKind } from './types';

export const SERVICE_NAMES = {
  ANALYZER: 'Azure Content Understanding',
  REGISTRY: 'Doctor Registry Database',
  CASE_STORE: 'Fraud Case Database',
  WORKFLOW: 'Attestation Workflow',
} as const;

export type ServiceName = (typeof SERVICE_NAMES)[keyof typeof SERVICE_NAMES];

export interface ServiceFailure {
  service: string;
  kind: ServiceFailureKind;
  message: string;
  details: Record<string, string | number>;
}

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; failure: ServiceFailure };

export interface GuardOptions {
  /** Abandon the call after this many milliseconds; no limit when omitted */
  timeoutMs?: number;
}

/** "120 seconds", or "250 ms" for sub-second deadlines. */
export function formatDeadline(timeoutMs: number): string {
  return timeoutMs < 1000 ? `${timeoutMs} ms` : `${Math.round(timeoutMs / 1000)} seconds`;
}

/**
 * Raised when an outbound call exceeds its deadline.
 */
export class ServiceTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(`${service} call timed out after ${formatDeadline(timeoutMs)}`);
    this.name = 'ServiceTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when a collaborator answers with a non-success HTTP status.
 */
export class ServiceHttpError extends Error {
  readonly statusCode: number;
  readonly errorCode?: string;

  constructor(statusCode: number, message: string, errorCode?: string) {
    super(`HTTP ${statusCode}: ${message}`);
    this.name = 'ServiceHttpError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
  }
}

/**
 * Raised when a collaborator is not configured, or answers with a payload
 * that does not match its contract.
 */
export class ServiceCallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceCallError';
  }
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  // Postgres: admin shutdown, cannot connect now
  '57P01',
  '57P03',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Codes of the error and its cause chain (fetch wraps socket errors in `cause`). */
function errorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;

  for (let depth = 0; depth < 3 && current; depth++) {
    const code = errorCode(current);
    if (code) codes.push(code);
    current = current instanceof Error ? current.cause : undefined;
  }

  return codes;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Translate any error thrown by a collaborator into a ServiceFailure.
 */
export function classifyServiceError(service: string, error: unknown): ServiceFailure {
  const message = errorMessage(error);
  const codes = errorCodes(error);
  const lowered = message.toLowerCase();

  if (error instanceof ServiceTimeoutError) {
    return {
      service,
      kind: 'timeout',
      message,
      details: { timeout_seconds: error.timeoutMs / 1000 },
    };
  }

  if (error instanceof ServiceHttpError) {
    const details: Record<string, string | number> = { status_code: error.statusCode };
    if (error.errorCode) details.error_code = error.errorCode;
    return { service, kind: 'call', message, details };
  }

  if (error instanceof ServiceCallError) {
    return { service, kind: 'call', message, details: {} };
  }

  const name = error instanceof Error ? error.name : '';
  if (name === 'TimeoutError' || name === 'AbortError' || codes.some((c) => TIMEOUT_CODES.has(c))) {
    return { service, kind: 'timeout', message, details: {} };
  }

  const connectionCode = codes.find((c) => CONNECTION_CODES.has(c));
  if (connectionCode) {
    return { service, kind: 'connection', message, details: { connection_error: connectionCode } };
  }

  if (['timeout', 'timed out'].some((keyword) => lowered.includes(keyword))) {
    return { service, kind: 'timeout', message, details: {} };
  }

  if (['connection', 'connect', 'network'].some((keyword) => lowered.includes(keyword))) {
    return { service, kind: 'connection', message, details: {} };
  }

  return { service, kind: 'call', message, details: {} };
}

function withDeadline<T>(service: string, promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ServiceTimeoutError(service, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Run an outbound call and convert whatever it throws into a tagged failure.
 */
export async function guardServiceCall<T>(
  service: string,
  call: () => Promise<T>,
  options: GuardOptions = {}
): Promise<ServiceResult<T>> {
  const startTime = Date.now();

  try {
    const pending = call();
    const value = options.timeoutMs ? await withDeadline(service, pending, options.timeoutMs) : await pending;
    return { ok: true, value };
  } catch (error) {
    const failure = classifyServiceError(service, error);

    serviceFailuresCounter.inc({ service, kind: failure.kind });
    logger.error(`${service} call failed`, error, {
      service,
      failure_kind: failure.kind,
      duration_ms: Date.now() - startTime,
    });

    return { ok: false, failure };
  }
}
