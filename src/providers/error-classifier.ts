/**
 * Classification of JSON-RPC provider failures. ethers wraps node errors, so
 * the node's payload can sit under `error`, `info.error` or `cause`. The
 * `message` of an ethers error also embeds the whole request (`payload=...`),
 * so only its `shortMessage` is read.
 */
import { ProviderErrorReason } from '../utils/errors.js';

const RANGE_PATTERNS = [
  'block range',
  'query returned more than',
  'exceeds max',
  'range too large',
  'too many results',
  'response size exceeded',
];

// 429 counts only as a whole word: hex block numbers and addresses contain it
const HTTP_TOO_MANY_REQUESTS = /\b429\b/;

const RATE_LIMIT_PATTERNS = ['rate limit', 'too many requests', 'quota exceeded'];

const TIMEOUT_PATTERNS = ['timeout', 'timed out', 'etimedout', 'econnreset', 'socket hang up'];

const UNSUPPORTED_PATTERNS = ['method not found', 'not supported', 'does not exist/is not available', 'unsupported method'];

const LIMIT_EXCEEDED_CODE = -32005;
const METHOD_NOT_FOUND_CODE = -32601;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

interface ErrorDetails {
  messages: string[];
  codes: Array<string | number>;
}

function collectDetails(error: unknown, details: ErrorDetails = { messages: [], codes: [] }, depth = 0): ErrorDetails {
  if (depth > 4 || error === null || error === undefined) {
    return details;
  }

  if (typeof error === 'string') {
    details.messages.push(error.toLowerCase());
    return details;
  }

  if (!isRecord(error)) {
    return details;
  }

  const message = typeof error.shortMessage === 'string' ? error.shortMessage : error.message;
  if (typeof message === 'string') {
    details.messages.push(message.toLowerCase());
  }

  if (typeof error.responseStatus === 'string') {
    details.messages.push(error.responseStatus.toLowerCase());
  }

  const code = error.code;
  if (typeof code === 'string' || typeof code === 'number') {
    details.codes.push(typeof code === 'string' ? code.toLowerCase() : code);
  }

  const status = error.status;
  if (typeof status === 'number') {
    details.codes.push(status);
  }

  for (const key of ['error', 'info', 'cause']) {
    collectDetails(error[key], details, depth + 1);
  }

  return details;
}

function mentions(details: ErrorDetails, patterns: string[]): boolean {
  return details.messages.some(message => patterns.some(pattern => message.includes(pattern)));
}

export function isRangeLimitError(error: unknown): boolean {
  const details = collectDetails(error);
  return details.codes.includes(LIMIT_EXCEEDED_CODE) || mentions(details, RANGE_PATTERNS);
}

export function isRateLimitError(error: unknown): boolean {
  const details = collectDetails(error);
  return (
    details.codes.includes(429) ||
    details.codes.includes('429') ||
    details.messages.some(message => HTTP_TOO_MANY_REQUESTS.test(message)) ||
    mentions(details, RATE_LIMIT_PATTERNS)
  );
}

export function isTimeoutError(error: unknown): boolean {
  const details = collectDetails(error);
  return (
    details.codes.some(code => typeof code === 'string' && TIMEOUT_PATTERNS.some(pattern => code.includes(pattern))) ||
    mentions(details, TIMEOUT_PATTERNS)
  );
}

export function isUnsupportedMethodError(error: unknown): boolean {
  const details = collectDetails(error);
  return details.codes.includes(METHOD_NOT_FOUND_CODE) || mentions(details, UNSUPPORTED_PATTERNS);
}

/**
 * Rate limits are checked first: some nodes also report them as -32005.
 */
export function classifyProviderError(error: unknown): ProviderErrorReason {
  if (isRateLimitError(error)) {
    return 'rate-limit';
  }
  if (isRangeLimitError(error)) {
    return 'range-too-large';
  }
  if (isTimeoutError(error)) {
    return 'timeout';
  }
  if (isUnsupportedMethodError(error)) {
    return 'unsupported-method';
  }
  return 'unknown';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
