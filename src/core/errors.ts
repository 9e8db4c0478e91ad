export type AnalyzerErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'CONFIGURATION'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'TRANSPORT'
  | 'API'
  | 'RESPONSE_FORMAT'
  | 'REPORT_WRITE';

export class AnalyzerError extends Error {
  readonly code: AnalyzerErrorCode;

  constructor(code: AnalyzerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputFileNotFoundError extends AnalyzerError {
  constructor(filePath: string) {
    super('INPUT_NOT_FOUND', `File not found: ${filePath}`);
  }
}

export class UnsupportedFileTypeError extends AnalyzerError {
  constructor(extension: string, supported: readonly string[]) {
    const shown = extension || '(none)';
    super(
      'UNSUPPORTED_FILE_TYPE',
      `Unsupported file type: ${shown}. Supported formats: ${supported.join(', ')}`
    );
  }
}

export class ConfigurationError extends AnalyzerError {
  constructor(message: string) {
    super('CONFIGURATION', `Configuration error: ${message}`);
  }
}

export class MissingApiKeyError extends ConfigurationError {
  constructor() {
    super('OpenRouter API key is required. Set OPENROUTER_API_KEY or pass --api-key.');
  }
}

export class NetworkError extends AnalyzerError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super('NETWORK', `Network error: ${message}${statusInfo}`);
    this.statusCode = statusCode;
  }
}

export class TimeoutError extends AnalyzerError {
  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', `${message} (timeout: ${timeoutMs}ms)`);
  }
}

/**
 * Failure below HTTP: the request never produced a status line.
 * `transient` marks failures worth retrying (resets, timeouts, TLS hiccups).
 */
export class TransportError extends AnalyzerError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean, cause?: unknown) {
    super('TRANSPORT', `Transport error: ${message}`, { cause });
    this.transient = transient;
  }
}

export class ApiError extends AnalyzerError {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super('API', `API request failed: ${message} (status: ${statusCode})`);
    this.statusCode = statusCode;
  }
}

export class ResponseFormatError extends AnalyzerError {
  constructor(message: string) {
    super('RESPONSE_FORMAT', `Unexpected API response format: ${message}`);
  }
}

export class ReportWriteError extends AnalyzerError {
  constructor(outputPath: string, cause: unknown) {
    super('REPORT_WRITE', `Failed to write report to ${outputPath}: ${describeError(cause)}`, {
      cause,
    });
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EPROTO',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CLOSED',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Decide whether a low-level failure is worth another attempt.
 * Looks through one level of `cause`, where undici puts the socket error.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof TransportError) {
    return error.transient;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof AnalyzerError) {
    return false;
  }

  const candidates = [error];
  if (error instanceof Error && error.cause !== undefined) {
    candidates.push(error.cause);
  }

  return candidates.some(candidate => {
    const code = errorCode(candidate);
    if (!code) return false;
    return TRANSIENT_ERROR_CODES.has(code) || code.startsWith('ERR_SSL') || code.startsWith('ERR_TLS');
  });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error occurred';
}
