/** Base class for every failure raised by the print bridge */
export class PrintBridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Transport ──

/** Socket, DNS or connection-reset failure before a complete response arrived */
export class ConnectivityError extends PrintBridgeError {}

export class TimeoutError extends PrintBridgeError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends PrintBridgeError {
  readonly code: number;

  constructor(code: number, url: string, detail = '') {
    super(`HTTP ${code} from ${url}${detail ? `: ${detail}` : ''}`);
    this.code = code;
  }
}

// ── Encoding ──

export class InvalidContentError extends PrintBridgeError {}

export class InvalidImageError extends InvalidContentError {}

// ── Session / service ──

export type AuthenticationFailureReason = 'device-not-bound' | 'transient' | 'token-rejected';

export class AuthenticationError extends PrintBridgeError {
  readonly reason: AuthenticationFailureReason;

  constructor(reason: AuthenticationFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }

  /** Only transient binding failures are worth retrying with the same credentials */
  get retryable(): boolean {
    return this.reason === 'transient';
  }
}

/** Business failure reported by the printer service (result code other than success) */
export class PrinterServiceError extends PrintBridgeError {
  readonly code: number;

  constructor(code: number, message: string, options?: { cause?: unknown }) {
    super(`Printer service error ${code}: ${message}`, options);
    this.code = code;
  }
}

/** Extract a human-readable message from anything thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Short label naming the error kind, used in tool and REST error responses */
export function errorKind(error: unknown): string {
  if (error instanceof PrintBridgeError) return error.name;
  if (error instanceof Error && error.name === 'ZodError') return 'ValidationError';
  return 'InternalError';
}
