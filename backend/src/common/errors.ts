/**
 * Application Errors
 * ==================
 *
 * Every error the service raises on purpose extends AppError, so the
 * Fastify error handler can map it to `{ ok: false, error, message }`
 * with the right status code.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// PER-SYMBOL / PER-PAIR (absorbed during a refresh)
// ═══════════════════════════════════════════════════════════════

export class ProviderError extends AppError {
  constructor(
    readonly symbol: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super('PROVIDER_ERROR', `${symbol}: ${reason}`, 502, options);
  }
}

export class InsufficientDataError extends AppError {
  constructor(
    readonly required: number,
    readonly actual: number,
    readonly symbol?: string
  ) {
    super(
      'INSUFFICIENT_DATA',
      `${symbol ? `${symbol}: ` : ''}need ${required} points, got ${actual}`,
      422
    );
  }
}

export class DivisionByZeroError extends AppError {
  constructor(readonly symbol: string, readonly ts: number) {
    super('DIVISION_BY_ZERO', `${symbol}: non-positive price at ${new Date(ts).toISOString()}`, 422);
  }
}

// ═══════════════════════════════════════════════════════════════
// WHOLE-UNIVERSE (surfaced to callers)
// ═══════════════════════════════════════════════════════════════

export class EmptyUniverseError extends AppError {
  constructor(message = 'No assets with sufficient data to rank') {
    super('EMPTY_UNIVERSE', message, 502);
  }
}

export class RefreshError extends AppError {
  constructor(
    readonly universeId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('REFRESH_FAILED', `Refresh of ${universeId} failed: ${reason}`, 502, options);
  }
}

export class NoDataYetError extends AppError {
  constructor(readonly universeId: string) {
    super('NO_DATA_YET', `Rankings for ${universeId} not yet computed. Try again shortly.`, 503);
  }
}

// ═══════════════════════════════════════════════════════════════
// REQUEST / BOOT
// ═══════════════════════════════════════════════════════════════

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
