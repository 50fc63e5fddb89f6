export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  AUDITOR_UNAVAILABLE: 2,
  DELIVERY_FAILED: 3,
  STATE_LOCKED: 4,
  STATE_CORRUPT: 5,
} as const;

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'AUDITOR_UNAVAILABLE'
  | 'DELIVERY_FAILED'
  | 'STATE_LOCKED'
  | 'STATE_CORRUPT';

export abstract class AuditRunError extends Error {
  public abstract readonly code: ErrorCode;
  public abstract readonly exitCode: number;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AuditRunError {
  public readonly code = 'CONFIG_INVALID';
  public readonly exitCode = EXIT_CODE.FAILURE;
}

export class AuditorUnavailableError extends AuditRunError {
  public readonly code = 'AUDITOR_UNAVAILABLE';
  public readonly exitCode = EXIT_CODE.AUDITOR_UNAVAILABLE;
}

export class DeliveryFailureError extends AuditRunError {
  public readonly code = 'DELIVERY_FAILED';
  public readonly exitCode = EXIT_CODE.DELIVERY_FAILED;
}

export class StateLockedError extends AuditRunError {
  public readonly code = 'STATE_LOCKED';
  public readonly exitCode = EXIT_CODE.STATE_LOCKED;
}

export class StateStoreCorruptError extends AuditRunError {
  public readonly code = 'STATE_CORRUPT';
  public readonly exitCode = EXIT_CODE.STATE_CORRUPT;
}

export const exitCodeFor = (error: unknown): number =>
  error instanceof AuditRunError ? error.exitCode : EXIT_CODE.FAILURE;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
