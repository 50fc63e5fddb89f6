import type { ValueOf } from '../types/value-of';
import type { Finding } from './finding';
import type { Target } from './target';

export const FAILURE_KIND = {
  AUDITOR_UNAVAILABLE: 'auditor-unavailable',
  EXECUTION_ERROR: 'execution-error',
  TIMEOUT: 'timeout',
  PARSE_FAILURE: 'parse-failure',
  NOT_AUDITABLE: 'not-auditable',
} as const;

export type FailureKind = ValueOf<typeof FAILURE_KIND>;

export type AuditFailure = {
  kind: FailureKind;
  detail: string;
};

export type AuditOutcome =
  | {
      status: 'ok';
      target: Target;
      findings: Finding[];
      attempts: number;
    }
  | {
      status: 'failed';
      target: Target;
      failure: AuditFailure;
      attempts: number;
    };

/** Failures worth another attempt when `auditor.tries` allows it. */
export const isTransientFailure = (failure: AuditFailure): boolean =>
  failure.kind === FAILURE_KIND.TIMEOUT || failure.kind === FAILURE_KIND.EXECUTION_ERROR;
