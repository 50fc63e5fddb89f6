import type { ValueOf } from '../types/value-of';

export const SEVERITY = {
  CRITICAL: 'critical',
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
  UNKNOWN: 'unknown',
  INFORMATIONAL: 'informational',
  NONE: 'none',
} as const;

export type Severity = ValueOf<typeof SEVERITY>;

/**
 * Report order, most severe first. Advisories without a usable score rank
 * below scored ones but above warnings.
 */
export const SEVERITY_ORDER: readonly Severity[] = [
  SEVERITY.CRITICAL,
  SEVERITY.HIGH,
  SEVERITY.MEDIUM,
  SEVERITY.LOW,
  SEVERITY.UNKNOWN,
  SEVERITY.INFORMATIONAL,
  SEVERITY.NONE,
];

export const compareSeverity = (left: Severity, right: Severity): number =>
  SEVERITY_ORDER.indexOf(left) - SEVERITY_ORDER.indexOf(right);

export const severityFromScore = (score: number): Severity => {
  if (score >= 9) {
    return SEVERITY.CRITICAL;
  }
  if (score >= 7) {
    return SEVERITY.HIGH;
  }
  if (score >= 4) {
    return SEVERITY.MEDIUM;
  }
  if (score > 0) {
    return SEVERITY.LOW;
  }
  return SEVERITY.NONE;
};
