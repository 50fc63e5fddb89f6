/**
 * CVSS v3.0 / v3.1 base score calculation.
 * Vectors of other versions (v2, v4) yield null.
 */

type Metrics = {
  AV: string;
  AC: string;
  PR: string;
  UI: string;
  S: string;
  C: string;
  I: string;
  A: string;
};

const ATTACK_VECTOR: Record<string, number> = { N: 0.85, A: 0.62, L: 0.55, P: 0.2 };
const ATTACK_COMPLEXITY: Record<string, number> = { L: 0.77, H: 0.44 };
const USER_INTERACTION: Record<string, number> = { N: 0.85, R: 0.62 };
const IMPACT: Record<string, number> = { H: 0.56, L: 0.22, N: 0 };
const PRIVILEGES_UNCHANGED: Record<string, number> = { N: 0.85, L: 0.62, H: 0.27 };
const PRIVILEGES_CHANGED: Record<string, number> = { N: 0.85, L: 0.68, H: 0.5 };

const REQUIRED_METRICS = ['AV', 'AC', 'PR', 'UI', 'S', 'C', 'I', 'A'] as const;

// Round up to one decimal, avoiding floating point artefacts (CVSS 3.1 Appendix A).
const roundUp = (value: number): number => {
  const scaled = Math.round(value * 100000);
  if (scaled % 10000 === 0) {
    return scaled / 100000;
  }
  return (Math.floor(scaled / 10000) + 1) / 10;
};

const parseVector = (vector: string): Metrics | null => {
  const [prefix, ...parts] = vector.trim().split('/');
  if (prefix !== 'CVSS:3.0' && prefix !== 'CVSS:3.1') {
    return null;
  }

  const values = new Map<string, string>();
  for (const part of parts) {
    const [key, value] = part.split(':');
    if (key && value) {
      values.set(key, value);
    }
  }

  const [AV, AC, PR, UI, S, C, I, A] = REQUIRED_METRICS.map((key) => values.get(key));
  if (!AV || !AC || !PR || !UI || !S || !C || !I || !A) {
    return null;
  }
  return { AV, AC, PR, UI, S, C, I, A };
};

export const cvssBaseScore = (vector: string): number | null => {
  const metrics = parseVector(vector);
  if (!metrics) {
    return null;
  }

  const scopeChanged = metrics.S === 'C';
  const av = ATTACK_VECTOR[metrics.AV];
  const ac = ATTACK_COMPLEXITY[metrics.AC];
  const pr = (scopeChanged ? PRIVILEGES_CHANGED : PRIVILEGES_UNCHANGED)[metrics.PR];
  const ui = USER_INTERACTION[metrics.UI];
  const c = IMPACT[metrics.C];
  const i = IMPACT[metrics.I];
  const a = IMPACT[metrics.A];
  if (
    av === undefined ||
    ac === undefined ||
    pr === undefined ||
    ui === undefined ||
    c === undefined ||
    i === undefined ||
    a === undefined ||
    (metrics.S !== 'U' && metrics.S !== 'C')
  ) {
    return null;
  }

  const iss = 1 - (1 - c) * (1 - i) * (1 - a);
  const impact = scopeChanged
    ? 7.52 * (iss - 0.029) - 3.25 * (iss - 0.02) ** 15
    : 6.42 * iss;
  const exploitability = 8.22 * av * ac * pr * ui;

  if (impact <= 0) {
    return 0;
  }
  if (scopeChanged) {
    return roundUp(Math.min(1.08 * (impact + exploitability), 10));
  }
  return roundUp(Math.min(impact + exploitability, 10));
};
