/** Longest delay a Node timer accepts; larger values fire almost immediately. */
export const MAX_DURATION_MS = 2_147_483_647;

/**
 * Parse a duration such as "500ms", "30s", "5m", "1h" or "90" (seconds).
 * @returns Duration in milliseconds, or undefined if the value is not a duration
 */
export const parseDuration = (value: string | number): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.floor(value * 1000) : undefined;
  }

  const trimmed = value.trim().toLowerCase();
  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/);
  if (!match) {
    return undefined;
  }

  const amount = Number.parseFloat(match[1] ?? '0');
  const unit = match[2] ?? 's';
  if (Number.isNaN(amount)) {
    return undefined;
  }

  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
  };

  return Math.floor(amount * (multipliers[unit] ?? 1000));
};

export const formatDuration = (milliseconds: number): string => {
  if (milliseconds % (60 * 60 * 1000) === 0 && milliseconds > 0) {
    return `${milliseconds / (60 * 60 * 1000)}h`;
  }
  if (milliseconds % (60 * 1000) === 0 && milliseconds > 0) {
    return `${milliseconds / (60 * 1000)}m`;
  }
  if (milliseconds % 1000 === 0) {
    return `${milliseconds / 1000}s`;
  }
  return `${milliseconds}ms`;
};
