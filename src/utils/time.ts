export const ONE_MINUTE_MS = 60 * 1000;
export const FIVE_MINUTES_MS = 5 * ONE_MINUTE_MS;

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:?\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const parseEpochSecondsToMs = (value: number | null | undefined): number | null => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value * 1000;
};

export const truncateToInterval = (timeMs: number, intervalMs: number): number => Math.floor(timeMs / intervalMs) * intervalMs;

export const formatClockUtc = (timeMs: number): string => new Date(timeMs).toISOString().slice(11, 19);

export const formatDuration = (durationMs: number): string => {
  const totalSeconds = Math.max(0, Math.round(durationMs / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m${seconds}s` : `${seconds}s`;
};
