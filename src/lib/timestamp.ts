// Local-time formatting used for folder names, classification dates and logs

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD` in local time
 */
export function formatLocalDate(value: Date | number): string {
  const date = typeof value === 'number' ? new Date(value) : value;
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function formatCompactTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLocalDateTime(date: Date): string {
  return (
    `${formatLocalDate(date)} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
