// Wall clock and the timestamp format shared by logs, ledgers and commits

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Whole seconds elapsed between two instants, rounded down
 */
export function elapsedSeconds(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 1000));
}
