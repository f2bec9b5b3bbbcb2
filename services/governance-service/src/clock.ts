export const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = {
  now: () => Date;
};

export const systemClock: Clock = {
  now: () => new Date()
};

/**
 * Clock pinned to `start`, advancing by `stepMs` on every read. A zero step
 * keeps time frozen, which is what most evaluations want.
 */
export function fixedClock(start: Date, stepMs = 0): Clock {
  let current = start.getTime();
  return {
    now: () => {
      const value = new Date(current);
      current += stepMs;
      return value;
    }
  };
}

export function daysBefore(reference: Date, days: number): Date {
  return new Date(reference.getTime() - days * DAY_MS);
}

export function wholeDaysBetween(earlier: Date, later: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / DAY_MS);
}
