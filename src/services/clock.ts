export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock that always returns the given instant (tests, replays). */
export function fixedClock(at: Date): Clock {
  return { now: () => new Date(at.getTime()) };
}
