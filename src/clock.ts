export interface Clock {
  /** Monotonic instant in ticks, immune to wall-clock adjustment. */
  now(): bigint;
  readonly ticksPerSecond: number;
  wallClockNow(): Date;
}

export const systemClock: Clock = {
  now: () => process.hrtime.bigint(),
  ticksPerSecond: 1e9,
  wallClockNow: () => new Date()
};

export function secondsBetween(clock: Clock, from: bigint, to: bigint): number {
  return Number(to - from) / clock.ticksPerSecond;
}
