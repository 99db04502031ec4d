export interface ClockPort {
  now(): Date;
}

export function unixSeconds(clock: ClockPort): number {
  return Math.floor(clock.now().getTime() / 1000);
}
