/** Source of "now". Injected so time-dependent rules can be tested. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}
