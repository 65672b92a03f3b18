/**
 * Source of the current time; injected so expiry can be tested
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Add whole minutes to a date
 */
export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

/**
 * Add whole hours to a date
 */
export function addHours(date: Date, hours: number): Date {
  return addMinutes(date, hours * 60);
}
