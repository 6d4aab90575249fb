/**
 * Time helpers.
 *
 * All cuesync timing is in seconds (floating point). Components take a
 * `Clock` so tests can drive time explicitly.
 */

/** Returns the current time in seconds */
export type Clock = () => number;

/** Wall clock in epoch seconds */
export const systemClock: Clock = () => Date.now() / 1000;

/** Clamp a value into [min, max] */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Format seconds as mm:ss */
export function formatElapsed(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(total / 60);
  const secs = total % 60;
  return `${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}
