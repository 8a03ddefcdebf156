import type { SimulationContext } from './models';

/**
 * Time System
 *
 * 1 tick = 1 rendered frame. At time factor 1 a body with the reference
 * period (one Earth year) completes an orbit in BASE_FRAMES_PER_ORBIT
 * ticks, i.e. one minute at 60 fps.
 *
 * The time factor scales every body's angular speed uniformly and is
 * adjusted in fixed multiplicative steps.
 */

export const BASE_FRAMES_PER_ORBIT = 3600;
export const REFERENCE_PERIOD_DAYS = 365.26;
export const BASE_ANGULAR_SPEED = (2 * Math.PI) / BASE_FRAMES_PER_ORBIT;

export const DEFAULT_TIME_FACTOR = 1;
export const MIN_TIME_FACTOR = 0.01;
export const MAX_TIME_FACTOR = 100;
export const TIME_FACTOR_STEP = 1.5;

/** Periods shorter than this (in days) are treated as non-orbiting. */
export const MIN_PERIOD_DAYS = 1e-9;

export function createSimulationContext(): SimulationContext {
  return { timeFactor: DEFAULT_TIME_FACTOR, paused: false };
}

export function clampTimeFactor(timeFactor: number): number {
  return Math.max(MIN_TIME_FACTOR, Math.min(MAX_TIME_FACTOR, timeFactor));
}

export function speedUp(ctx: SimulationContext): void {
  ctx.timeFactor = clampTimeFactor(ctx.timeFactor * TIME_FACTOR_STEP);
}

export function slowDown(ctx: SimulationContext): void {
  ctx.timeFactor = clampTimeFactor(ctx.timeFactor / TIME_FACTOR_STEP);
}

export function togglePause(ctx: SimulationContext): void {
  ctx.paused = !ctx.paused;
}

/**
 * Angular speed (radians per tick at time factor 1) for an orbital
 * period in days. Negative periods mark retrograde orbits and flip the
 * sign; a zero period means the body does not orbit.
 */
export function angularSpeedForPeriod(periodDays: number): number {
  const magnitude = Math.abs(periodDays);
  if (magnitude < MIN_PERIOD_DAYS) return 0;
  const speed = BASE_ANGULAR_SPEED * (REFERENCE_PERIOD_DAYS / magnitude);
  return periodDays < 0 ? -speed : speed;
}

/** Format the time factor for display: "1.5x" */
export function formatTimeFactor(timeFactor: number): string {
  return `${timeFactor.toFixed(1)}x`;
}
