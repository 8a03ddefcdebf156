/**
 * Frame-rate meter for the HUD. Counts frames over a sliding one-second
 * window of requestAnimationFrame timestamps (milliseconds).
 */

export const FPS_WINDOW_MS = 1000;

export interface FrameClock {
  /** Record a frame at `nowMs` and return the current frames-per-second. */
  sample(nowMs: number): number;
}

export function createFrameClock(): FrameClock {
  const stamps: number[] = [];
  return {
    sample(nowMs: number): number {
      stamps.push(nowMs);
      while (stamps.length > 0 && nowMs - stamps[0] >= FPS_WINDOW_MS) {
        stamps.shift();
      }
      return stamps.length;
    },
  };
}
