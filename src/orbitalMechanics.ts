import type { CelestialBody, SceneGraph, SimulationContext, Vec2 } from './models';

/**
 * Orbital Mechanics Engine
 *
 * Bodies follow planar Keplerian ellipses with periapsis fixed along the
 * local +x axis. Positions are purely kinematic: each tick the mean
 * anomaly advances, Kepler's equation is solved for the eccentric
 * anomaly, and the body is placed relative to its parent's *current*
 * position. There is no gravitational interaction between bodies.
 *
 * Key functions:
 * - solveKepler(): eccentric anomaly from mean anomaly
 * - resolveBodyPosition(): world position from elements + parent position
 * - stepSimulation(): advance every body one tick, parents first
 */

const TWO_PI = 2 * Math.PI;

/** Fixed-point iterations used by solveKepler. */
export const KEPLER_ITERATIONS = 5;

// ─── Anomalies ────────────────────────────────────────────────────

/**
 * Advance a mean anomaly and wrap it into [0, 2π).
 * Negative angular speeds (retrograde orbits) wrap the same way.
 */
export function advanceMeanAnomaly(
  meanAnomaly: number,
  angularSpeed: number,
  timeFactor: number
): number {
  const next = (meanAnomaly + angularSpeed * timeFactor) % TWO_PI;
  const wrapped = next < 0 ? next + TWO_PI : next;
  // a tiny negative remainder rounds up to exactly 2π
  return wrapped >= TWO_PI ? 0 : wrapped;
}

/**
 * Solve Kepler's equation M = E − e·sin(E) for E.
 *
 * Fixed-point iteration E ← M + e·sin(E), starting at E = M, run for
 * exactly KEPLER_ITERATIONS steps with no convergence check. Accurate
 * for the low eccentricities of real planets and moons; the error grows
 * as e approaches 1, which is a known limitation of this solver.
 */
export function solveKepler(meanAnomaly: number, eccentricity: number): number {
  let E = meanAnomaly;
  for (let i = 0; i < KEPLER_ITERATIONS; i++) {
    E = meanAnomaly + eccentricity * Math.sin(E);
  }
  return E;
}

export function trueAnomalyFromEccentric(
  eccentricAnomaly: number,
  eccentricity: number
): number {
  return (
    2 *
    Math.atan2(
      Math.sqrt(1 + eccentricity) * Math.sin(eccentricAnomaly / 2),
      Math.sqrt(1 - eccentricity) * Math.cos(eccentricAnomaly / 2)
    )
  );
}

/** Distance from the focus at true anomaly ν: a(1−e²) / (1 + e·cos ν). */
export function orbitalRadius(
  semiMajorAxis: number,
  eccentricity: number,
  oneMinusE2: number,
  trueAnomaly: number
): number {
  return (
    (semiMajorAxis * oneMinusE2) / (1 + eccentricity * Math.cos(trueAnomaly))
  );
}

// ─── Positions ────────────────────────────────────────────────────

/**
 * Place a body on its ellipse for its current mean anomaly, relative to
 * the given parent position. Writes body.position and returns it.
 */
export function resolveBodyPosition(
  body: CelestialBody,
  parentPosition: Vec2
): Vec2 {
  const { semiMajorAxis, eccentricity, meanAnomaly, oneMinusE2 } =
    body.elements;
  const E = solveKepler(meanAnomaly, eccentricity);
  const nu = trueAnomalyFromEccentric(E, eccentricity);
  const r = orbitalRadius(semiMajorAxis, eccentricity, oneMinusE2, nu);
  body.position.x = parentPosition.x + r * Math.cos(nu);
  body.position.y = parentPosition.y + r * Math.sin(nu);
  return body.position;
}

/**
 * Advance every orbiting body by one tick.
 *
 * Walks the scene in insertion order, which is topological (parents are
 * always inserted before their children), so each child reads its
 * parent's position from this tick. The root star is never moved.
 * A paused context leaves every body untouched.
 */
export function stepSimulation(
  scene: SceneGraph,
  context: SimulationContext
): void {
  if (context.paused) return;

  for (const body of scene.bodies) {
    if (body.parentId === null) continue;
    const parent = scene.byId.get(body.parentId);
    if (!parent) {
      throw new Error(`Body ${body.name} references missing parent ${body.parentId}`);
    }
    body.elements.meanAnomaly = advanceMeanAnomaly(
      body.elements.meanAnomaly,
      body.baseAngularSpeed,
      context.timeFactor
    );
    resolveBodyPosition(body, parent.position);
  }
}

/** Euclidean distance between two 2D points. */
export function euclideanDistance(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}
