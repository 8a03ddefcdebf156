import type {
  Camera,
  CelestialBody,
  Color,
  OrbitPathCache,
  Renderer,
  SceneGraph,
  Surface,
  Vec2,
} from './models';
import { worldToScreen } from './camera';
import { getParent, isRootChild } from './sceneGraph';

/**
 * Per-body render caches.
 *
 * Orbit paths of bodies that orbit the root star are projected into
 * screen space once and reused until the camera moves past a threshold
 * or the viewport changes size. Orbits of satellites (moons of planets)
 * are always reprojected fresh and never get a cache.
 *
 * Facts overlays and name labels are rendered once on first demand and
 * live until clearRenderCaches() (viewport resize or scene reset).
 */

export const ORBIT_SAMPLES = 30;
export const ZOOM_TOLERANCE = 0.01;
export const PAN_TOLERANCE = 1; // world units, per axis

export const FACTS_PADDING = 12;
export const FACTS_LINE_HEIGHT = 20;
export const FACTS_BACKGROUND: Color = [0, 0, 0, 128];
export const FACTS_CORNER_RADIUS = 6;

// ─── Orbit Paths ──────────────────────────────────────────────────

/**
 * Pure validity check: the cache exists and was built at (nearly) the
 * current zoom and pan, for the current viewport size.
 */
export function isOrbitCacheValid(
  cache: OrbitPathCache | null,
  camera: Camera
): boolean {
  if (!cache) return false;
  const { key } = cache;
  return (
    Math.abs(camera.zoom - key.zoom) < ZOOM_TOLERANCE &&
    camera.viewport.width === key.width &&
    camera.viewport.height === key.height &&
    Math.abs(camera.pan.x - key.panX) < PAN_TOLERANCE &&
    Math.abs(camera.pan.y - key.panY) < PAN_TOLERANCE
  );
}

/**
 * Sample an orbit ellipse around its parent at ORBIT_SAMPLES parametric
 * angles (x = a·cos θ, y = b·sin θ). The last sample repeats the first,
 * closing the loop.
 */
export function sampleOrbitEllipse(
  semiMajorAxis: number,
  oneMinusE2: number
): Vec2[] {
  const b = semiMajorAxis * Math.sqrt(oneMinusE2);
  const points: Vec2[] = [];
  for (let i = 0; i < ORBIT_SAMPLES; i++) {
    const theta = (2 * Math.PI * i) / (ORBIT_SAMPLES - 1);
    points.push({
      x: semiMajorAxis * Math.cos(theta),
      y: b * Math.sin(theta),
    });
  }
  return points;
}

function projectOrbit(
  body: CelestialBody,
  parentPosition: Vec2,
  camera: Camera
): Vec2[] {
  return sampleOrbitEllipse(
    body.elements.semiMajorAxis,
    body.elements.oneMinusE2
  ).map((p) =>
    worldToScreen(camera, {
      x: p.x + parentPosition.x,
      y: p.y + parentPosition.y,
    })
  );
}

export function buildOrbitPathCache(
  body: CelestialBody,
  parentPosition: Vec2,
  camera: Camera
): OrbitPathCache {
  const points = projectOrbit(body, parentPosition, camera);

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }

  const { width, height } = camera.viewport;
  const boxWidth = Math.max(1, Math.min(Math.trunc(maxX - minX) + 2, width));
  const boxHeight = Math.max(1, Math.min(Math.trunc(maxY - minY) + 2, height));

  return {
    points,
    rect: {
      x: Math.trunc(minX),
      y: Math.trunc(minY),
      width: boxWidth,
      height: boxHeight,
    },
    key: {
      zoom: camera.zoom,
      width,
      height,
      panX: camera.pan.x,
      panY: camera.pan.y,
    },
  };
}

/**
 * Revalidate the orbit cache of a root-star child, rebuilding it when
 * stale. Returns true if a rebuild happened. Any other body is left
 * alone and false is returned.
 */
export function refreshOrbitCache(
  scene: SceneGraph,
  body: CelestialBody,
  camera: Camera
): boolean {
  if (!isRootChild(scene, body)) return false;
  if (isOrbitCacheValid(body.cache.orbit, camera)) return false;

  const parent = getParent(scene, body);
  if (!parent) return false;
  body.cache.orbit = buildOrbitPathCache(body, parent.position, camera);
  body.cache.orbitRebuilds++;
  return true;
}

/** Fresh, uncached screen-space orbit for a satellite of a planet. */
export function projectSatelliteOrbit(
  body: CelestialBody,
  parentPosition: Vec2,
  camera: Camera
): Vec2[] {
  return projectOrbit(body, parentPosition, camera);
}

// ─── Text Surfaces ────────────────────────────────────────────────

/** "key: value" lines of a body's facts, in catalog order. */
export function formatFactLines(body: CelestialBody): string[] {
  if (!body.facts) return [];
  return body.facts.map(([key, value]) => `${key}: ${value}`);
}

/**
 * Facts panel for a body, built at most once. Returns null for bodies
 * without facts.
 */
export function getFactsOverlay(
  body: CelestialBody,
  renderer: Renderer
): Surface | null {
  if (body.cache.facts) return body.cache.facts;
  const lines = formatFactLines(body);
  if (lines.length === 0) return null;

  const surfaces = lines.map((line) => renderer.textToSurface(line));
  const maxWidth = Math.max(...surfaces.map((s) => s.width));
  body.cache.facts = renderer.createPanel(
    maxWidth + 2 * FACTS_PADDING,
    lines.length * FACTS_LINE_HEIGHT + 2 * FACTS_PADDING,
    surfaces,
    {
      padding: FACTS_PADDING,
      lineHeight: FACTS_LINE_HEIGHT,
      background: FACTS_BACKGROUND,
      cornerRadius: FACTS_CORNER_RADIUS,
    }
  );
  return body.cache.facts;
}

export function getLabelSurface(
  body: CelestialBody,
  renderer: Renderer
): Surface {
  if (!body.cache.label) {
    body.cache.label = renderer.textToSurface(body.name);
  }
  return body.cache.label;
}

/** Drop every cached orbit, facts panel and label in the scene. */
export function clearRenderCaches(scene: SceneGraph): void {
  for (const body of scene.bodies) {
    body.cache.orbit = null;
    body.cache.facts = null;
    body.cache.label = null;
  }
}
