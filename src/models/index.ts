export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** RGB or RGBA, channels 0..255 (alpha included). */
export type Color =
  | readonly [number, number, number]
  | readonly [number, number, number, number];

export type BodyKind = 'star' | 'planet' | 'moon';

export type BodyId = number;

// ─── Bodies ───────────────────────────────────────────────────────

export interface OrbitalElements {
  semiMajorAxis: number;
  eccentricity: number;
  /** Current mean anomaly, radians in [0, 2π). */
  meanAnomaly: number;
  /** Precomputed 1 − e². */
  oneMinusE2: number;
}

/** Camera state an orbit path was projected with. */
export interface OrbitCacheKey {
  zoom: number;
  width: number;
  height: number;
  panX: number;
  panY: number;
}

export interface OrbitPathCache {
  points: Vec2[]; // screen space, closed loop
  rect: Rect; // screen-space bounding box
  key: OrbitCacheKey;
}

export interface BodyRenderCache {
  orbit: OrbitPathCache | null;
  facts: Surface | null;
  label: Surface | null;
  orbitRebuilds: number;
}

export interface CelestialBody {
  id: BodyId;
  name: string;
  kind: BodyKind;
  radius: number; // world units (pixels at zoom 1)
  color: Color;
  mass: number; // kg, informational only
  elements: OrbitalElements;
  /** Radians per tick at time factor 1. Negative for retrograde orbits. */
  baseAngularSpeed: number;
  parentId: BodyId | null;
  children: BodyId[];
  position: Vec2;
  facts: ReadonlyArray<readonly [string, string]> | null;
  cache: BodyRenderCache;
}

export interface SceneGraph {
  /** Insertion order; parents always precede their children. */
  bodies: CelestialBody[];
  byId: Map<BodyId, CelestialBody>;
  rootId: BodyId | null;
  stars: BodyId[];
  planets: BodyId[];
  moons: BodyId[];
  nextId: BodyId;
}

// ─── Camera & Simulation ──────────────────────────────────────────

export interface Viewport {
  width: number;
  height: number;
}

export interface Camera {
  zoom: number;
  /** World coordinate shown at the viewport center. */
  pan: Vec2;
  viewport: Viewport;
}

export interface SimulationContext {
  timeFactor: number;
  paused: boolean;
}

// ─── External Capabilities ────────────────────────────────────────

/** Opaque pre-rendered bitmap; only its size is visible to the core. */
export interface Surface {
  readonly width: number;
  readonly height: number;
}

export interface PanelOptions {
  padding: number;
  lineHeight: number;
  background: Color | null;
  cornerRadius: number;
}

export interface Renderer {
  clear(): void;
  drawCircle(pos: Vec2, radius: number, color: Color): void;
  drawPolyline(points: Vec2[], closed: boolean, color: Color, width: number): void;
  blit(surface: Surface, rect: Rect): void;
  textToSurface(text: string): Surface;
  /** Compose text lines into a padded panel surface. */
  createPanel(
    width: number,
    height: number,
    lines: Surface[],
    options: PanelOptions
  ): Surface;
}

export type InputEvent =
  | { type: 'resize'; width: number; height: number }
  | { type: 'keydown'; key: string }
  | { type: 'pointerdown'; button: number; pos: Vec2 }
  | { type: 'pointerup'; button: number }
  | { type: 'pointermove'; pos: Vec2 };

// ─── Event Log ────────────────────────────────────────────────────

export type LogEntryType =
  | 'paused'
  | 'resumed'
  | 'time_scale'
  | 'zoom'
  | 'selected'
  | 'deselected'
  | 'reset'
  | 'resize'
  | 'quit';

export interface LogEntry {
  tick: number;
  type: LogEntryType;
  message: string;
}
