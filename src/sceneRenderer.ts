import type {
  BodyId,
  Camera,
  CelestialBody,
  Color,
  Renderer,
  SceneGraph,
  Surface,
  Vec2,
  Viewport,
} from './models';
import { worldToScreen } from './camera';
import {
  getFactsOverlay,
  getLabelSurface,
  projectSatelliteOrbit,
  refreshOrbitCache,
} from './renderCache';
import { getParent, isRootChild } from './sceneGraph';
import { formatTimeFactor } from './timeSystem';

/**
 * Scene Renderer
 *
 * Turns the scene into draw calls on a Renderer: orbit paths, body
 * disks, name labels, the facts panel of the selected body and the HUD.
 * Bodies are drawn in insertion order, so later bodies land on top.
 */

export const ORBIT_COLOR: Color = [50, 50, 50, 64];
export const FACTS_POINTER_OFFSET = 20;
export const LABEL_GAP_ABOVE = 15;
export const LABEL_GAP_BELOW = 5;

export const HUD_POSITION: Vec2 = { x: 10, y: 10 };
export const HUD_PADDING = 10;
export const HUD_LINE_HEIGHT = 22;

export const CONTROL_HINTS: readonly string[] = [
  'Space - Pause/Resume',
  '+/- - Adjust speed',
  'I/O - Zoom',
  'Drag - Pan',
  'Click - Show facts',
  'R - Reset simulation',
  'Esc - Exit',
];

// ─── Bodies ───────────────────────────────────────────────────────

/**
 * Bodies whose projected center lies more than half the larger viewport
 * dimension outside the viewport are skipped entirely.
 */
export function isWithinDrawMargin(viewport: Viewport, screen: Vec2): boolean {
  const margin = 0.5 * Math.max(viewport.width, viewport.height);
  return (
    screen.x >= -margin &&
    screen.x <= viewport.width + margin &&
    screen.y >= -margin &&
    screen.y <= viewport.height + margin
  );
}

export function orbitLineWidth(semiMajorAxis: number): number {
  return semiMajorAxis > 10 ? 2 : 1;
}

/** Centered above the disk in the upper half of the view, below otherwise. */
export function labelPosition(
  screen: Vec2,
  scaledRadius: number,
  label: Surface,
  viewport: Viewport
): Vec2 {
  const offsetY =
    screen.y < viewport.height / 2
      ? -scaledRadius - LABEL_GAP_ABOVE
      : scaledRadius + LABEL_GAP_BELOW;
  return {
    x: Math.trunc(screen.x - label.width / 2),
    y: Math.trunc(screen.y + offsetY),
  };
}

function drawOrbit(
  scene: SceneGraph,
  body: CelestialBody,
  camera: Camera,
  renderer: Renderer
): void {
  const parent = getParent(scene, body);
  if (!parent) return;

  if (isRootChild(scene, body)) {
    refreshOrbitCache(scene, body, camera);
    const cached = body.cache.orbit;
    if (cached) {
      renderer.drawPolyline(
        cached.points,
        true,
        ORBIT_COLOR,
        orbitLineWidth(body.elements.semiMajorAxis)
      );
    }
    return;
  }

  renderer.drawPolyline(
    projectSatelliteOrbit(body, parent.position, camera),
    true,
    ORBIT_COLOR,
    1
  );
}

export function drawBody(
  scene: SceneGraph,
  body: CelestialBody,
  camera: Camera,
  renderer: Renderer
): boolean {
  const screen = worldToScreen(camera, body.position);
  if (!isWithinDrawMargin(camera.viewport, screen)) return false;

  drawOrbit(scene, body, camera, renderer);

  const scaledRadius = body.radius * camera.zoom;
  renderer.drawCircle(screen, Math.max(1, scaledRadius), body.color);

  if (body.name && scaledRadius > 1) {
    const label = getLabelSurface(body, renderer);
    const pos = labelPosition(screen, scaledRadius, label, camera.viewport);
    renderer.blit(label, {
      x: pos.x,
      y: pos.y,
      width: label.width,
      height: label.height,
    });
  }
  return true;
}

// ─── Facts Overlay ────────────────────────────────────────────────

/**
 * Place a panel beside the pointer, flipping to the other side of the
 * pointer on each axis where it would run past the viewport edge.
 */
export function placeFactsOverlay(
  pointer: Vec2,
  panel: Surface,
  viewport: Viewport
): Vec2 {
  let x = pointer.x + FACTS_POINTER_OFFSET;
  let y = pointer.y + FACTS_POINTER_OFFSET;
  if (x + panel.width > viewport.width) {
    x = pointer.x - panel.width - FACTS_POINTER_OFFSET;
  }
  if (y + panel.height > viewport.height) {
    y = pointer.y - panel.height - FACTS_POINTER_OFFSET;
  }
  return { x, y };
}

export function drawFactsOverlay(
  body: CelestialBody,
  pointer: Vec2,
  camera: Camera,
  renderer: Renderer
): void {
  const panel = getFactsOverlay(body, renderer);
  if (!panel) return;
  const pos = placeFactsOverlay(pointer, panel, camera.viewport);
  renderer.blit(panel, {
    x: pos.x,
    y: pos.y,
    width: panel.width,
    height: panel.height,
  });
}

// ─── HUD ──────────────────────────────────────────────────────────

export interface HudStats {
  fps: number;
  planets: number;
  moons: number;
  timeFactor: number;
  paused: boolean;
}

export interface HudCache {
  stats: HudStats;
  surface: Surface;
}

export function buildHudLines(stats: HudStats): string[] {
  return [
    `FPS: ${stats.fps}`,
    `Planets: ${stats.planets}`,
    `Moons: ${stats.moons}`,
    `Time Scale: ${formatTimeFactor(stats.timeFactor)}`,
    stats.paused ? 'Paused' : 'Running',
    '',
    'Controls:',
    ...CONTROL_HINTS,
  ];
}

function sameHudStats(a: HudStats, b: HudStats): boolean {
  return (
    a.fps === b.fps &&
    a.planets === b.planets &&
    a.moons === b.moons &&
    a.timeFactor === b.timeFactor &&
    a.paused === b.paused
  );
}

/** Reuse the HUD surface unless one of its displayed values changed. */
export function refreshHud(
  cache: HudCache | null,
  stats: HudStats,
  renderer: Renderer
): HudCache {
  if (cache && sameHudStats(cache.stats, stats)) return cache;

  const lines = buildHudLines(stats).map((line) =>
    renderer.textToSurface(line)
  );
  const maxWidth = Math.max(...lines.map((s) => s.width));
  const surface = renderer.createPanel(
    maxWidth + 2 * HUD_PADDING,
    lines.length * HUD_LINE_HEIGHT + 2 * HUD_PADDING,
    lines,
    {
      padding: HUD_PADDING,
      lineHeight: HUD_LINE_HEIGHT,
      background: null,
      cornerRadius: 0,
    }
  );
  return { stats: { ...stats }, surface };
}

// ─── Frame ────────────────────────────────────────────────────────

export interface FrameInput {
  selectedId: BodyId | null;
  pointer: Vec2;
  hud: HudCache;
}

/** Draw one full frame. Returns the number of bodies drawn. */
export function drawFrame(
  scene: SceneGraph,
  camera: Camera,
  renderer: Renderer,
  frame: FrameInput
): number {
  renderer.clear();

  let drawn = 0;
  for (const body of scene.bodies) {
    if (drawBody(scene, body, camera, renderer)) drawn++;
  }

  if (frame.selectedId !== null) {
    const selected = scene.byId.get(frame.selectedId);
    if (selected) drawFactsOverlay(selected, frame.pointer, camera, renderer);
  }

  renderer.blit(frame.hud.surface, {
    x: HUD_POSITION.x,
    y: HUD_POSITION.y,
    width: frame.hud.surface.width,
    height: frame.hud.surface.height,
  });
  return drawn;
}
