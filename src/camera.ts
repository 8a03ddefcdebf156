import type { Camera, Vec2 } from './models';

/**
 * Camera: zoom and pan over the world plane.
 *
 * Pure scale + translate (no rotation). `pan` is the world point shown at
 * the viewport center, so
 *   screen = (world − pan) · zoom + viewport / 2
 *
 * - Drag pans opposite to the pointer (drag right = world moves right)
 * - Zoom keys step by ZOOM_STEP, clamped to [MIN_ZOOM, MAX_ZOOM]
 * - Resize recenters the pan on the new viewport center
 */

export const MIN_ZOOM = 0.05;
export const MAX_ZOOM = 5.0;
export const DEFAULT_ZOOM = 1;
export const ZOOM_STEP = 1.1;

export function clampZoom(zoom: number): number {
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom));
}

export function createCamera(width: number, height: number): Camera {
  return {
    zoom: DEFAULT_ZOOM,
    pan: { x: width / 2, y: height / 2 },
    viewport: { width, height },
  };
}

export function worldToScreen(camera: Camera, p: Vec2): Vec2 {
  return {
    x: (p.x - camera.pan.x) * camera.zoom + camera.viewport.width / 2,
    y: (p.y - camera.pan.y) * camera.zoom + camera.viewport.height / 2,
  };
}

export function screenToWorld(camera: Camera, s: Vec2): Vec2 {
  return {
    x: (s.x - camera.viewport.width / 2) / camera.zoom + camera.pan.x,
    y: (s.y - camera.viewport.height / 2) / camera.zoom + camera.pan.y,
  };
}

/**
 * Pan by a screen-pixel delta. The camera moves opposite to the pointer
 * so the world point under the cursor follows it.
 */
export function panByScreenDelta(camera: Camera, dx: number, dy: number): void {
  camera.pan.x -= dx / camera.zoom;
  camera.pan.y -= dy / camera.zoom;
}

export function zoomIn(camera: Camera): void {
  camera.zoom = clampZoom(camera.zoom * ZOOM_STEP);
}

export function zoomOut(camera: Camera): void {
  camera.zoom = clampZoom(camera.zoom / ZOOM_STEP);
}

export function resizeViewport(
  camera: Camera,
  width: number,
  height: number
): void {
  camera.viewport.width = width;
  camera.viewport.height = height;
  camera.pan.x = width / 2;
  camera.pan.y = height / 2;
}

/** Back to zoom 1 centered on the viewport. */
export function resetCamera(camera: Camera): void {
  camera.zoom = DEFAULT_ZOOM;
  camera.pan.x = camera.viewport.width / 2;
  camera.pan.y = camera.viewport.height / 2;
}
