import type { BodyId, Camera, SceneGraph, Vec2 } from './models';
import { worldToScreen } from './camera';
import { euclideanDistance } from './orbitalMechanics';

/** Minimum hit radius in screen pixels, so tiny bodies stay clickable. */
export const PICK_RADIUS_PX = 10;

export const PRIMARY_BUTTON = 0;

/** Pan axis of the interaction state machine: Idle ⇄ Dragging. */
export interface InteractionState {
  dragging: boolean;
  lastPointer: Vec2;
}

export function createInteractionState(): InteractionState {
  return { dragging: false, lastPointer: { x: 0, y: 0 } };
}

/**
 * Hit-test a screen point. Bodies are checked in insertion order and the
 * first one within max(projected radius, PICK_RADIUS_PX) wins.
 */
export function pickBody(
  scene: SceneGraph,
  camera: Camera,
  point: Vec2
): BodyId | null {
  for (const body of scene.bodies) {
    const screen = worldToScreen(camera, body.position);
    const hitRadius = Math.max(body.radius * camera.zoom, PICK_RADIUS_PX);
    if (euclideanDistance(point, screen) <= hitRadius) return body.id;
  }
  return null;
}

/**
 * Next selection after a click: clicking the selected body again or
 * clicking empty space deselects, anything else selects the hit.
 */
export function applySelectionClick(
  selectedId: BodyId | null,
  hitId: BodyId | null
): BodyId | null {
  if (hitId === null || hitId === selectedId) return null;
  return hitId;
}
