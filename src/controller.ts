import type {
  BodyId,
  Camera,
  InputEvent,
  LogEntry,
  LogEntryType,
  Renderer,
  SceneGraph,
  SimulationContext,
  Vec2,
} from './models';
import type { Catalog } from './catalog';
import type { RandomSource } from './random';
import type { HudCache } from './sceneRenderer';
import type { InteractionState } from './picking';
import { buildSceneFromCatalog } from './catalog';
import {
  createCamera,
  panByScreenDelta,
  resetCamera,
  resizeViewport,
  zoomIn,
  zoomOut,
} from './camera';
import { stepSimulation } from './orbitalMechanics';
import { clearRenderCaches } from './renderCache';
import {
  PRIMARY_BUTTON,
  applySelectionClick,
  createInteractionState,
  pickBody,
} from './picking';
import { drawFrame, refreshHud } from './sceneRenderer';
import { getBodyCounts } from './sceneGraph';
import {
  createSimulationContext,
  formatTimeFactor,
  slowDown,
  speedUp,
  togglePause,
} from './timeSystem';
import { addLog } from './logSystem';

/**
 * Controller / Frame Loop
 *
 * Owns all mutable app state and applies it in a fixed order each tick:
 * input events first (camera, selection, time scale), then one
 * simulation step unless paused, then drawing. Picking only reads the
 * scene and camera.
 *
 * Two orthogonal state axes persist across frames:
 *   pan:        Idle ⇄ Dragging   (primary button down/up)
 *   simulation: Running ⇄ Paused  (Space)
 */

export interface AppOptions {
  catalog: Catalog;
  random: RandomSource;
  width: number;
  height: number;
}

export interface AppState {
  catalog: Catalog;
  random: RandomSource;
  scene: SceneGraph;
  camera: Camera;
  simulation: SimulationContext;
  interaction: InteractionState;
  selectedId: BodyId | null;
  pointer: Vec2;
  hud: HudCache | null;
  log: LogEntry[];
  /** Entries ever recorded, including trimmed ones. */
  logCount: number;
  tick: number;
  running: boolean;
}

export function createAppState(options: AppOptions): AppState {
  return {
    catalog: options.catalog,
    random: options.random,
    scene: buildSceneFromCatalog(options.catalog, {
      width: options.width,
      height: options.height,
      random: options.random,
    }),
    camera: createCamera(options.width, options.height),
    simulation: createSimulationContext(),
    interaction: createInteractionState(),
    selectedId: null,
    pointer: { x: 0, y: 0 },
    hud: null,
    log: [],
    logCount: 0,
    tick: 0,
    running: true,
  };
}

function record(state: AppState, type: LogEntryType, message: string): void {
  addLog(state.log, state.tick, type, message);
  state.logCount++;
}

/**
 * Throw away every body and rebuild the scene from the catalog with fresh
 * random phases. The camera returns to zoom 1 on the viewport center.
 */
export function resetScene(state: AppState): void {
  const { width, height } = state.camera.viewport;
  state.scene = buildSceneFromCatalog(state.catalog, {
    width,
    height,
    random: state.random,
  });
  resetCamera(state.camera);
  state.selectedId = null;
  state.hud = null;
  record(state, 'reset', 'Scene reset');
}

// ─── Input ────────────────────────────────────────────────────────

function handleKey(state: AppState, key: string): void {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  switch (normalized) {
    case ' ':
      togglePause(state.simulation);
      if (state.simulation.paused) {
        record(state, 'paused', 'Simulation paused');
      } else {
        record(state, 'resumed', 'Simulation resumed');
      }
      break;
    case '+':
    case '=':
      speedUp(state.simulation);
      record(
        state,
        'time_scale',
        `Time scale ${formatTimeFactor(state.simulation.timeFactor)}`
      );
      break;
    case '-':
      slowDown(state.simulation);
      record(
        state,
        'time_scale',
        `Time scale ${formatTimeFactor(state.simulation.timeFactor)}`
      );
      break;
    case 'i':
      zoomIn(state.camera);
      record(state, 'zoom', `Zoom ${state.camera.zoom.toFixed(2)}x`);
      break;
    case 'o':
      zoomOut(state.camera);
      record(state, 'zoom', `Zoom ${state.camera.zoom.toFixed(2)}x`);
      break;
    case 'r':
      resetScene(state);
      break;
    case 'Escape':
      state.running = false;
      record(state, 'quit', 'Exit requested');
      break;
    default:
      break;
  }
}

function handlePointerDown(state: AppState, pos: Vec2): void {
  state.interaction.dragging = true;
  state.interaction.lastPointer = { x: pos.x, y: pos.y };
  state.pointer = { x: pos.x, y: pos.y };

  const previous = state.selectedId;
  const hit = pickBody(state.scene, state.camera, pos);
  state.selectedId = applySelectionClick(previous, hit);

  if (state.selectedId !== null) {
    const name = state.scene.byId.get(state.selectedId)?.name ?? '';
    record(state, 'selected', `Selected ${name}`);
  } else if (previous !== null) {
    const name = state.scene.byId.get(previous)?.name ?? '';
    record(state, 'deselected', `Deselected ${name}`);
  }
}

function handlePointerMove(state: AppState, pos: Vec2): void {
  state.pointer = { x: pos.x, y: pos.y };
  if (!state.interaction.dragging) return;
  const dx = pos.x - state.interaction.lastPointer.x;
  const dy = pos.y - state.interaction.lastPointer.y;
  panByScreenDelta(state.camera, dx, dy);
  state.interaction.lastPointer = { x: pos.x, y: pos.y };
}

/** Apply one input event to camera, selection or simulation state. */
export function handleInput(state: AppState, event: InputEvent): void {
  switch (event.type) {
    case 'resize':
      resizeViewport(state.camera, event.width, event.height);
      clearRenderCaches(state.scene);
      state.hud = null;
      record(
        state,
        'resize',
        `Viewport resized to ${event.width}x${event.height}`
      );
      break;
    case 'keydown':
      handleKey(state, event.key);
      break;
    case 'pointerdown':
      if (event.button === PRIMARY_BUTTON) handlePointerDown(state, event.pos);
      break;
    case 'pointerup':
      if (event.button === PRIMARY_BUTTON) state.interaction.dragging = false;
      break;
    case 'pointermove':
      handlePointerMove(state, event.pos);
      break;
  }
}

// ─── Tick ─────────────────────────────────────────────────────────

/**
 * Run one frame: simulate (unless paused), then draw. Returns false once
 * the app has been asked to exit; nothing is simulated or drawn then.
 */
export function tick(state: AppState, renderer: Renderer, fps: number): boolean {
  if (!state.running) return false;

  stepSimulation(state.scene, state.simulation);
  state.tick++;

  const counts = getBodyCounts(state.scene);
  state.hud = refreshHud(
    state.hud,
    {
      fps: Math.trunc(fps),
      planets: counts.planets,
      moons: counts.moons,
      timeFactor: state.simulation.timeFactor,
      paused: state.simulation.paused,
    },
    renderer
  );

  drawFrame(state.scene, state.camera, renderer, {
    selectedId: state.selectedId,
    pointer: state.pointer,
    hud: state.hud,
  });
  return true;
}
