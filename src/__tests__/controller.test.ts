import { describe, it, expect } from 'vitest';
import type { InputEvent } from '../models';
import {
  createAppState,
  handleInput,
  resetScene,
  tick,
  type AppState,
} from '../controller';
import { BASE_ANGULAR_SPEED } from '../timeSystem';
import {
  createRecordingRenderer,
  createTestCatalog,
  zeroRandom,
} from './testHelpers';

// Test catalog at 800×600 with every phase at 0: Sol sits at (400,300),
// Terra about 20 px to its right. The camera starts with screen == world.
function createState(): AppState {
  return createAppState({
    catalog: createTestCatalog(),
    random: zeroRandom,
    width: 800,
    height: 600,
  });
}

function bodyNamed(state: AppState, name: string) {
  const body = state.scene.bodies.find((b) => b.name === name);
  if (!body) throw new Error(`No body named ${name}`);
  return body;
}

function click(state: AppState, x: number, y: number): void {
  handleInput(state, { type: 'pointerdown', button: 0, pos: { x, y } });
  handleInput(state, { type: 'pointerup', button: 0 });
}

function press(state: AppState, ...keys: string[]): void {
  for (const key of keys) handleInput(state, { type: 'keydown', key });
}

function lastLog(state: AppState) {
  return state.log[state.log.length - 1];
}

describe('createAppState', () => {
  it('builds the scene and a centered camera', () => {
    const state = createState();
    expect(state.scene.bodies.map((b) => b.name)).toEqual([
      'Sol',
      'Terra',
      'Luna',
      'Ares',
    ]);
    expect(state.camera.pan).toEqual({ x: 400, y: 300 });
    expect(state.simulation).toEqual({ timeFactor: 1, paused: false });
    expect(state.selectedId).toBeNull();
    expect(state.running).toBe(true);
  });
});

describe('selection', () => {
  it('selects a body and deselects it on a second click', () => {
    const state = createState();
    const sol = bodyNamed(state, 'Sol');

    click(state, 400, 300);
    expect(state.selectedId).toBe(sol.id);
    expect(lastLog(state)).toEqual({
      tick: 0,
      type: 'selected',
      message: 'Selected Sol',
    });

    click(state, 400, 300);
    expect(state.selectedId).toBeNull();
    expect(lastLog(state).message).toBe('Deselected Sol');
  });

  it('switches to another body', () => {
    const state = createState();
    const terra = bodyNamed(state, 'Terra');
    click(state, 400, 300);
    click(state, terra.position.x, terra.position.y);
    expect(state.selectedId).toBe(terra.id);
  });

  it('clears the selection on empty space', () => {
    const state = createState();
    click(state, 400, 300);
    click(state, 100, 100);
    expect(state.selectedId).toBeNull();
  });

  it('logs nothing for an empty click without a selection', () => {
    const state = createState();
    click(state, 100, 100);
    expect(state.log).toEqual([]);
  });

  it('ignores non-primary buttons', () => {
    const state = createState();
    handleInput(state, { type: 'pointerdown', button: 2, pos: { x: 400, y: 300 } });
    expect(state.selectedId).toBeNull();
    expect(state.interaction.dragging).toBe(false);
  });
});

describe('panning', () => {
  it('pans by the pointer delta while dragging', () => {
    const state = createState();
    const events: InputEvent[] = [
      { type: 'pointerdown', button: 0, pos: { x: 100, y: 100 } },
      { type: 'pointermove', pos: { x: 110, y: 95 } },
      { type: 'pointermove', pos: { x: 115, y: 95 } },
    ];
    for (const event of events) handleInput(state, event);
    expect(state.camera.pan).toEqual({ x: 385, y: 305 });
  });

  it('stops panning after the button is released', () => {
    const state = createState();
    click(state, 100, 100);
    handleInput(state, { type: 'pointermove', pos: { x: 300, y: 300 } });
    expect(state.camera.pan).toEqual({ x: 400, y: 300 });
    expect(state.pointer).toEqual({ x: 300, y: 300 });
  });

  it('scales the pan by the zoom', () => {
    const state = createState();
    state.camera.zoom = 2;
    handleInput(state, { type: 'pointerdown', button: 0, pos: { x: 100, y: 100 } });
    handleInput(state, { type: 'pointermove', pos: { x: 120, y: 100 } });
    expect(state.camera.pan).toEqual({ x: 390, y: 300 });
  });
});

describe('keys', () => {
  it('toggles pause with Space', () => {
    const state = createState();
    press(state, ' ');
    expect(state.simulation.paused).toBe(true);
    expect(lastLog(state).message).toBe('Simulation paused');
    press(state, ' ');
    expect(state.simulation.paused).toBe(false);
    expect(lastLog(state).message).toBe('Simulation resumed');
  });

  it('adjusts the time factor with + = and -', () => {
    const state = createState();
    press(state, '+');
    expect(state.simulation.timeFactor).toBe(1.5);
    expect(lastLog(state)).toMatchObject({
      type: 'time_scale',
      message: 'Time scale 1.5x',
    });
    press(state, '=');
    expect(state.simulation.timeFactor).toBe(2.25);
    press(state, '-', '-');
    expect(state.simulation.timeFactor).toBe(1);
  });

  it('zooms with I and O in either case', () => {
    const state = createState();
    press(state, 'I');
    expect(state.camera.zoom).toBeCloseTo(1.1, 12);
    expect(lastLog(state).message).toBe('Zoom 1.10x');
    press(state, 'o');
    expect(state.camera.zoom).toBeCloseTo(1, 12);
  });

  it('stops the app on Escape', () => {
    const state = createState();
    press(state, 'Escape');
    expect(state.running).toBe(false);
    expect(lastLog(state).type).toBe('quit');

    const renderer = createRecordingRenderer();
    expect(tick(state, renderer, 60)).toBe(false);
    expect(renderer.calls).toEqual([]);
    expect(state.tick).toBe(0);
  });

  it('ignores unbound keys', () => {
    const state = createState();
    press(state, 'x', 'Enter');
    expect(state.log).toEqual([]);
  });
});

describe('tick', () => {
  it('steps the simulation and draws a frame', () => {
    const state = createState();
    const terra = bodyNamed(state, 'Terra');
    const renderer = createRecordingRenderer();

    expect(tick(state, renderer, 59.7)).toBe(true);
    expect(state.tick).toBe(1);
    expect(terra.elements.meanAnomaly).toBeCloseTo(BASE_ANGULAR_SPEED, 15);
    expect(state.hud?.stats).toEqual({
      fps: 59,
      planets: 2,
      moons: 1,
      timeFactor: 1,
      paused: false,
    });
    expect(renderer.count('clear')).toBe(1);
    expect(renderer.count('circle')).toBe(4);
  });

  it('keeps bodies still while paused but still draws', () => {
    const state = createState();
    const terra = bodyNamed(state, 'Terra');
    const before = { ...terra.position };
    const renderer = createRecordingRenderer();
    press(state, ' ');
    tick(state, renderer, 60);
    expect(terra.position).toEqual(before);
    expect(renderer.count('clear')).toBe(1);
    expect(state.hud?.stats.paused).toBe(true);
  });

  it('stamps log entries with the current tick', () => {
    const state = createState();
    const renderer = createRecordingRenderer();
    tick(state, renderer, 60);
    tick(state, renderer, 60);
    press(state, '+');
    expect(lastLog(state).tick).toBe(2);
  });

  it('counts every recorded entry', () => {
    const state = createState();
    press(state, '+');
    press(state, '-');
    expect(state.logCount).toBe(2);
    expect(state.log).toHaveLength(2);
  });
});

describe('resize', () => {
  it('recenters the camera and drops every render cache', () => {
    const state = createState();
    const renderer = createRecordingRenderer();
    const terra = bodyNamed(state, 'Terra');
    click(state, terra.position.x, terra.position.y);
    tick(state, renderer, 60);
    expect(terra.cache.orbit).not.toBeNull();
    expect(terra.cache.facts).not.toBeNull();

    handleInput(state, { type: 'resize', width: 1000, height: 500 });

    expect(state.camera.viewport).toEqual({ width: 1000, height: 500 });
    expect(state.camera.pan).toEqual({ x: 500, y: 250 });
    expect(state.hud).toBeNull();
    for (const body of state.scene.bodies) {
      expect(body.cache.orbit).toBeNull();
      expect(body.cache.facts).toBeNull();
      expect(body.cache.label).toBeNull();
    }
    expect(lastLog(state).message).toBe('Viewport resized to 1000x500');
  });

  it('rebuilds the orbit cache at the new size on the next frame', () => {
    const state = createState();
    const renderer = createRecordingRenderer();
    const terra = bodyNamed(state, 'Terra');
    tick(state, renderer, 60);
    handleInput(state, { type: 'resize', width: 1000, height: 500 });
    tick(state, renderer, 60);
    expect(terra.cache.orbitRebuilds).toBe(2);
    expect(terra.cache.orbit?.key.width).toBe(1000);
  });
});

describe('resetScene', () => {
  it('rebuilds the scene and resets camera and selection', () => {
    const state = createState();
    const oldScene = state.scene;
    click(state, 400, 300);
    press(state, 'i', 'i', '+');

    press(state, 'r');

    expect(state.scene).not.toBe(oldScene);
    expect(state.scene.bodies).toHaveLength(4);
    expect(state.selectedId).toBeNull();
    expect(state.camera.zoom).toBe(1);
    expect(state.camera.pan).toEqual({ x: 400, y: 300 });
    expect(state.simulation.timeFactor).toBe(1.5);
    expect(lastLog(state)).toMatchObject({ type: 'reset', message: 'Scene reset' });
  });

  it('places the star at the current viewport center', () => {
    const state = createState();
    handleInput(state, { type: 'resize', width: 1000, height: 500 });
    resetScene(state);
    expect(bodyNamed(state, 'Sol').position).toEqual({ x: 500, y: 250 });
  });
});
