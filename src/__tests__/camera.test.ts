import { describe, it, expect } from 'vitest';
import {
  MAX_ZOOM,
  MIN_ZOOM,
  clampZoom,
  createCamera,
  panByScreenDelta,
  resetCamera,
  resizeViewport,
  screenToWorld,
  worldToScreen,
  zoomIn,
  zoomOut,
} from '../camera';

describe('createCamera', () => {
  it('starts at zoom 1 centered on the viewport', () => {
    expect(createCamera(800, 600)).toEqual({
      zoom: 1,
      pan: { x: 400, y: 300 },
      viewport: { width: 800, height: 600 },
    });
  });
});

describe('worldToScreen / screenToWorld', () => {
  it('maps the pan point to the viewport center', () => {
    const camera = createCamera(800, 600);
    camera.pan = { x: -120, y: 75 };
    camera.zoom = 2.5;
    expect(worldToScreen(camera, { x: -120, y: 75 })).toEqual({
      x: 400,
      y: 300,
    });
  });

  it('scales offsets from the pan point by the zoom', () => {
    const camera = createCamera(800, 600);
    camera.zoom = 2;
    expect(worldToScreen(camera, { x: 410, y: 295 })).toEqual({
      x: 420,
      y: 290,
    });
  });

  it('round-trips across the zoom range', () => {
    const camera = createCamera(1024, 768);
    for (const zoom of [MIN_ZOOM, 0.3, 1, 2.5, MAX_ZOOM]) {
      camera.zoom = zoom;
      camera.pan = { x: 37.5, y: -812 };
      const world = { x: 123.25, y: -44.5 };
      const back = screenToWorld(camera, worldToScreen(camera, world));
      expect(back.x).toBeCloseTo(world.x, 9);
      expect(back.y).toBeCloseTo(world.y, 9);
    }
  });
});

describe('panByScreenDelta', () => {
  it('moves the pan opposite to the pointer, divided by zoom', () => {
    const camera = createCamera(800, 600);
    camera.zoom = 2;
    panByScreenDelta(camera, 10, -4);
    expect(camera.pan).toEqual({ x: 395, y: 302 });
  });

  it('keeps the world point under the pointer', () => {
    const camera = createCamera(800, 600);
    camera.zoom = 0.5;
    const grabbed = screenToWorld(camera, { x: 100, y: 100 });
    panByScreenDelta(camera, 30, 20);
    const after = worldToScreen(camera, grabbed);
    expect(after.x).toBeCloseTo(130, 9);
    expect(after.y).toBeCloseTo(120, 9);
  });
});

describe('zoom', () => {
  it('steps by a factor of 1.1', () => {
    const camera = createCamera(800, 600);
    zoomIn(camera);
    expect(camera.zoom).toBeCloseTo(1.1, 12);
    zoomOut(camera);
    expect(camera.zoom).toBeCloseTo(1, 12);
  });

  it('clamps to the allowed range', () => {
    const camera = createCamera(800, 600);
    camera.zoom = 4.9;
    zoomIn(camera);
    expect(camera.zoom).toBe(MAX_ZOOM);
    camera.zoom = MIN_ZOOM;
    zoomOut(camera);
    expect(camera.zoom).toBe(MIN_ZOOM);
  });

  it('clampZoom passes values inside the range through', () => {
    expect(clampZoom(0.7)).toBe(0.7);
    expect(clampZoom(0)).toBe(MIN_ZOOM);
    expect(clampZoom(12)).toBe(MAX_ZOOM);
  });
});

describe('resizeViewport / resetCamera', () => {
  it('recenters the pan on the new viewport', () => {
    const camera = createCamera(800, 600);
    camera.pan = { x: 10, y: 10 };
    camera.zoom = 3;
    resizeViewport(camera, 1000, 500);
    expect(camera.viewport).toEqual({ width: 1000, height: 500 });
    expect(camera.pan).toEqual({ x: 500, y: 250 });
    expect(camera.zoom).toBe(3);
  });

  it('reset restores zoom 1 on the viewport center', () => {
    const camera = createCamera(800, 600);
    camera.pan = { x: -50, y: 9 };
    camera.zoom = 0.2;
    resetCamera(camera);
    expect(camera.zoom).toBe(1);
    expect(camera.pan).toEqual({ x: 400, y: 300 });
  });
});
