import './style.css';
import { getUnseenEntries } from './logSystem';
import { loadBundledCatalog } from './catalog';
import { createAppState, handleInput, tick } from './controller';
import { createFrameClock } from './frameClock';
import { createSeededRandom, defaultRandom, type RandomSource } from './random';
import { createCanvasRenderer } from './ui/canvasRenderer';
import { createControlsHint } from './ui/controlsHint';
import { createInputQueue, fitCanvasToWindow } from './ui/inputQueue';

/** Show a dismissable banner at the top of the page. */
function showErrorBanner(message: string): void {
  const banner = document.createElement('div');
  banner.className = 'error-banner';
  banner.textContent = message + ' (tap to dismiss)';
  banner.addEventListener('click', () => banner.remove());
  document.body.prepend(banner);
}

/** `?seed=42` makes the initial orbital phases reproducible. */
function randomFromUrl(): RandomSource {
  const raw = new URLSearchParams(window.location.search).get('seed');
  if (raw === null) return defaultRandom;
  const seed = Number(raw);
  if (!Number.isFinite(seed)) {
    console.warn(`Ignoring non-numeric seed "${raw}"`);
    return defaultRandom;
  }
  return createSeededRandom(seed);
}

function start(app: HTMLElement): void {
  const canvas = document.createElement('canvas');
  canvas.className = 'orrery-canvas';
  app.appendChild(canvas);
  fitCanvasToWindow(canvas);
  createControlsHint(app);

  const renderer = createCanvasRenderer(canvas);
  const state = createAppState({
    catalog: loadBundledCatalog(),
    random: randomFromUrl(),
    width: canvas.width,
    height: canvas.height,
  });
  const input = createInputQueue(canvas);
  const clock = createFrameClock();
  let mirrored = 0;

  function mirrorLog(): void {
    if (!import.meta.env.DEV) return;
    const unseen = getUnseenEntries(state.log, state.logCount, mirrored);
    for (const entry of unseen) {
      console.debug(`[tick ${entry.tick}] [${entry.type}] ${entry.message}`);
    }
    mirrored = state.logCount;
  }

  function frame(now: number): void {
    for (const event of input.drain()) handleInput(state, event);
    mirrorLog();
    if (!tick(state, renderer, clock.sample(now))) {
      input.dispose();
      console.info('Simulation stopped');
      return;
    }
    requestAnimationFrame(frame);
  }

  requestAnimationFrame(frame);
}

const app = document.getElementById('app');
if (!app) {
  throw new Error('Missing #app container');
}

try {
  start(app);
} catch (e) {
  console.error('Failed to start the orrery:', e);
  showErrorBanner(
    e instanceof Error ? `Failed to start: ${e.message}` : 'Failed to start'
  );
}
