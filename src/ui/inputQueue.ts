import type { InputEvent } from '../models';

/**
 * Buffers DOM events as InputEvents until the frame loop drains them, so
 * all input for a frame is applied at the start of that frame, in order.
 *
 * The canvas is kept at the window's size; a window resize resizes the
 * canvas and queues a resize event.
 */

export interface InputQueue {
  drain(): InputEvent[];
  dispose(): void;
}

const KEYS_WITHOUT_DEFAULT = new Set([' ', '+', '=', '-']);

export function fitCanvasToWindow(canvas: HTMLCanvasElement): void {
  canvas.width = window.innerWidth;
  canvas.height = window.innerHeight;
}

export function createInputQueue(canvas: HTMLCanvasElement): InputQueue {
  let pending: InputEvent[] = [];

  function canvasPoint(e: PointerEvent): { x: number; y: number } {
    const rect = canvas.getBoundingClientRect();
    return { x: e.clientX - rect.left, y: e.clientY - rect.top };
  }

  const onResize = (): void => {
    fitCanvasToWindow(canvas);
    pending.push({
      type: 'resize',
      width: canvas.width,
      height: canvas.height,
    });
  };

  const onKeyDown = (e: KeyboardEvent): void => {
    if (KEYS_WITHOUT_DEFAULT.has(e.key)) e.preventDefault();
    pending.push({ type: 'keydown', key: e.key });
  };

  const onPointerDown = (e: PointerEvent): void => {
    canvas.setPointerCapture(e.pointerId);
    pending.push({ type: 'pointerdown', button: e.button, pos: canvasPoint(e) });
  };

  const onPointerUp = (e: PointerEvent): void => {
    if (canvas.hasPointerCapture(e.pointerId)) {
      canvas.releasePointerCapture(e.pointerId);
    }
    pending.push({ type: 'pointerup', button: e.button });
  };

  const onPointerMove = (e: PointerEvent): void => {
    pending.push({ type: 'pointermove', pos: canvasPoint(e) });
  };

  window.addEventListener('resize', onResize);
  window.addEventListener('keydown', onKeyDown);
  canvas.addEventListener('pointerdown', onPointerDown);
  canvas.addEventListener('pointerup', onPointerUp);
  canvas.addEventListener('pointercancel', onPointerUp);
  canvas.addEventListener('pointermove', onPointerMove);

  return {
    drain(): InputEvent[] {
      const events = pending;
      pending = [];
      return events;
    },
    dispose(): void {
      window.removeEventListener('resize', onResize);
      window.removeEventListener('keydown', onKeyDown);
      canvas.removeEventListener('pointerdown', onPointerDown);
      canvas.removeEventListener('pointerup', onPointerUp);
      canvas.removeEventListener('pointercancel', onPointerUp);
      canvas.removeEventListener('pointermove', onPointerMove);
      pending = [];
    },
  };
}
