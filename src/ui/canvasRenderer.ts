import type { Color, PanelOptions, Rect, Renderer, Surface, Vec2 } from '../models';

/**
 * Renderer backed by a 2D canvas. Text and panels are pre-rendered into
 * offscreen canvases wrapped as surfaces, then blitted with drawImage.
 */

const FONT = '14px Arial';
const TEXT_HEIGHT = 17;
const TEXT_COLOR = '#fff';
const BACKGROUND = '#000';

class CanvasSurface implements Surface {
  constructor(readonly canvas: HTMLCanvasElement) {}

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }
}

export function toCssColor(color: Color): string {
  const [r, g, b] = color;
  const a = color.length === 4 ? color[3] / 255 : 1;
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

function get2dContext(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('2D canvas context unavailable');
  return ctx;
}

function requireCanvasSurface(surface: Surface): CanvasSurface {
  if (!(surface instanceof CanvasSurface)) {
    throw new Error('Surface was not created by this renderer');
  }
  return surface;
}

function roundedRectPath(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  radius: number
): void {
  const r = Math.min(radius, width / 2, height / 2);
  ctx.beginPath();
  ctx.moveTo(r, 0);
  ctx.arcTo(width, 0, width, height, r);
  ctx.arcTo(width, height, 0, height, r);
  ctx.arcTo(0, height, 0, 0, r);
  ctx.arcTo(0, 0, width, 0, r);
  ctx.closePath();
}

export function createCanvasRenderer(canvas: HTMLCanvasElement): Renderer {
  const ctx = get2dContext(canvas);

  return {
    clear(): void {
      ctx.fillStyle = BACKGROUND;
      ctx.fillRect(0, 0, canvas.width, canvas.height);
    },

    drawCircle(pos: Vec2, radius: number, color: Color): void {
      ctx.fillStyle = toCssColor(color);
      ctx.beginPath();
      ctx.arc(Math.trunc(pos.x), Math.trunc(pos.y), radius, 0, 2 * Math.PI);
      ctx.fill();
    },

    drawPolyline(
      points: Vec2[],
      closed: boolean,
      color: Color,
      width: number
    ): void {
      if (points.length < 2) return;
      ctx.strokeStyle = toCssColor(color);
      ctx.lineWidth = width;
      ctx.beginPath();
      ctx.moveTo(points[0].x, points[0].y);
      for (let i = 1; i < points.length; i++) {
        ctx.lineTo(points[i].x, points[i].y);
      }
      if (closed) ctx.closePath();
      ctx.stroke();
    },

    blit(surface: Surface, rect: Rect): void {
      const source = requireCanvasSurface(surface);
      ctx.drawImage(source.canvas, rect.x, rect.y, rect.width, rect.height);
    },

    textToSurface(text: string): Surface {
      const measure = get2dContext(document.createElement('canvas'));
      measure.font = FONT;
      const width = Math.max(1, Math.ceil(measure.measureText(text).width));

      const target = document.createElement('canvas');
      target.width = width;
      target.height = TEXT_HEIGHT;
      const tctx = get2dContext(target);
      tctx.font = FONT;
      tctx.fillStyle = TEXT_COLOR;
      tctx.textBaseline = 'top';
      tctx.fillText(text, 0, 0);
      return new CanvasSurface(target);
    },

    createPanel(
      width: number,
      height: number,
      lines: Surface[],
      options: PanelOptions
    ): Surface {
      const target = document.createElement('canvas');
      target.width = Math.max(1, Math.ceil(width));
      target.height = Math.max(1, Math.ceil(height));
      const pctx = get2dContext(target);

      if (options.background) {
        pctx.fillStyle = toCssColor(options.background);
        roundedRectPath(pctx, target.width, target.height, options.cornerRadius);
        pctx.fill();
      }
      lines.forEach((line, i) => {
        pctx.drawImage(
          requireCanvasSurface(line).canvas,
          options.padding,
          options.padding + i * options.lineHeight
        );
      });
      return new CanvasSurface(target);
    },
  };
}
