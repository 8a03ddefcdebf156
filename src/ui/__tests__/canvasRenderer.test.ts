import { describe, it, expect } from 'vitest';
import { toCssColor } from '../canvasRenderer';

describe('toCssColor', () => {
  it('treats RGB colors as opaque', () => {
    expect(toCssColor([255, 255, 190])).toBe('rgba(255, 255, 190, 1)');
  });

  it('maps an alpha channel from 0..255 to 0..1', () => {
    expect(toCssColor([0, 0, 0, 128])).toBe('rgba(0, 0, 0, 0.5019607843137255)');
    expect(toCssColor([50, 50, 50, 0])).toBe('rgba(50, 50, 50, 0)');
  });
});
