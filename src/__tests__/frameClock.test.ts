import { describe, it, expect } from 'vitest';
import { createFrameClock } from '../frameClock';

describe('createFrameClock', () => {
  it('counts frames within the last second', () => {
    const clock = createFrameClock();
    let fps = 0;
    for (let t = 0; t < 1000; t += 100) fps = clock.sample(t);
    expect(fps).toBe(10);
  });

  it('drops stamps a full second old', () => {
    const clock = createFrameClock();
    for (let t = 0; t < 1000; t += 100) clock.sample(t);
    // t=0 falls out, t=1000 comes in
    expect(clock.sample(1000)).toBe(10);
    expect(clock.sample(2500)).toBe(1);
  });
});
