import { describe, test, expect } from 'vitest';
import { clampUnit, rotate3d, toggleBetween, ZERO_OFFSET } from '../utils/motion';

describe('motion helpers', () => {
  test('toggleBetween flips between the two endpoints', () => {
    expect(toggleBetween(0, 0, 200)).toBe(200);
    expect(toggleBetween(200, 0, 200)).toBe(0);
    expect(toggleBetween(1.5, 1, 1.5)).toBe(1);
  });

  test('toggleBetween sends anything off the endpoints back to the first', () => {
    expect(toggleBetween(75, 0, 200)).toBe(0);
  });

  test('clampUnit keeps values inside [0, 1]', () => {
    expect(clampUnit(-0.5)).toBe(0);
    expect(clampUnit(0.25)).toBe(0.25);
    expect(clampUnit(1)).toBe(1);
    expect(clampUnit(3)).toBe(1);
  });

  test('rotate3d builds the CSS function', () => {
    expect(rotate3d({ x: 1, y: 1, z: 0 }, 45)).toBe('rotate3d(1, 1, 0, 45deg)');
  });

  test('zero offset is frozen', () => {
    expect(ZERO_OFFSET).toEqual({ x: 0, y: 0 });
    expect(Object.isFrozen(ZERO_OFFSET)).toBe(true);
  });
});
