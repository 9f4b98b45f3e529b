import { describe, test, expect } from 'vitest';
import { catalogEntries, examplePath, findEntry } from '../catalog/registry';

describe('catalog registry', () => {
  test('lists the examples in display order', () => {
    expect(catalogEntries.map((e) => e.label)).toEqual([
      'Basic: State Change',
      'Transition: Combined (Slide + Opacity)',
      'Spring: Custom Spring',
      'Timing Curve: EaseInOut',
      'Modifier: Rotation and Scale',
      'Repeat and Delay',
      'Chained Animation',
      '3D Animation',
      'Shared Layout: Geometry Morph',
      'Animate Progress',
      'Drag: Parallax Offset',
    ]);
  });

  test('slugs are unique and URL-safe', () => {
    const slugs = catalogEntries.map((e) => e.slug);
    expect(new Set(slugs).size).toBe(slugs.length);
    for (const slug of slugs) {
      expect(slug).toMatch(/^[a-z0-9]+(-[a-z0-9]+)*$/);
    }
  });

  test('findEntry and examplePath', () => {
    expect(findEntry('chained')?.label).toBe('Chained Animation');
    expect(findEntry('missing')).toBeUndefined();
    expect(findEntry(undefined)).toBeUndefined();
    expect(examplePath('progress')).toBe('/examples/progress');
  });

  test('every entry loads a screen component', async () => {
    for (const entry of catalogEntries) {
      const mod = await entry.load();
      expect(typeof mod.default).toBe('function');
    }
  });
});
