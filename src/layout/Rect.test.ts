import { describe, it, expect } from 'vitest';
import { vec2 } from '../math.js';
import { Rect } from './Rect.js';

describe('Rect', () => {
  const rect = new Rect(2, 3, 10, 4);

  it('should derive corners and center', () => {
    expect(rect.position()).toEqual(vec2(2, 3));
    expect(rect.size()).toEqual(vec2(10, 4));
    expect(rect.bottomRight()).toEqual(vec2(12, 7));
    expect(rect.center()).toEqual(vec2(7, 5));
  });

  it('should contain points up to but not including the far edges', () => {
    expect(rect.contains(vec2(2, 3))).toBe(true);
    expect(rect.contains(vec2(11, 6))).toBe(true);
    expect(rect.contains(vec2(12, 6))).toBe(false);
  });

  it('should intersect to an empty rect when apart', () => {
    expect(rect.intersect(new Rect(0, 0, 5, 5))).toEqual(new Rect(2, 3, 3, 2));
    expect(rect.intersect(new Rect(20, 20, 1, 1)).isEmpty()).toBe(true);
  });

  it('should apply padding without going negative', () => {
    expect(rect.withPadding(1)).toEqual(new Rect(3, 4, 8, 2));
    expect(rect.withPaddingSides(0, 1, 2, 3)).toEqual(new Rect(5, 3, 6, 2));
    expect(rect.withPadding(5).size()).toEqual(vec2(0, 0));
  });

  it('should build from corners', () => {
    expect(Rect.fromCorners(vec2(1, 1), vec2(4, 3)).equals(new Rect(1, 1, 3, 2))).toBe(true);
  });
});
