import { describe, expect, it } from 'vitest';

import { OutOfRange, ValueNotAvailable } from '@/lib/errors';
import { interpLinear, interpolate } from '@/lib/processing/interpolation';

import { linspace, mockData } from '../fixtures';

function elevenPoints(withBounds = true) {
  return mockData({
    axis: linspace(10, 20, 11),
    data: linspace(2, 3, 11),
    lowerBounds: withBounds ? linspace(1, 2, 11) : undefined,
    upperBounds: withBounds ? linspace(3, 4, 11) : undefined,
  });
}

describe('interpLinear', () => {
  it('interpolates between knots', () => {
    expect(interpLinear([10, 11, 12], [0.98, 0.985, 0.99], 10.5)).toBeCloseTo(0.9825, 12);
  });

  it('returns stored values at knots and endpoints', () => {
    const ys = [0.98, 0.985, 0.99];
    expect(interpLinear([10, 11, 12], ys, 10)).toBe(0.98);
    expect(interpLinear([10, 11, 12], ys, 11)).toBe(0.985);
    expect(interpLinear([10, 11, 12], ys, 12)).toBe(0.99);
  });

  it('handles a descending axis', () => {
    expect(interpLinear([12, 11, 10], [0.99, 0.985, 0.98], 10.5)).toBeCloseTo(0.9825, 12);
    expect(interpLinear([12, 11, 10], [0.99, 0.985, 0.98], 11.5)).toBeCloseTo(0.9875, 12);
  });
});

describe('interpolate', () => {
  it('single value yields one value in every series', () => {
    const d = interpolate(elevenPoints(), { values: [13.5], kind: 'linear' });
    expect(d.axes[0].values).toEqual([13.5]);
    expect(d.data).toHaveLength(1);
    expect(d.lowerBounds).toHaveLength(1);
    expect(d.upperBounds).toHaveLength(1);
    expect(d.data[0]).toBeCloseTo(2.35, 10);
    expect(d.lowerBounds[0]).toBeCloseTo(1.35, 10);
    expect(d.upperBounds[0]).toBeCloseTo(3.35, 10);
  });

  it('range keeps all series the same length', () => {
    const d = interpolate(elevenPoints(), { values: linspace(13, 14, 11), kind: 'linear' });
    expect(d.axes[0].values).toHaveLength(11);
    expect(d.data).toHaveLength(11);
    expect(d.lowerBounds).toHaveLength(11);
    expect(d.upperBounds).toHaveLength(11);
  });

  it('leaves bounds empty when the input has none', () => {
    const d = interpolate(elevenPoints(false), { values: [13.5], kind: 'linear' });
    expect(d.data).toHaveLength(1);
    expect(d.lowerBounds).toEqual([]);
    expect(d.upperBounds).toEqual([]);
  });

  it('accepts the axis endpoints and returns their stored values', () => {
    const d = interpolate(mockData(), { values: [10, 12], kind: 'linear' });
    expect(d.data).toEqual([0.98, 0.99]);
  });

  it.each([
    [[-13.5]],
    [[135]],
    [linspace(5, 15, 11)],
    [linspace(15, 25, 11)],
    [linspace(-5, 5, 11)],
  ])('rejects values outside the axis range (%j)', (values) => {
    expect(() => interpolate(elevenPoints(), { values, kind: 'linear' })).toThrow(OutOfRange);
  });

  it('reports the available range', () => {
    try {
      interpolate(elevenPoints(), { values: [9.5, 12], kind: 'linear' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(OutOfRange);
      if (!(e instanceof OutOfRange)) return;
      expect(e.min).toBe(10);
      expect(e.max).toBe(20);
      expect(e.values).toEqual([9.5]);
      expect(e.message).toMatch(/^Requested range not within data range\. Available range: 10 to 20/);
    }
  });

  it('rejects any request on an empty axis', () => {
    const d = mockData({ axis: [], data: [] });
    expect(() => interpolate(d, { values: [1], kind: 'linear' })).toThrow(OutOfRange);
  });

  describe("kind 'none'", () => {
    it('returns stored values verbatim', () => {
      const d = interpolate(elevenPoints(), { values: [13, 17], kind: 'none' });
      const src = elevenPoints();
      expect(d.axes[0].values).toEqual([13, 17]);
      expect(d.data).toEqual([src.data[3], src.data[7]]);
      expect(d.lowerBounds).toEqual([src.lowerBounds[3], src.lowerBounds[7]]);
      expect(d.upperBounds).toEqual([src.upperBounds[3], src.upperBounds[7]]);
    });

    it('keeps the requested order', () => {
      const d = interpolate(mockData(), { values: [12, 10], kind: 'none' });
      expect(d.data).toEqual([0.99, 0.98]);
    });

    it('fails for a value not on the axis', () => {
      expect(() => interpolate(elevenPoints(), { values: [13.4], kind: 'none' })).toThrow(/Values not available/);
    });

    it('fails when only some values are on the axis', () => {
      expect(() => interpolate(elevenPoints(), { values: linspace(13.2, 13.6, 3), kind: 'none' })).toThrow(
        ValueNotAvailable,
      );
    });

    it('fails on duplicate requests', () => {
      expect(() => interpolate(mockData(), { values: [11, 11], kind: 'none' })).toThrow(ValueNotAvailable);
    });

    it('fails on an ambiguous axis', () => {
      const d = mockData({ axis: [10, 11, 11], data: [1, 2, 3] });
      expect(() => interpolate(d, { values: [11], kind: 'none' })).toThrow(ValueNotAvailable);
    });
  });
});
