import { describe, it, expect } from 'vitest';
import { createBufferSink } from '../output';
import { Sparkline, sparkLevel, sparkline } from './Sparkline';

describe('sparkline', () => {
  it('should map values onto eight levels', () => {
    expect(sparkline([1, 5, 22, 13, 53, 29, 44, 90])).toBe('▁▁▂▁▅▃▄█\n');
  });

  it('should use the lowest level for a flat series', () => {
    expect(sparkline([3, 3, 3])).toBe('▁▁▁\n');
  });

  it('should return an empty string for no values', () => {
    expect(sparkline([])).toBe('');
  });

  it('should handle negative values', () => {
    expect(sparkline([-7, 0])).toBe('▁█\n');
  });

  it('should scale a very long series without overflowing the stack', () => {
    const values = Array.from({ length: 300_000 }, (_, i) => i % 100);
    const line = sparkline(values);
    expect(line).toHaveLength(300_001);
    expect(line[0]).toBe('▁');
    expect(line.slice(-2)).toBe('█\n');
  });

  describe('non-finite values', () => {
    it('should leave NaN out of the scale and draw it at the lowest level', () => {
      expect(sparkline([1, NaN, 3])).toBe('▁▁█\n');
    });

    it('should leave infinities out of the scale', () => {
      expect(sparkline([1, Infinity, 5, -Infinity])).toBe('▁▁█▁\n');
    });

    it('should draw a series with no finite values flat', () => {
      expect(sparkline([NaN, Infinity])).toBe('▁▁\n');
    });
  });

  describe('sparkLevel', () => {
    it('should put min at 0 and max at 7', () => {
      expect(sparkLevel(0, 0, 10)).toBe(0);
      expect(sparkLevel(10, 0, 10)).toBe(7);
      expect(sparkLevel(5, 0, 10)).toBe(3);
    });

    it('should clamp values outside the range', () => {
      expect(sparkLevel(20, 0, 10)).toBe(7);
      expect(sparkLevel(-5, 0, 10)).toBe(0);
    });

    it('should return 0 for a non-finite value or range', () => {
      expect(sparkLevel(NaN, 0, 10)).toBe(0);
      expect(sparkLevel(Infinity, 0, 10)).toBe(0);
      expect(sparkLevel(5, 0, Infinity)).toBe(0);
    });
  });

  describe('Sparkline', () => {
    it('should write the line to a sink', () => {
      const sink = createBufferSink();
      new Sparkline([0, 7]).render(sink);
      expect(sink.toString()).toBe('▁█\n');
    });

    it('should write nothing for no values', () => {
      const sink = createBufferSink();
      new Sparkline([]).render(sink);
      expect(sink.toString()).toBe('');
    });

    it('should not follow later changes to the input array', () => {
      const values = [0, 7];
      const spark = new Sparkline(values);
      values.push(100);
      expect(spark.toString()).toBe('▁█\n');
    });
  });
});
