/**
 * Scale mapping from data space to screen cells
 */

export interface AxisBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
  autoScale: boolean;
}

export interface ScreenPoint {
  x: number;
  y: number;
}

export const AUTO_SCALE_PADDING = 0.05;

/**
 * Position of value inside [min, max] as 0..1.
 * A flat or inverted range centers the value.
 */
export function scaleRatio(value: number, min: number, max: number): number {
  if (max > min) {
    return (value - min) / (max - min);
  }
  return 0.5;
}

/**
 * Min/max of both axes, each nonzero range widened by `padding` on both sides.
 * Zero ranges stay unpadded; an empty set gives all-zero bounds.
 */
export function computeBounds(
  points: ReadonlyArray<{ x: number; y: number }>,
  padding = AUTO_SCALE_PADDING
): AxisBounds {
  if (points.length === 0) {
    return { minX: 0, maxX: 0, minY: 0, maxY: 0, autoScale: true };
  }

  let minX = points[0].x;
  let maxX = points[0].x;
  let minY = points[0].y;
  let maxY = points[0].y;

  for (const point of points) {
    minX = Math.min(minX, point.x);
    maxX = Math.max(maxX, point.x);
    minY = Math.min(minY, point.y);
    maxY = Math.max(maxY, point.y);
  }

  const xRange = maxX - minX;
  const yRange = maxY - minY;

  if (xRange > 0) {
    minX -= xRange * padding;
    maxX += xRange * padding;
  }
  if (yRange > 0) {
    minY -= yRange * padding;
    maxY += yRange * padding;
  }

  return { minX, maxX, minY, maxY, autoScale: true };
}

export class ScaleMapper {
  constructor(
    private readonly bounds: AxisBounds,
    private readonly width: number,
    private readonly height: number
  ) {}

  /**
   * Column for an x value, 0 at the left edge
   */
  mapX(value: number): number {
    const ratio = scaleRatio(value, this.bounds.minX, this.bounds.maxX);
    return Math.round(ratio * (this.width - 1));
  }

  /**
   * Row for a y value; inverted so larger values sit higher
   */
  mapY(value: number): number {
    const ratio = scaleRatio(value, this.bounds.minY, this.bounds.maxY);
    return Math.round((1 - ratio) * (this.height - 1));
  }

  map(x: number, y: number): ScreenPoint {
    return { x: this.mapX(x), y: this.mapY(y) };
  }
}
