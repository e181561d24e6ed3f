import { BoundingBox, Point } from '../types/toolpath.types';

export class GeometryService {
  static readonly EPSILON = 1e-6;

  distance(a: Point, b: Point): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
  }

  pointsEqual(a: Point, b: Point, tolerance: number = GeometryService.EPSILON): boolean {
    return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
  }

  /**
   * Shortest distance from p to the segment a-b
   */
  distanceToSegment(p: Point, a: Point, b: Point): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const lengthSq = dx * dx + dy * dy;

    if (lengthSq === 0) {
      return this.distance(p, a);
    }

    const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
    return this.distance(p, { x: a.x + t * dx, y: a.y + t * dy });
  }

  /**
   * Shortest distance from p to any edge of an open polyline
   */
  distanceToPolyline(p: Point, points: readonly Point[]): number {
    if (points.length === 1) return this.distance(p, points[0]);

    let best = Infinity;
    for (let i = 0; i < points.length - 1; i++) {
      best = Math.min(best, this.distanceToSegment(p, points[i], points[i + 1]));
    }
    return best;
  }

  /**
   * Get bounding box of points, null when there are none
   */
  getBoundingBox(points: readonly Point[]): BoundingBox | null {
    if (points.length === 0) return null;

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;

    for (const p of points) {
      minX = Math.min(minX, p.x);
      minY = Math.min(minY, p.y);
      maxX = Math.max(maxX, p.x);
      maxY = Math.max(maxY, p.y);
    }

    return { min: { x: minX, y: minY }, max: { x: maxX, y: maxY } };
  }

  unionBoundingBoxes(boxes: readonly (BoundingBox | null)[]): BoundingBox | null {
    const corners: Point[] = [];
    for (const box of boxes) {
      if (box) corners.push(box.min, box.max);
    }
    return this.getBoundingBox(corners);
  }
}
