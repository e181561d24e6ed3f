/**
 * Curve Flattener Service
 * Turns path segments into polylines whose deviation from the true curve stays within tolerance
 */
import { GeometryService } from './geometry.service';
import { ConfigurationError } from '../errors/toolpath.errors';
import {
  ArcSegment,
  CubicSegment,
  Path,
  PathSegment,
  Point,
  Polyline,
} from '../types/toolpath.types';

export type WarningSink = (message: string) => void;

const ignoreWarning: WarningSink = () => undefined;

export class CurveFlattenerService {
  static readonly MAX_SUBDIVISION_DEPTH = 16;
  static readonly MAX_ARC_STEPS = 4096;

  private readonly geometry = new GeometryService();

  /**
   * Flatten one segment. The first point is always the segment start and the last its end.
   */
  flattenSegment(segment: PathSegment, tolerance: number, warn: WarningSink = ignoreWarning): Point[] {
    this.assertTolerance(tolerance);

    switch (segment.type) {
      case 'line':
        return [segment.start, segment.end];
      case 'cubic':
        return this.flattenCubic(segment, tolerance, warn);
      case 'arc':
        return this.flattenArc(segment, tolerance, warn);
    }
  }

  /**
   * Flatten a whole path into one or more polylines.
   * A discontinuity between segments starts a new polyline instead of bridging the gap.
   */
  flattenPath(path: Path, tolerance: number, warn: WarningSink = ignoreWarning): Polyline[] {
    this.assertTolerance(tolerance);

    const polylines: Polyline[] = [];
    let current: Point[] = [];

    path.segments.forEach((segment, index) => {
      if (this.isDegenerate(segment)) {
        warn(`Skipped zero-length ${segment.type} segment ${index}`);
        return;
      }

      const last = current[current.length - 1];
      if (last && !this.geometry.pointsEqual(last, segment.start)) {
        warn(
          `Segment ${index} starts at (${segment.start.x}, ${segment.start.y}) ` +
          `but previous segment ended at (${last.x}, ${last.y}); starting a new polyline`
        );
        this.finishPolyline(current, polylines);
        current = [];
      }

      const points = this.flattenSegment(segment, tolerance, (message) => warn(`Segment ${index}: ${message}`));
      current.push(...(current.length > 0 ? points.slice(1) : points));
    });

    this.finishPolyline(current, polylines);
    return polylines;
  }

  private finishPolyline(points: Point[], into: Polyline[]): void {
    if (points.length < 2) return;

    const first = points[0];
    const last = points[points.length - 1];
    if (points.length > 2 && this.geometry.pointsEqual(first, last)) {
      into.push({ points: points.slice(0, -1), closed: true });
    } else {
      into.push({ points: [...points], closed: false });
    }
  }

  private isDegenerate(segment: PathSegment): boolean {
    const { start, end } = segment;
    switch (segment.type) {
      case 'line':
      case 'arc':
        return this.geometry.pointsEqual(start, end);
      case 'cubic':
        return (
          this.geometry.pointsEqual(start, end) &&
          this.geometry.pointsEqual(start, segment.control1) &&
          this.geometry.pointsEqual(start, segment.control2)
        );
    }
  }

  private assertTolerance(tolerance: number): void {
    if (!Number.isFinite(tolerance) || tolerance <= 0) {
      throw new ConfigurationError('approximationTolerance', `must be a positive number, got ${tolerance}`);
    }
  }

  /**
   * Recursive de Casteljau subdivision. A piece is flat once both control points
   * lie within tolerance of its chord, which bounds the whole piece (convex hull).
   */
  private flattenCubic(segment: CubicSegment, tolerance: number, warn: WarningSink): Point[] {
    const points: Point[] = [segment.start];
    let exhausted = false;

    const subdivide = (p0: Point, p1: Point, p2: Point, p3: Point, depth: number): void => {
      const deviation = Math.max(
        this.geometry.distanceToSegment(p1, p0, p3),
        this.geometry.distanceToSegment(p2, p0, p3)
      );

      if (deviation <= tolerance || depth >= CurveFlattenerService.MAX_SUBDIVISION_DEPTH) {
        if (deviation > tolerance) exhausted = true;
        points.push(p3);
        return;
      }

      const p01 = midpoint(p0, p1);
      const p12 = midpoint(p1, p2);
      const p23 = midpoint(p2, p3);
      const p012 = midpoint(p01, p12);
      const p123 = midpoint(p12, p23);
      const mid = midpoint(p012, p123);

      subdivide(p0, p01, p012, mid, depth + 1);
      subdivide(mid, p123, p23, p3, depth + 1);
    };

    subdivide(segment.start, segment.control1, segment.control2, segment.end, 0);

    if (exhausted) {
      warn(
        `cubic curve did not reach tolerance ${tolerance} within ` +
        `${CurveFlattenerService.MAX_SUBDIVISION_DEPTH} subdivisions; using best approximation`
      );
    }

    return points;
  }

  /**
   * Equal angular steps sized so the sagitta of every chord is within tolerance
   */
  private flattenArc(segment: ArcSegment, tolerance: number, warn: WarningSink): Point[] {
    const { start, end } = segment;
    const chord = this.geometry.distance(start, end);

    if (!Number.isFinite(segment.radius) || segment.radius <= 0) {
      warn(`arc radius ${segment.radius} is not positive; treating arc as a straight line`);
      return [start, end];
    }

    if (this.geometry.pointsEqual(start, end)) {
      warn('arc starts and ends at the same point; no sweep to flatten');
      return [start, end];
    }

    let radius = segment.radius;
    if (radius < chord / 2) {
      warn(`arc radius ${radius} is smaller than half its chord; scaled to ${chord / 2}`);
      radius = chord / 2;
    }

    const ccw = segment.sweep === 'ccw';
    const large = segment.largeArc ?? false;
    const ux = (end.x - start.x) / chord;
    const uy = (end.y - start.y) / chord;
    const h = Math.sqrt(Math.max(0, radius * radius - (chord / 2) * (chord / 2)));
    // Center sits left of the chord for a short counter-clockwise arc
    const side = large === ccw ? -1 : 1;
    const center: Point = {
      x: (start.x + end.x) / 2 - side * h * uy,
      y: (start.y + end.y) / 2 + side * h * ux,
    };

    const startAngle = Math.atan2(start.y - center.y, start.x - center.x);
    const endAngle = Math.atan2(end.y - center.y, end.x - center.x);
    let sweepAngle = endAngle - startAngle;
    if (ccw && sweepAngle <= 0) sweepAngle += 2 * Math.PI;
    if (!ccw && sweepAngle >= 0) sweepAngle -= 2 * Math.PI;

    const maxStep = 2 * Math.acos(Math.max(-1, 1 - tolerance / radius));
    let steps = Math.max(1, Math.ceil(Math.abs(sweepAngle) / maxStep));
    if (steps > CurveFlattenerService.MAX_ARC_STEPS) {
      warn(
        `arc needs ${steps} steps for tolerance ${tolerance}; ` +
        `capped at ${CurveFlattenerService.MAX_ARC_STEPS}`
      );
      steps = CurveFlattenerService.MAX_ARC_STEPS;
    }

    const points: Point[] = [start];
    for (let i = 1; i < steps; i++) {
      const angle = startAngle + (sweepAngle * i) / steps;
      points.push({
        x: center.x + radius * Math.cos(angle),
        y: center.y + radius * Math.sin(angle),
      });
    }
    points.push(end);
    return points;
  }
}

function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}
