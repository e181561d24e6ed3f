/**
 * Drawing Service
 * Checks JSON geometry received over the API and turns it into typed layers.
 * This is structural validation only; SVG/document parsing happens upstream.
 */
import { InvalidDrawingError } from '../errors/toolpath.errors';
import {
  Drawing,
  DrawingUnit,
  Layer,
  Path,
  PathSegment,
  Point,
  SweepDirection,
} from '../types/toolpath.types';

const DRAWING_UNITS: readonly DrawingUnit[] = ['mm', 'in', 'px', 'pt'];
const SWEEPS: readonly SweepDirection[] = ['cw', 'ccw'];

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class DrawingService {
  readDrawing(value: unknown): Drawing {
    const fields = this.object(value, 'drawing');
    const layers = this.array(fields.layers, 'drawing.layers').map((layer, i) =>
      this.readLayer(layer, `drawing.layers[${i}]`)
    );

    return {
      layers,
      unit: this.optionalUnit(fields.unit, 'drawing.unit'),
      width: this.optionalNumber(fields.width, 'drawing.width'),
      height: this.optionalNumber(fields.height, 'drawing.height'),
    };
  }

  private readLayer(value: unknown, at: string): Layer {
    const fields = this.object(value, at);
    const name = fields.name;
    if (name !== undefined && typeof name !== 'string') {
      throw new InvalidDrawingError(`${at}.name`, 'must be a string');
    }

    return {
      name,
      paths: this.array(fields.paths, `${at}.paths`).map((path, i) => this.readPath(path, `${at}.paths[${i}]`)),
    };
  }

  private readPath(value: unknown, at: string): Path {
    const fields = this.object(value, at);
    const segments = this.array(fields.segments, `${at}.segments`);
    if (segments.length === 0) {
      throw new InvalidDrawingError(`${at}.segments`, 'a path needs at least one segment');
    }

    return { segments: segments.map((segment, i) => this.readSegment(segment, `${at}.segments[${i}]`)) };
  }

  private readSegment(value: unknown, at: string): PathSegment {
    const fields = this.object(value, at);
    const start = this.point(fields.start, `${at}.start`);
    const end = this.point(fields.end, `${at}.end`);

    switch (fields.type) {
      case 'line':
        return { type: 'line', start, end };
      case 'cubic':
        return {
          type: 'cubic',
          start,
          control1: this.point(fields.control1, `${at}.control1`),
          control2: this.point(fields.control2, `${at}.control2`),
          end,
        };
      case 'arc': {
        const sweep = SWEEPS.find(candidate => candidate === fields.sweep);
        if (sweep === undefined) {
          throw new InvalidDrawingError(`${at}.sweep`, `must be one of ${SWEEPS.join(', ')}`);
        }
        const largeArc = fields.largeArc;
        if (largeArc !== undefined && typeof largeArc !== 'boolean') {
          throw new InvalidDrawingError(`${at}.largeArc`, 'must be true or false');
        }
        return {
          type: 'arc',
          start,
          end,
          radius: this.number(fields.radius, `${at}.radius`),
          sweep,
          largeArc,
        };
      }
      default:
        throw new InvalidDrawingError(`${at}.type`, `unknown segment type ${JSON.stringify(fields.type)}`);
    }
  }

  private point(value: unknown, at: string): Point {
    const fields = this.object(value, at);
    return { x: this.number(fields.x, `${at}.x`), y: this.number(fields.y, `${at}.y`) };
  }

  private object(value: unknown, at: string): Fields {
    if (!isFields(value)) throw new InvalidDrawingError(at, 'must be an object');
    return value;
  }

  private array(value: unknown, at: string): unknown[] {
    if (!Array.isArray(value)) throw new InvalidDrawingError(at, 'must be an array');
    return value;
  }

  private number(value: unknown, at: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidDrawingError(at, 'must be a finite number');
    }
    return value;
  }

  private optionalNumber(value: unknown, at: string): number | undefined {
    return value === undefined ? undefined : this.number(value, at);
  }

  private optionalUnit(value: unknown, at: string): DrawingUnit | undefined {
    if (value === undefined) return undefined;
    const unit = DRAWING_UNITS.find(candidate => candidate === value);
    if (unit === undefined) {
      throw new InvalidDrawingError(at, `must be one of ${DRAWING_UNITS.join(', ')}`);
    }
    return unit;
  }
}
