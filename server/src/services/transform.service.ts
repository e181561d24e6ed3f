/**
 * Transform Service - drawing space to machine space
 *
 * Applied in order:
 * 1. unit normalisation (drawing unit -> machine unit)
 * 2. scale (scaleX, scaleY)
 * 3. optional Y inversion inside the bed (y -> bedHeight - y)
 * 4. origin placement (bottom-left: identity, center: minus half bed, top-left: y -> bedHeight - y)
 * 5. offset (offsetX, offsetY)
 */
import { DrawingUnit, Point, TransformConfig } from '../types/toolpath.types';

export interface TransformFrame {
  readonly transform: TransformConfig;  // bed size already resolved
  readonly sourceUnit: DrawingUnit;
}

export interface DocumentSize {
  readonly width: number;
  readonly height: number;
}

export class TransformService {
  private static readonly MM_PER_UNIT: Record<DrawingUnit, number> = {
    mm: 1,
    in: 25.4,
    px: 25.4 / 96,
    pt: 25.4 / 72,
  };

  convertLength(value: number, from: DrawingUnit, to: DrawingUnit): number {
    if (from === to) return value;
    return (value * TransformService.MM_PER_UNIT[from]) / TransformService.MM_PER_UNIT[to];
  }

  /**
   * Fix the bed size for a run. With useDocumentSize the bed is the document
   * size carried through unit normalisation and scale.
   */
  resolveFrame(config: TransformConfig, sourceUnit: DrawingUnit, documentSize: DocumentSize): TransformFrame {
    if (!config.useDocumentSize) {
      return { transform: config, sourceUnit };
    }

    return {
      transform: {
        ...config,
        bedWidth: Math.abs(this.convertLength(documentSize.width, sourceUnit, config.unit) * config.scaleX),
        bedHeight: Math.abs(this.convertLength(documentSize.height, sourceUnit, config.unit) * config.scaleY),
      },
      sourceUnit,
    };
  }

  toMachine(point: Point, frame: TransformFrame): Point {
    const t = frame.transform;
    let x = this.convertLength(point.x, frame.sourceUnit, t.unit) * t.scaleX;
    let y = this.convertLength(point.y, frame.sourceUnit, t.unit) * t.scaleY;

    if (t.invertY) {
      y = t.bedHeight - y;
    }

    switch (t.origin) {
      case 'center':
        x -= t.bedWidth / 2;
        y -= t.bedHeight / 2;
        break;
      case 'top-left':
        y = t.bedHeight - y;
        break;
      case 'bottom-left':
        break;
    }

    return { x: x + t.offsetX, y: y + t.offsetY };
  }

  /**
   * Exact inverse of toMachine for the same frame
   */
  toDrawing(point: Point, frame: TransformFrame): Point {
    const t = frame.transform;
    let x = point.x - t.offsetX;
    let y = point.y - t.offsetY;

    switch (t.origin) {
      case 'center':
        x += t.bedWidth / 2;
        y += t.bedHeight / 2;
        break;
      case 'top-left':
        y = t.bedHeight - y;
        break;
      case 'bottom-left':
        break;
    }

    if (t.invertY) {
      y = t.bedHeight - y;
    }

    return {
      x: this.convertLength(x / t.scaleX, t.unit, frame.sourceUnit),
      y: this.convertLength(y / t.scaleY, t.unit, frame.sourceUnit),
    };
  }
}
