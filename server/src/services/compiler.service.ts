/**
 * Toolpath Compiler Service
 * One run: flatten -> transform -> select/bind -> plan -> emit, plus bounding box and time estimate
 */
import { CurveFlattenerService } from './flattener.service';
import { GcodeEmitterService } from './gcode-emitter.service';
import { GeometryService } from './geometry.service';
import { LayerSelectorService } from './layer-selector.service';
import { PlannedLayer, ToolpathPlannerService } from './toolpath-planner.service';
import { DocumentSize, TransformService } from './transform.service';
import { ConfigurationError } from '../errors/toolpath.errors';
import {
  CompileResult,
  CompileWarning,
  CompilerConfig,
  Drawing,
  Layer,
  MotionInstruction,
  OperationProfile,
  Point,
  Polyline,
} from '../types/toolpath.types';

interface FlattenedLayer extends Layer {
  polylines: Polyline[];
  warnings: CompileWarning[];
}

export class ToolpathCompilerService {
  private readonly flattener = new CurveFlattenerService();
  private readonly transform = new TransformService();
  private readonly selector = new LayerSelectorService();
  private readonly planner = new ToolpathPlannerService();
  private readonly emitter = new GcodeEmitterService();
  private readonly geometry = new GeometryService();

  compile(drawing: Drawing, config: CompilerConfig): CompileResult {
    if (!(config.tolerance > 0)) {
      throw new ConfigurationError('approximationTolerance', `must be greater than 0, got ${config.tolerance}`);
    }

    // Every layer is flattened: the document size covers the whole drawing, not just the selection
    const flattened = drawing.layers.map(layer => this.flattenLayer(layer, config.tolerance));
    const frame = this.transform.resolveFrame(
      config.transform,
      drawing.unit ?? 'mm',
      this.documentSize(drawing, flattened)
    );

    const selection = this.selector.select(flattened, config.layers);
    const planned: PlannedLayer[] = this.selector.bind(selection.layers, config.profile).map(bound => ({
      name: bound.name,
      profile: bound.profile,
      polylines: bound.layer.polylines.map(polyline => ({
        closed: polyline.closed,
        points: polyline.points.map(point => this.transform.toMachine(point, frame)),
      })),
    }));

    const instructions = this.planner.plan(planned);
    const program = this.emitter.emit(instructions, config.profile, config.transform.unit, config.emitter);
    const warnings = [...selection.warnings, ...selection.layers.flatMap(layer => layer.warnings)];
    const layerNames = planned.map(layer => layer.name);

    const result: CompileResult = {
      instructions,
      program,
      boundingBox: this.geometry.getBoundingBox(this.motionTargets(instructions)),
      estimatedDuration: this.estimateDuration(instructions, config.profile),
      warnings,
      unit: config.transform.unit,
      precision: config.emitter.precision,
      profile: config.profile,
      layers: layerNames,
    };

    console.log(
      `[Compiler] Layers [${layerNames.join(', ')}]: ${instructions.length} instructions, ` +
      `${program.body.length} body lines, ~${result.estimatedDuration.toFixed(1)}s`
    );
    warnings.forEach(warning => {
      console.warn(`[Compiler] ${warning.kind} warning${warning.layer ? ` (${warning.layer})` : ''}: ${warning.message}`);
    });

    return result;
  }

  /**
   * Seconds for all motion starting from machine zero, feeds in unit/min, plus dwell
   */
  estimateDuration(instructions: readonly MotionInstruction[], profile: OperationProfile): number {
    let position: Point = { x: 0, y: 0 };
    let seconds = 0;

    for (const instruction of instructions) {
      switch (instruction.type) {
        case 'travel':
          seconds += (this.geometry.distance(position, instruction.to) / profile.travelSpeed) * 60;
          position = instruction.to;
          break;
        case 'cut':
          seconds += (this.geometry.distance(position, instruction.to) / profile.cuttingSpeed) * 60;
          position = instruction.to;
          break;
        case 'dwell':
          seconds += instruction.ms / 1000;
          break;
        default:
          break;
      }
    }

    return seconds;
  }

  private flattenLayer(layer: Layer, tolerance: number): FlattenedLayer {
    const name = this.selector.layerName(layer);
    const warnings: CompileWarning[] = [];

    const polylines = layer.paths.flatMap((path, index) => {
      const found = this.flattener.flattenPath(path, tolerance, message => {
        warnings.push({ kind: 'geometry', message: `Path ${index}: ${message}`, layer: name });
      });
      if (found.length === 0) {
        warnings.push({ kind: 'geometry', message: `Path ${index}: no drawable segments, skipped`, layer: name });
      }
      return found;
    });

    return { ...layer, polylines, warnings };
  }

  private documentSize(drawing: Drawing, layers: readonly FlattenedLayer[]): DocumentSize {
    if (drawing.width !== undefined && drawing.height !== undefined) {
      return { width: drawing.width, height: drawing.height };
    }

    const bounds = this.geometry.getBoundingBox(
      layers.flatMap(layer => layer.polylines.flatMap(polyline => polyline.points))
    );
    return {
      width: Math.max(0, bounds?.max.x ?? 0),
      height: Math.max(0, bounds?.max.y ?? 0),
    };
  }

  private motionTargets(instructions: readonly MotionInstruction[]): Point[] {
    const targets: Point[] = [];
    for (const instruction of instructions) {
      if (instruction.type === 'travel' || instruction.type === 'cut') {
        targets.push(instruction.to);
      }
    }
    return targets;
  }
}
