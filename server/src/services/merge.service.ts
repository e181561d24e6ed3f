/**
 * Merge Service
 * Joins the results of several compiler runs (e.g. engrave, then cut) into one job
 */
import { GcodeEmitterService } from './gcode-emitter.service';
import { GeometryService } from './geometry.service';
import { MergeError } from '../errors/toolpath.errors';
import { CompileResult, MotionInstruction, OperationProfile } from '../types/toolpath.types';

export interface MergeOptions {
  separators?: boolean;
}

const SEPARATOR = '==========================================';

export class MergeService {
  private readonly emitter = new GcodeEmitterService();
  private readonly geometry = new GeometryService();

  /**
   * Concatenate results in the given order. Only the first prologue and the last
   * epilogue survive; a single tool-off is inserted between runs unless the
   * stream already ends with one.
   */
  merge(results: readonly CompileResult[], options: MergeOptions = {}): CompileResult {
    const first = results[0];
    const last = results[results.length - 1];
    if (!first || !last) {
      throw new MergeError('At least one compile result is required');
    }

    for (const result of results) {
      if (result.unit !== first.unit) {
        throw new MergeError(`Cannot merge results in ${first.unit} and ${result.unit}`, 'unit');
      }
      if (result.precision !== first.precision) {
        throw new MergeError(
          `Cannot merge results with precision ${first.precision} and ${result.precision}`,
          'precision'
        );
      }
    }

    const separators = options.separators ?? true;
    const lineConfig = { precision: first.precision, depthAxis: false, zAxisStart: null };
    const instructions: MotionInstruction[] = [];
    const body: string[] = [];
    let lastProfile: OperationProfile = first.profile;

    const append = (instruction: MotionInstruction, profile: OperationProfile) => {
      instructions.push(instruction);
      body.push(this.emitter.emitInstruction(instruction, profile, lineConfig));
    };

    results.forEach((result, index) => {
      if (index > 0) {
        const tail = instructions[instructions.length - 1];
        if (tail && tail.type !== 'tool-off') {
          append({ type: 'tool-off' }, lastProfile);
        }

        if (separators) {
          const from = this.describeLayers(results[index - 1]);
          const to = this.describeLayers(result);
          append({ type: 'comment', text: SEPARATOR }, result.profile);
          append({ type: 'comment', text: `Layer transition: ${from} -> ${to}` }, result.profile);
          append({ type: 'comment', text: SEPARATOR }, result.profile);
        }
      }

      instructions.push(...result.instructions);
      body.push(...result.program.body);
      if (result.instructions.length > 0) {
        lastProfile = result.profile;
      }
    });

    return {
      instructions,
      program: {
        prologue: first.program.prologue,
        body,
        epilogue: last.program.epilogue,
      },
      boundingBox: this.geometry.unionBoundingBoxes(results.map(result => result.boundingBox)),
      estimatedDuration: results.reduce((sum, result) => sum + result.estimatedDuration, 0),
      warnings: results.flatMap(result => result.warnings),
      unit: first.unit,
      precision: first.precision,
      profile: last.profile,
      layers: results.flatMap(result => result.layers),
    };
  }

  private describeLayers(result: CompileResult): string {
    return result.layers.length > 0 ? result.layers.join(', ') : '(none)';
  }
}
