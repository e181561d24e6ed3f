/**
 * Combine Job Service
 * Compiles the engrave layer (optional) and the cut layer (required) with their own
 * speed and power, then merges them engrave-first into a single job.
 */
import { ConfigService, ConversionOptions, OptionSource } from './config.service';
import { ToolpathCompilerService } from './compiler.service';
import { GcodeEmitterService } from './gcode-emitter.service';
import { MergeService } from './merge.service';
import { OperationPresetService } from './operation-preset.service';
import { CombineJobError } from '../errors/toolpath.errors';
import { CompileResult, CompilerConfig, Drawing } from '../types/toolpath.types';

export type CombineJobOptions = Omit<ConversionOptions, 'cuttingSpeed' | 'toolPowerCommand' | 'layers'> & {
  engraveCuttingSpeed?: number;
  engravePower?: number;
  cutCuttingSpeed?: number;
  cutPower?: number;
  engraveLayer?: string;
  cutLayer?: string;
};

const JOB_KEYS = ['engraveCuttingSpeed', 'engravePower', 'cutCuttingSpeed', 'cutPower', 'engraveLayer', 'cutLayer'];

export interface CombineLayerSummary {
  layer: string;
  instructions: number;
  lines: number;
  cuttingSpeed: number;
  power: number;
  powerPercent: number;
}

export interface CombineSummary {
  engrave: CombineLayerSummary | null;
  cut: CombineLayerSummary;
  totalLines: number;
}

export interface CombineJobResult {
  result: CompileResult;
  gcode: string;
  summary: CombineSummary;
}

interface PlannedRun {
  layer: string;
  cuttingSpeed: number;
  power: number;
  config: CompilerConfig;
}

export class CombineJobService {
  private readonly configService = new ConfigService();
  private readonly compiler = new ToolpathCompilerService();
  private readonly merger = new MergeService();
  private readonly emitter = new GcodeEmitterService();

  combine(drawing: Drawing, options: CombineJobOptions | OptionSource = {}, verbose: boolean = true): CombineJobResult {
    const log = (message: string) => {
      if (verbose) console.log(`[Combine] ${message}`);
    };

    // Both configurations are validated before anything is compiled
    const engraveRun = this.planRun(options, 'engrave');
    const cutRun = this.planRun(options, 'cut');
    const unit = engraveRun.config.transform.unit;
    const travelSpeed = engraveRun.config.profile.travelSpeed;

    log(`[1/3] Generating engrave layer G-code ("${engraveRun.layer}")...`);
    log(this.describeSettings(engraveRun, travelSpeed, unit));
    let engrave: CompileResult | null = this.compiler.compile(drawing, engraveRun.config);
    if (!this.hasCutting(engrave)) {
      const reason = engrave.warnings.some(warning => warning.kind === 'selection')
        ? 'not found'
        : 'found but contains no paths to process';
      console.warn(`[Combine] Engrave layer ${reason}; continuing with cut only`);
      engrave = null;
    }

    log(`[2/3] Generating cut layer G-code ("${cutRun.layer}")...`);
    log(this.describeSettings(cutRun, travelSpeed, unit));
    const cut = this.compiler.compile(drawing, cutRun.config);
    if (!this.hasCutting(cut)) {
      if (cut.warnings.some(warning => warning.kind === 'selection')) {
        throw new CombineJobError(cutRun.layer, `Cut layer "${cutRun.layer}" is required but not found in the drawing`);
      }
      throw new CombineJobError(
        cutRun.layer,
        `Cut layer "${cutRun.layer}" found but contains no paths to process ` +
        '(layer names are case-sensitive; shapes must be converted to paths)'
      );
    }

    log('[3/3] Combining G-code: engrave first, then cut');
    const result = this.merger.merge(engrave ? [engrave, cut] : [cut]);
    const gcode = this.emitter.render(result.program);

    const summary: CombineSummary = {
      engrave: engrave ? this.summarise(engraveRun, engrave) : null,
      cut: this.summarise(cutRun, cut),
      totalLines: this.countLines(result),
    };

    if (summary.engrave) {
      log(
        `Engrave layer: ${summary.engrave.lines} lines ` +
        `(speed: ${summary.engrave.cuttingSpeed} ${unit}/min, power: S${summary.engrave.power})`
      );
    }
    log(`Cut layer:    ${summary.cut.lines} lines (speed: ${summary.cut.cuttingSpeed} ${unit}/min, power: S${summary.cut.power})`);
    log(`Total:        ${summary.totalLines} lines`);

    return { result, gcode, summary };
  }

  private planRun(options: OptionSource, kind: 'engrave' | 'cut'): PlannedRun {
    const preset = OperationPresetService.getPreset(kind);
    const shared = Object.fromEntries(Object.entries(options).filter(([key]) => !JOB_KEYS.includes(key)));

    const layer = this.configService.string(options, `${kind}Layer`, preset.layer);
    const cuttingSpeed = this.configService.number(options, `${kind}CuttingSpeed`, preset.cuttingSpeed);
    const power = this.configService.number(options, `${kind}Power`, preset.power);

    const config = this.configService.buildCompilerConfig({
      ...shared,
      cuttingSpeed,
      toolPowerCommand: OperationPresetService.powerCommand(power, `${kind}Power`),
      layers: [layer],
    });

    return { layer, cuttingSpeed, power, config };
  }

  private describeSettings(run: PlannedRun, travelSpeed: number, unit: string): string {
    return (
      `  Settings: Travel speed=${travelSpeed} ${unit}/min, ` +
      `Cutting speed=${run.cuttingSpeed} ${unit}/min, ` +
      `Power=S${run.power} (${OperationPresetService.powerPercent(run.power)}%)`
    );
  }

  private hasCutting(result: CompileResult): boolean {
    return result.instructions.some(instruction => instruction.type === 'cut');
  }

  private countLines(result: CompileResult): number {
    return result.program.prologue.length + result.program.body.length + result.program.epilogue.length;
  }

  private summarise(run: PlannedRun, result: CompileResult): CombineLayerSummary {
    return {
      layer: run.layer,
      instructions: result.instructions.length,
      lines: this.countLines(result),
      cuttingSpeed: run.cuttingSpeed,
      power: run.power,
      powerPercent: OperationPresetService.powerPercent(run.power),
    };
  }
}
