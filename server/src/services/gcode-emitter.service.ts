/**
 * G-code Emitter Service
 * Serialises motion instructions into G-code lines with a fixed decimal precision
 */
import {
  EmitterConfig,
  GcodeProgram,
  LengthUnit,
  MotionInstruction,
  OperationProfile,
} from '../types/toolpath.types';

export const ZERO_AXES_COMMAND = 'G92 X0 Y0 Z0;';
export const ABSOLUTE_MODE_COMMAND = 'G90;';
export const RETURN_TO_ORIGIN_COMMAND = 'G0 X0 Y0;';

// Feeds and dwell keep at least this many decimals whatever the coordinate precision
const MIN_RATE_DECIMALS = 3;

const UNIT_COMMANDS: Record<LengthUnit, string> = {
  mm: 'G21;',
  in: 'G20;',
};

export class GcodeEmitterService {
  emit(
    instructions: readonly MotionInstruction[],
    profile: OperationProfile,
    unit: LengthUnit,
    config: EmitterConfig
  ): GcodeProgram {
    return {
      prologue: this.prologue(profile, unit, config),
      body: instructions.map(instruction => this.emitInstruction(instruction, profile, config)),
      epilogue: this.epilogue(profile, config),
    };
  }

  emitInstruction(
    instruction: MotionInstruction,
    profile: OperationProfile,
    config: Pick<EmitterConfig, 'precision' | 'depthAxis' | 'zAxisStart'>
  ): string {
    const fmt = (value: number) => this.formatNumber(value, config.precision);
    const rate = (value: number) => this.formatRate(value, config.precision);

    switch (instruction.type) {
      case 'travel':
        return `G0 X${fmt(instruction.to.x)} Y${fmt(instruction.to.y)} F${rate(profile.travelSpeed)};`;
      case 'cut': {
        const z = config.depthAxis ? ` Z${fmt((config.zAxisStart ?? 0) - instruction.depth)}` : '';
        return `G1 X${fmt(instruction.to.x)} Y${fmt(instruction.to.y)}${z} F${rate(profile.cuttingSpeed)};`;
      }
      case 'tool-on':
        return profile.toolPowerCommand;
      case 'tool-off':
        return profile.toolOffCommand;
      case 'dwell':
        return `G4 P${rate(instruction.ms / 1000)};`;
      case 'zero-axes':
        return ZERO_AXES_COMMAND;
      case 'comment':
        return `; ${this.commentText(instruction.text)}`;
    }
  }

  /**
   * toFixed, with negative zero printed as zero
   */
  formatNumber(value: number, precision: number): string {
    const text = value.toFixed(precision);
    return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
  }

  /**
   * Feeds and dwell times drop trailing zeros: 3000 -> "3000", 12.5 -> "12.5"
   */
  formatRate(value: number, precision: number): string {
    return String(Number(value.toFixed(Math.max(precision, MIN_RATE_DECIMALS))));
  }

  /**
   * A comment must stay on its own line: line breaks become spaces
   */
  commentText(text: string): string {
    return text.replace(/[\r\n]+/g, ' ');
  }

  render(program: GcodeProgram): string {
    return [...program.prologue, ...program.body, ...program.epilogue].join('\n') + '\n';
  }

  private prologue(profile: OperationProfile, unit: LengthUnit, config: EmitterConfig): string[] {
    const lines = [...config.header];

    if (config.zeroMachine) {
      lines.push(this.emitInstruction({ type: 'zero-axes' }, profile, config));
    }

    lines.push(UNIT_COMMANDS[unit], ABSOLUTE_MODE_COMMAND);

    if (config.laserOffAtStart) {
      lines.push(profile.toolOffCommand);
    }

    if (config.zAxisStart !== null) {
      lines.push(`G0 Z${this.formatNumber(config.zAxisStart, config.precision)};`);
    }

    return lines;
  }

  private epilogue(profile: OperationProfile, config: EmitterConfig): string[] {
    const lines: string[] = [];

    if (config.laserOffAtEnd) {
      lines.push(profile.toolOffCommand);
    }

    if (config.moveToOriginAtEnd) {
      lines.push(RETURN_TO_ORIGIN_COMMAND);
    }

    lines.push(...config.footer);
    return lines;
  }
}
