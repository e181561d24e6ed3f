/**
 * Operation Preset Service
 * Speed/power presets for the two operations of a combined laser job
 */
import { ConfigurationError } from '../errors/toolpath.errors';

export type OperationKind = 'engrave' | 'cut';

export interface OperationPreset {
  name: string;
  layer: string;          // Layer label the preset applies to
  description: string;
  cuttingSpeed: number;   // unit/min
  power: number;          // Spindle/laser PWM value, 0-255
}

export class OperationPresetService {
  static readonly MAX_POWER = 255;

  /**
   * ENGRAVE: fast, low power surface marking
   */
  static readonly PRESET_ENGRAVE: OperationPreset = {
    name: 'Engrave',
    layer: 'engrave',
    description: 'Surface marking at 1000 unit/min and S75',
    cuttingSpeed: 1000,
    power: 75,
  };

  /**
   * CUT: slow, full power through-cut
   */
  static readonly PRESET_CUT: OperationPreset = {
    name: 'Cut',
    layer: 'cut',
    description: 'Through-cut at 250 unit/min and S255',
    cuttingSpeed: 250,
    power: 255,
  };

  static getPreset(kind: OperationKind): OperationPreset {
    switch (kind) {
      case 'engrave':
        return this.PRESET_ENGRAVE;
      case 'cut':
        return this.PRESET_CUT;
    }
  }

  static powerCommand(power: number, parameter: string = 'power'): string {
    if (!Number.isInteger(power) || power < 0 || power > this.MAX_POWER) {
      throw new ConfigurationError(parameter, `must be an integer between 0 and ${this.MAX_POWER}, got ${power}`);
    }
    return `M3 S${power};`;
  }

  static powerPercent(power: number): number {
    return Math.floor((power * 100) / this.MAX_POWER);
  }
}
