/**
 * Configuration Service
 * Builds the validated compiler configuration from loose options (request bodies, presets).
 * Every check happens here, once; the pipeline trusts what it receives.
 */
import { ConfigurationError } from '../errors/toolpath.errors';
import {
  CompilerConfig,
  EmitterConfig,
  LengthUnit,
  MachineOrigin,
  OperationProfile,
  TransformConfig,
} from '../types/toolpath.types';

export type ConversionOptions = {
  unit?: LengthUnit;
  travelSpeed?: number;
  cuttingSpeed?: number;
  toolPowerCommand?: string;
  toolOffCommand?: string;
  passes?: number;
  passDepth?: number;
  dwellTime?: number;
  retriggerPerPass?: boolean;
  approximationTolerance?: number;
  machineOrigin?: MachineOrigin;
  zeroMachine?: boolean;
  invertYAxis?: boolean;
  useDocumentSize?: boolean;
  bedWidth?: number;
  bedHeight?: number;
  horizontalOffset?: number;
  verticalOffset?: number;
  scalingFactor?: number;
  scaleX?: number;
  scaleY?: number;
  zAxisStart?: number;
  doZAxisStart?: boolean;
  depthAxis?: boolean;
  moveToOriginEnd?: boolean;
  doLaserOffStart?: boolean;
  doLaserOffEnd?: boolean;
  precision?: number;
  header?: string[];
  footer?: string[];
  layers?: string | string[];
};

// Untyped options straight from a request body
export type OptionSource = Readonly<Record<string, unknown>>;

export function isOptionSource(value: unknown): value is OptionSource {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const DEFAULT_OPTIONS = {
  unit: 'mm',
  travelSpeed: 3000,
  cuttingSpeed: 1000,
  toolPowerCommand: 'M3 S255;',
  toolOffCommand: 'M5;',
  passes: 1,
  passDepth: 1,
  dwellTime: 0,
  retriggerPerPass: false,
  approximationTolerance: 0.01,
  machineOrigin: 'bottom-left',
  zeroMachine: false,
  invertYAxis: false,
  useDocumentSize: true,
  bedWidth: 200,
  bedHeight: 200,
  horizontalOffset: 0,
  verticalOffset: 0,
  scalingFactor: 1,
  zAxisStart: 0,
  doZAxisStart: false,
  depthAxis: false,
  moveToOriginEnd: false,
  doLaserOffStart: true,
  doLaserOffEnd: true,
  precision: 3,
} as const;

const UNITS: readonly LengthUnit[] = ['mm', 'in'];
const ORIGINS: readonly MachineOrigin[] = ['bottom-left', 'center', 'top-left'];
const MAX_PRECISION = 8;

export class ConfigService {
  buildCompilerConfig(options: ConversionOptions | OptionSource = {}): CompilerConfig {
    const transform = this.buildTransformConfig(options);
    const profile = this.buildOperationProfile(options);
    const emitter = this.buildEmitterConfig(options);
    const tolerance = this.number(options, 'approximationTolerance', DEFAULT_OPTIONS.approximationTolerance);
    if (tolerance <= 0) {
      throw new ConfigurationError('approximationTolerance', `must be greater than 0, got ${tolerance}`);
    }

    return { transform, profile, emitter, tolerance, layers: this.layerFilter(options.layers) };
  }

  buildTransformConfig(options: OptionSource): TransformConfig {
    const scalingFactor = this.number(options, 'scalingFactor', DEFAULT_OPTIONS.scalingFactor);
    const scaleX = this.number(options, 'scaleX', scalingFactor);
    const scaleY = this.number(options, 'scaleY', scalingFactor);
    const useDocumentSize = this.boolean(options, 'useDocumentSize', DEFAULT_OPTIONS.useDocumentSize);
    const bedWidth = this.number(options, 'bedWidth', DEFAULT_OPTIONS.bedWidth);
    const bedHeight = this.number(options, 'bedHeight', DEFAULT_OPTIONS.bedHeight);

    for (const [name, value] of [['scaleX', scaleX], ['scaleY', scaleY]] as const) {
      if (value === 0) {
        throw new ConfigurationError(options[name] === undefined ? 'scalingFactor' : name, 'must not be zero');
      }
    }

    if (!useDocumentSize) {
      if (bedWidth <= 0) throw new ConfigurationError('bedWidth', `must be positive, got ${bedWidth}`);
      if (bedHeight <= 0) throw new ConfigurationError('bedHeight', `must be positive, got ${bedHeight}`);
    }

    return {
      unit: this.oneOf(options, 'unit', UNITS, DEFAULT_OPTIONS.unit),
      scaleX,
      scaleY,
      offsetX: this.number(options, 'horizontalOffset', DEFAULT_OPTIONS.horizontalOffset),
      offsetY: this.number(options, 'verticalOffset', DEFAULT_OPTIONS.verticalOffset),
      invertY: this.boolean(options, 'invertYAxis', DEFAULT_OPTIONS.invertYAxis),
      origin: this.oneOf(options, 'machineOrigin', ORIGINS, DEFAULT_OPTIONS.machineOrigin),
      bedWidth,
      bedHeight,
      useDocumentSize,
    };
  }

  buildOperationProfile(options: OptionSource): OperationProfile {
    const travelSpeed = this.number(options, 'travelSpeed', DEFAULT_OPTIONS.travelSpeed);
    const cuttingSpeed = this.number(options, 'cuttingSpeed', DEFAULT_OPTIONS.cuttingSpeed);
    const passes = this.number(options, 'passes', DEFAULT_OPTIONS.passes);
    const passDepth = this.number(options, 'passDepth', DEFAULT_OPTIONS.passDepth);
    const dwellTime = this.number(options, 'dwellTime', DEFAULT_OPTIONS.dwellTime);

    if (travelSpeed <= 0) throw new ConfigurationError('travelSpeed', `must be positive, got ${travelSpeed}`);
    if (cuttingSpeed <= 0) throw new ConfigurationError('cuttingSpeed', `must be positive, got ${cuttingSpeed}`);
    if (!Number.isInteger(passes) || passes < 1) {
      throw new ConfigurationError('passes', `must be an integer of at least 1, got ${passes}`);
    }
    if (passDepth < 0) throw new ConfigurationError('passDepth', `must not be negative, got ${passDepth}`);
    if (dwellTime < 0) throw new ConfigurationError('dwellTime', `must not be negative, got ${dwellTime}`);

    return {
      travelSpeed,
      cuttingSpeed,
      toolPowerCommand: this.string(options, 'toolPowerCommand', DEFAULT_OPTIONS.toolPowerCommand),
      toolOffCommand: this.string(options, 'toolOffCommand', DEFAULT_OPTIONS.toolOffCommand),
      passes,
      passDepth,
      dwellTime,
      retriggerPerPass: this.boolean(options, 'retriggerPerPass', DEFAULT_OPTIONS.retriggerPerPass),
    };
  }

  buildEmitterConfig(options: OptionSource): EmitterConfig {
    const precision = this.number(options, 'precision', DEFAULT_OPTIONS.precision);
    if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
      throw new ConfigurationError('precision', `must be an integer between 0 and ${MAX_PRECISION}, got ${precision}`);
    }

    const zAxisStart = this.number(options, 'zAxisStart', DEFAULT_OPTIONS.zAxisStart);

    return {
      header: this.lines(options, 'header'),
      footer: this.lines(options, 'footer'),
      zeroMachine: this.boolean(options, 'zeroMachine', DEFAULT_OPTIONS.zeroMachine),
      precision,
      laserOffAtStart: this.boolean(options, 'doLaserOffStart', DEFAULT_OPTIONS.doLaserOffStart),
      laserOffAtEnd: this.boolean(options, 'doLaserOffEnd', DEFAULT_OPTIONS.doLaserOffEnd),
      moveToOriginAtEnd: this.boolean(options, 'moveToOriginEnd', DEFAULT_OPTIONS.moveToOriginEnd),
      zAxisStart: this.boolean(options, 'doZAxisStart', DEFAULT_OPTIONS.doZAxisStart) ? zAxisStart : null,
      depthAxis: this.boolean(options, 'depthAxis', DEFAULT_OPTIONS.depthAxis),
    };
  }

  // Values may come straight from JSON, so types are checked at runtime as well

  number(options: OptionSource, key: string, fallback: number): number {
    const value: unknown = options[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigurationError(key, `must be a finite number, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  boolean(options: OptionSource, key: string, fallback: boolean): boolean {
    const value: unknown = options[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(key, `must be true or false, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  string(options: OptionSource, key: string, fallback: string): string {
    const value: unknown = options[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') {
      throw new ConfigurationError(key, `must be a string, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  private oneOf<T extends string>(
    options: OptionSource,
    key: string,
    allowed: readonly T[],
    fallback: T
  ): T {
    const value: unknown = options[key];
    if (value === undefined) return fallback;
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ConfigurationError(key, `must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`);
    }
    return match;
  }

  private lines(options: OptionSource, key: 'header' | 'footer'): string[] {
    const value: unknown = options[key];
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((line): line is string => typeof line === 'string')) {
      throw new ConfigurationError(key, 'must be a list of lines');
    }
    return [...value];
  }

  private layerFilter(value: unknown): string[] {
    if (value === undefined) return [];
    if (typeof value === 'string') return value === '' ? [] : [value];
    if (Array.isArray(value) && value.every((name): name is string => typeof name === 'string')) {
      return [...value];
    }
    throw new ConfigurationError('layers', 'must be a layer name or a list of layer names');
  }
}
