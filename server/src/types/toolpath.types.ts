/**
 * Shared toolpath model
 * Geometry in, machine instructions out
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

export type LengthUnit = 'mm' | 'in';
export type DrawingUnit = LengthUnit | 'px' | 'pt';
export type MachineOrigin = 'bottom-left' | 'center' | 'top-left';
export type SweepDirection = 'cw' | 'ccw';

export interface LineSegment {
  readonly type: 'line';
  readonly start: Point;
  readonly end: Point;
}

export interface CubicSegment {
  readonly type: 'cubic';
  readonly start: Point;
  readonly control1: Point;
  readonly control2: Point;
  readonly end: Point;
}

export interface ArcSegment {
  readonly type: 'arc';
  readonly start: Point;
  readonly end: Point;
  readonly radius: number;
  readonly sweep: SweepDirection;
  readonly largeArc?: boolean;
}

export type PathSegment = LineSegment | CubicSegment | ArcSegment;

export interface Path {
  readonly segments: readonly PathSegment[];
}

export interface Layer {
  readonly name?: string;
  readonly paths: readonly Path[];
}

export interface Drawing {
  readonly layers: readonly Layer[];
  readonly unit?: DrawingUnit;
  readonly width?: number;  // Declared document size, drawing units
  readonly height?: number;
}

export interface Polyline {
  readonly points: readonly Point[];
  readonly closed: boolean;
}

export interface BoundingBox {
  readonly min: Point;
  readonly max: Point;
}

export interface OperationProfile {
  readonly travelSpeed: number;   // unit/min
  readonly cuttingSpeed: number;  // unit/min
  readonly toolPowerCommand: string;
  readonly toolOffCommand: string;
  readonly passes: number;
  readonly passDepth: number;
  readonly dwellTime: number;     // ms
  readonly retriggerPerPass: boolean;
}

export interface TransformConfig {
  readonly unit: LengthUnit;
  readonly scaleX: number;
  readonly scaleY: number;
  readonly offsetX: number;
  readonly offsetY: number;
  readonly invertY: boolean;
  readonly origin: MachineOrigin;
  readonly bedWidth: number;
  readonly bedHeight: number;
  readonly useDocumentSize: boolean;
}

export interface EmitterConfig {
  readonly header: readonly string[];
  readonly footer: readonly string[];
  readonly zeroMachine: boolean;
  readonly precision: number;
  readonly laserOffAtStart: boolean;
  readonly laserOffAtEnd: boolean;
  readonly moveToOriginAtEnd: boolean;
  readonly zAxisStart: number | null;
  readonly depthAxis: boolean;
}

export interface CompilerConfig {
  readonly transform: TransformConfig;
  readonly profile: OperationProfile;
  readonly emitter: EmitterConfig;
  readonly tolerance: number;
  readonly layers: readonly string[];
}

export type MotionInstruction =
  | { readonly type: 'travel'; readonly to: Point }
  | { readonly type: 'cut'; readonly to: Point; readonly depth: number }
  | { readonly type: 'tool-on' }
  | { readonly type: 'tool-off' }
  | { readonly type: 'dwell'; readonly ms: number }
  | { readonly type: 'zero-axes' }
  | { readonly type: 'comment'; readonly text: string };

export interface GcodeProgram {
  readonly prologue: readonly string[];
  readonly body: readonly string[];
  readonly epilogue: readonly string[];
}

export type CompileWarningKind = 'geometry' | 'selection';

export interface CompileWarning {
  readonly kind: CompileWarningKind;
  readonly message: string;
  readonly layer?: string;
}

export interface CompileResult {
  readonly instructions: readonly MotionInstruction[];
  readonly program: GcodeProgram;
  readonly boundingBox: BoundingBox | null;
  readonly estimatedDuration: number; // seconds
  readonly warnings: readonly CompileWarning[];
  readonly unit: LengthUnit;
  readonly precision: number;
  readonly profile: OperationProfile;
  readonly layers: readonly string[];  // Names of the layers that were compiled
}
