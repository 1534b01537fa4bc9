export type Vec3 = [number, number, number];

/** Row-major 3x3 matrix: `m[row][col]`. */
export type Mat3 = [Vec3, Vec3, Vec3];

export interface Complex {
  re: number;
  im: number;
}

export type Subsystem = "math" | "vector";
export type Implementation = "library" | "self-contained";

export type PositionModel = "uniform" | "shell";

export type PositionSet = Vec3[];

export interface Nucleon {
  position: Vec3;
  isProton: boolean;
}

export interface CloudPoint {
  position: Vec3;
  density: number;
}

export interface QuantumNumbers {
  n: number;
  l: number;
  m: number;
}

export interface OrbitalDescriptor extends QuantumNumbers {
  name: string;
}

export interface FunctionValidation {
  subsystem: Subsystem;
  passed: boolean;
  /** Largest per-sample error (relative above the absolute floor, absolute below it). */
  maxError: number;
  maxAbsoluteError: number;
  testsRun: number;
}

export type ValidationReport = Record<string, FunctionValidation>;
