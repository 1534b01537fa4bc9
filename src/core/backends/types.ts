import type { Complex, Implementation, Mat3, Vec3 } from "../types.js";

/**
 * Call contract of the special-function subsystem. Both implementations
 * accept the same domain and throw the same DomainError outside it.
 */
export interface SpecialFunctionBackend {
  readonly implementation: Implementation;
  factorial(n: number): number;
  doubleFactorial(n: number): number;
  binomial(n: number, k: number): number;
  gammaHalfInteger(n: number): number;
  generalizedLaguerre(n: number, alpha: number, x: number): number;
  associatedLegendre(m: number, l: number, x: number): number;
  sphericalHarmonicComplex(l: number, m: number, theta: number, phi: number): Complex;
  sphericalHarmonicReal(l: number, m: number, theta: number, phi: number): number;
}

/**
 * Call contract of the vector/rotation subsystem.
 */
export interface VectorBackend {
  readonly implementation: Implementation;
  add(a: Vec3, b: Vec3): Vec3;
  subtract(a: Vec3, b: Vec3): Vec3;
  scale(v: Vec3, s: number): Vec3;
  dot(a: Vec3, b: Vec3): number;
  cross(a: Vec3, b: Vec3): Vec3;
  length(v: Vec3): number;
  normalize(v: Vec3): Vec3;
  /** Physics convention: theta is the polar angle from +z, phi the azimuth from +x. */
  fromSpherical(r: number, theta: number, phi: number): Vec3;
  rotationX(angle: number): Mat3;
  rotationY(angle: number): Mat3;
  rotationZ(angle: number): Mat3;
  rotationAxisAngle(axis: Vec3, angle: number): Mat3;
  /** Rz(yaw) · Ry(pitch) · Rx(roll). */
  rotationEuler(roll: number, pitch: number, yaw: number): Mat3;
  multiplyMatrices(a: Mat3, b: Mat3): Mat3;
  applyMatrix(m: Mat3, v: Vec3): Vec3;
}

export const SPECIAL_FUNCTION_NAMES = [
  "factorial",
  "doubleFactorial",
  "binomial",
  "gammaHalfInteger",
  "generalizedLaguerre",
  "associatedLegendre",
  "sphericalHarmonicComplex",
  "sphericalHarmonicReal"
] as const;

export const VECTOR_FUNCTION_NAMES = [
  "add",
  "subtract",
  "scale",
  "dot",
  "cross",
  "length",
  "normalize",
  "fromSpherical",
  "rotationX",
  "rotationY",
  "rotationZ",
  "rotationAxisAngle",
  "rotationEuler",
  "multiplyMatrices",
  "applyMatrix"
] as const;

export type SpecialFunctionName = (typeof SPECIAL_FUNCTION_NAMES)[number];
export type VectorFunctionName = (typeof VECTOR_FUNCTION_NAMES)[number];
