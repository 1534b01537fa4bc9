/**
 * Fixed input battery used by `BackendRegistry.validate`.
 *
 * Every sampler evaluates one function over its inputs and returns one row of
 * numbers per sample (complex results as [re, im], vectors and matrices
 * flattened), so the comparison is the same for every function. Inputs stay
 * clear of polynomial roots where relative error is meaningless.
 */

import type { FunctionValidation, Mat3, Subsystem, Vec3 } from "../types.js";
import type {
  SpecialFunctionBackend,
  SpecialFunctionName,
  VectorBackend,
  VectorFunctionName
} from "./types.js";
import { VALIDATION_ABS_FLOOR } from "../constants.js";

export type Sampler<B> = (backend: B) => number[][];

const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

const flatMat = (m: Mat3): number[] => [...m[0], ...m[1], ...m[2]];

const LAGUERRE_ALPHAS = [0, 0.5, 1, 2, 3.5];
const LAGUERRE_XS = [0, 0.5, 1, 2, 5];
const LEGENDRE_XS = [-1, -0.7, -0.25, 0, 0.4, 0.85, 1];
const HARMONIC_THETAS = [0, Math.PI / 4, Math.PI / 2, Math.PI];
const HARMONIC_PHIS = [0, Math.PI / 2, Math.PI];

function degreeOrders(maxL: number): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  for (let l = 0; l <= maxL; l++) {
    for (let m = -l; m <= l; m++) pairs.push([l, m]);
  }
  return pairs;
}

function harmonicSamples<T>(
  backend: SpecialFunctionBackend,
  evaluate: (b: SpecialFunctionBackend, l: number, m: number, theta: number, phi: number) => T,
  toRow: (value: T) => number[]
): number[][] {
  const rows: number[][] = [];
  for (const [l, m] of degreeOrders(4)) {
    for (const theta of HARMONIC_THETAS) {
      for (const phi of HARMONIC_PHIS) {
        rows.push(toRow(evaluate(backend, l, m, theta, phi)));
      }
    }
  }
  return rows;
}

export const SPECIAL_FUNCTION_BATTERY: Record<SpecialFunctionName, Sampler<SpecialFunctionBackend>> = {
  factorial: (b) => range(0, 50).map((n) => [b.factorial(n)]),

  doubleFactorial: (b) => range(-1, 40).map((n) => [b.doubleFactorial(n)]),

  binomial: (b) => {
    const rows: number[][] = [];
    for (const n of [0, 1, 5, 10, 20, 30, 50]) {
      for (const k of new Set([0, 1, Math.floor(n / 3), Math.floor(n / 2), n])) {
        if (k <= n) rows.push([b.binomial(n, k)]);
      }
    }
    return rows;
  },

  gammaHalfInteger: (b) => range(1, 40).map((n) => [b.gammaHalfInteger(n)]),

  generalizedLaguerre: (b) => {
    const rows: number[][] = [];
    for (const n of range(0, 8)) {
      for (const alpha of LAGUERRE_ALPHAS) {
        for (const x of LAGUERRE_XS) rows.push([b.generalizedLaguerre(n, alpha, x)]);
      }
    }
    return rows;
  },

  associatedLegendre: (b) => {
    const rows: number[][] = [];
    for (const [l, m] of degreeOrders(6)) {
      for (const x of LEGENDRE_XS) rows.push([b.associatedLegendre(m, l, x)]);
    }
    return rows;
  },

  sphericalHarmonicComplex: (b) =>
    harmonicSamples(
      b,
      (backend, l, m, theta, phi) => backend.sphericalHarmonicComplex(l, m, theta, phi),
      (y) => [y.re, y.im]
    ),

  sphericalHarmonicReal: (b) =>
    harmonicSamples(
      b,
      (backend, l, m, theta, phi) => backend.sphericalHarmonicReal(l, m, theta, phi),
      (y) => [y]
    )
};

const VECTORS: Vec3[] = [
  [1, 2, 3],
  [-0.5, 4.25, 0.001],
  [0, 0, 1],
  [3, -7, 2.5],
  [1e-3, 2e-3, -5e-4]
];

const ANGLES = [0, 0.3, -1.2, Math.PI / 2, 2.5];

const AXES: Vec3[] = [
  [0, 0, 1],
  [1, 2, 2],
  [-3, 1, 0.5]
];

const EULER_TRIPLES: Array<[number, number, number]> = [
  [0, 0, 0],
  [0.1, 0.2, 0.3],
  [-1.1, 0.7, 2.9],
  [Math.PI / 2, 0.4, -0.8]
];

const GENERAL_MATRIX: Mat3 = [
  [2, -1, 0.5],
  [0.25, 3, -4],
  [1, 0, 1.5]
];

function pairs<T>(items: T[]): Array<[T, T]> {
  const out: Array<[T, T]> = [];
  for (let i = 0; i < items.length; i++) {
    for (let j = 0; j < items.length; j++) {
      if (i !== j) out.push([items[i], items[j]]);
    }
  }
  return out;
}

function sampleMatrices(b: VectorBackend): Mat3[] {
  return [
    GENERAL_MATRIX,
    b.rotationX(0.3),
    b.rotationEuler(0.1, 0.2, 0.3),
    b.rotationAxisAngle([1, 2, 2], -1.2)
  ];
}

export const VECTOR_BATTERY: Record<VectorFunctionName, Sampler<VectorBackend>> = {
  add: (b) => pairs(VECTORS).map(([u, v]) => b.add(u, v)),
  subtract: (b) => pairs(VECTORS).map(([u, v]) => b.subtract(u, v)),
  scale: (b) => VECTORS.flatMap((v) => [-2, 0.5, 3.75].map((s) => b.scale(v, s))),
  dot: (b) => pairs(VECTORS).map(([u, v]) => [b.dot(u, v)]),
  cross: (b) => pairs(VECTORS).map(([u, v]) => b.cross(u, v)),
  length: (b) => VECTORS.map((v) => [b.length(v)]),
  normalize: (b) => VECTORS.map((v) => b.normalize(v)),
  fromSpherical: (b) =>
    [0.5, 2].flatMap((r) =>
      HARMONIC_THETAS.flatMap((theta) => HARMONIC_PHIS.map((phi) => b.fromSpherical(r, theta, phi)))
    ),
  rotationX: (b) => ANGLES.map((a) => flatMat(b.rotationX(a))),
  rotationY: (b) => ANGLES.map((a) => flatMat(b.rotationY(a))),
  rotationZ: (b) => ANGLES.map((a) => flatMat(b.rotationZ(a))),
  rotationAxisAngle: (b) =>
    AXES.flatMap((axis) => ANGLES.map((a) => flatMat(b.rotationAxisAngle(axis, a)))),
  rotationEuler: (b) =>
    EULER_TRIPLES.map(([roll, pitch, yaw]) => flatMat(b.rotationEuler(roll, pitch, yaw))),
  multiplyMatrices: (b) => {
    const matrices = sampleMatrices(b);
    return pairs(matrices).map(([p, q]) => flatMat(b.multiplyMatrices(p, q)));
  },
  applyMatrix: (b) => sampleMatrices(b).flatMap((m) => VECTORS.map((v) => b.applyMatrix(m, v)))
};

/**
 * Error of one component: relative to the library value when it is larger
 * than VALIDATION_ABS_FLOOR, absolute otherwise.
 */
export function componentError(library: number, selfContained: number): number {
  const diff = Math.abs(library - selfContained);
  if (Number.isNaN(diff)) return Number.POSITIVE_INFINITY;
  const magnitude = Math.abs(library);
  return magnitude > VALIDATION_ABS_FLOOR ? diff / magnitude : diff;
}

/**
 * Compare the rows produced by both implementations of one function.
 */
export function compareSamples(
  subsystem: Subsystem,
  library: number[][],
  selfContained: number[][],
  tolerance: number
): FunctionValidation {
  let maxError = 0;
  let maxAbsoluteError = 0;
  const testsRun = Math.min(library.length, selfContained.length);

  for (let i = 0; i < testsRun; i++) {
    const a = library[i];
    const b = selfContained[i];
    if (a.length !== b.length) {
      maxError = Number.POSITIVE_INFINITY;
      maxAbsoluteError = Number.POSITIVE_INFINITY;
      continue;
    }
    for (let j = 0; j < a.length; j++) {
      maxError = Math.max(maxError, componentError(a[j], b[j]));
      const absolute = Math.abs(a[j] - b[j]);
      maxAbsoluteError = Math.max(maxAbsoluteError, Number.isNaN(absolute) ? Number.POSITIVE_INFINITY : absolute);
    }
  }

  const complete = library.length === selfContained.length;
  return {
    subsystem,
    passed: complete && maxError <= tolerance,
    maxError,
    maxAbsoluteError,
    testsRun
  };
}
