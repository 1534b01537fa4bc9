import type { VectorBackend } from "../backends/types.js";
import { add, cross, dot, fromSpherical, length, normalize, scale, subtract } from "./vec.js";
import {
  applyMatrix,
  multiplyMatrices,
  rotationAxisAngle,
  rotationEuler,
  rotationX,
  rotationY,
  rotationZ
} from "./rotation.js";

export * from "./vec.js";
export * from "./rotation.js";

/**
 * Dependency-free vector/rotation backend. Stateless, so one shared instance suffices.
 */
export const selfContainedVectors: VectorBackend = {
  implementation: "self-contained",
  add,
  subtract,
  scale,
  dot,
  cross,
  length,
  normalize,
  fromSpherical,
  rotationX,
  rotationY,
  rotationZ,
  rotationAxisAngle,
  rotationEuler,
  multiplyMatrices,
  applyMatrix
};
