import type { Mat3, Vec3 } from "../types.js";
import { EPS_ORTHOGONAL } from "../constants.js";
import { requireFinite } from "../validate.js";
import { normalize } from "./vec.js";

export function identityMatrix(): Mat3 {
  return [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1]
  ];
}

export function transpose(m: Mat3): Mat3 {
  return [
    [m[0][0], m[1][0], m[2][0]],
    [m[0][1], m[1][1], m[2][1]],
    [m[0][2], m[1][2], m[2][2]]
  ];
}

export function multiplyMatrices(a: Mat3, b: Mat3): Mat3 {
  const out = identityMatrix();
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      out[row][col] = a[row][0]*b[0][col] + a[row][1]*b[1][col] + a[row][2]*b[2][col];
    }
  }
  return out;
}

export function applyMatrix(m: Mat3, v: Vec3): Vec3 {
  return [
    m[0][0]*v[0] + m[0][1]*v[1] + m[0][2]*v[2],
    m[1][0]*v[0] + m[1][1]*v[1] + m[1][2]*v[2],
    m[2][0]*v[0] + m[2][1]*v[1] + m[2][2]*v[2]
  ];
}

export function rotationX(angle: number): Mat3 {
  requireFinite("rotationX", { angle });
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [
    [1, 0, 0],
    [0, c, -s],
    [0, s, c]
  ];
}

export function rotationY(angle: number): Mat3 {
  requireFinite("rotationY", { angle });
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [
    [c, 0, s],
    [0, 1, 0],
    [-s, 0, c]
  ];
}

export function rotationZ(angle: number): Mat3 {
  requireFinite("rotationZ", { angle });
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [
    [c, -s, 0],
    [s, c, 0],
    [0, 0, 1]
  ];
}

/**
 * Rodrigues: R = I + sin θ·K + (1 - cos θ)·K², K the cross-product matrix of
 * the unit axis. The axis is normalized first; a zero axis is a DomainError.
 */
export function rotationAxisAngle(axis: Vec3, angle: number): Mat3 {
  requireFinite("rotationAxisAngle", { angle });
  const [x, y, z] = normalize(axis);
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const t = 1 - c;
  return [
    [c + t*x*x, t*x*y - s*z, t*x*z + s*y],
    [t*x*y + s*z, c + t*y*y, t*y*z - s*x],
    [t*x*z - s*y, t*y*z + s*x, c + t*z*z]
  ];
}

// Composition order is Z·Y·X: roll is applied first, yaw last.
export function rotationEuler(roll: number, pitch: number, yaw: number): Mat3 {
  return multiplyMatrices(rotationZ(yaw), multiplyMatrices(rotationY(pitch), rotationX(roll)));
}

/**
 * True when M·Mᵀ = I and det M = +1, both within `eps`.
 */
export function isRotationMatrix(m: Mat3, eps = EPS_ORTHOGONAL): boolean {
  const product = multiplyMatrices(m, transpose(m));
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      const expected = row === col ? 1 : 0;
      if (Math.abs(product[row][col] - expected) > eps) return false;
    }
  }
  const det =
    m[0][0] * (m[1][1]*m[2][2] - m[1][2]*m[2][1]) -
    m[0][1] * (m[1][0]*m[2][2] - m[1][2]*m[2][0]) +
    m[0][2] * (m[1][0]*m[2][1] - m[1][1]*m[2][0]);
  return Math.abs(det - 1) <= eps;
}
