import type { Vec3 } from "../types.js";
import { DomainError } from "../errors.js";
import { EPS_VECTOR_NORM } from "../constants.js";
import { requireFinite } from "../validate.js";

export function roundScalar(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function roundVec(v: Vec3, decimals: number): Vec3 {
  return [
    roundScalar(v[0], decimals),
    roundScalar(v[1], decimals),
    roundScalar(v[2], decimals)
  ];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0]*b[0] + a[1]*b[1] + a[2]*b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1]*b[2] - a[2]*b[1],
    a[2]*b[0] - a[0]*b[2],
    a[0]*b[1] - a[1]*b[0]
  ];
}

export function length(v: Vec3): number {
  return Math.sqrt(v[0]*v[0] + v[1]*v[1] + v[2]*v[2]);
}

export function normalize(v: Vec3): Vec3 {
  const n = length(v);
  if (!(n > EPS_VECTOR_NORM)) {
    throw new DomainError("normalize", [`cannot normalize a vector of length ${n}`]);
  }
  return [v[0] / n, v[1] / n, v[2] / n];
}

export function fromSpherical(r: number, theta: number, phi: number): Vec3 {
  requireFinite("fromSpherical", { r, theta, phi });
  const sinTheta = Math.sin(theta);
  return [
    r * sinTheta * Math.cos(phi),
    r * sinTheta * Math.sin(phi),
    r * Math.cos(theta)
  ];
}
