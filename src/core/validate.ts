/**
 * Argument checks shared by both backends and the engines built on them.
 * Every check collects its problems and throws a single DomainError per call.
 */

import type { Mat3, Vec3 } from "./types.js";
import { DomainError } from "./errors.js";
import { DOMAIN_SLACK, LEGENDRE_MAX_DEGREE } from "./constants.js";

export { DomainError };

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function isVec3(value: unknown): value is Vec3 {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((v) => isFiniteNumber(v))
  );
}

export function isMat3(value: unknown): value is Mat3 {
  return Array.isArray(value) && value.length === 3 && value.every((row) => isVec3(row));
}

export function checkFinite(errors: string[], name: string, value: number): boolean {
  if (!isFiniteNumber(value)) {
    errors.push(`${name} must be a finite number, got ${value}`);
    return false;
  }
  return true;
}

export function checkInteger(
  errors: string[],
  name: string,
  value: number,
  min = -Infinity,
  max = Infinity
): boolean {
  if (!Number.isInteger(value)) {
    errors.push(`${name} must be an integer, got ${value}`);
    return false;
  }
  if (value < min) {
    errors.push(`${name} must be >= ${min}, got ${value}`);
    return false;
  }
  if (value > max) {
    errors.push(`${name} must be <= ${max}, got ${value}`);
    return false;
  }
  return true;
}

export function throwIfErrors(fn: string, errors: string[]): void {
  if (errors.length > 0) {
    throw new DomainError(fn, errors);
  }
}

export function requireFinite(fn: string, values: Record<string, number>): void {
  const errors: string[] = [];
  for (const [name, value] of Object.entries(values)) {
    checkFinite(errors, name, value);
  }
  throwIfErrors(fn, errors);
}

export function requireInteger(
  fn: string,
  name: string,
  value: number,
  min = -Infinity,
  max = Infinity
): void {
  const errors: string[] = [];
  checkInteger(errors, name, value, min, max);
  throwIfErrors(fn, errors);
}

export function requireVec3(fn: string, name: string, value: Vec3): void {
  if (!isVec3(value)) {
    throw new DomainError(fn, [`${name} must be a Vec3 of finite numbers`]);
  }
}

export function requireMat3(fn: string, name: string, value: Mat3): void {
  if (!isMat3(value)) {
    throw new DomainError(fn, [`${name} must be a 3x3 matrix of finite numbers`]);
  }
}

/**
 * Degree/order pair of a Legendre function or spherical harmonic:
 * 0 <= l <= LEGENDRE_MAX_DEGREE, |m| <= l.
 */
export function validateDegreeOrder(fn: string, l: number, m: number): void {
  const errors: string[] = [];
  const lOk = checkInteger(errors, "l", l, 0, LEGENDRE_MAX_DEGREE);
  const mOk = checkInteger(errors, "m", m);
  if (lOk && mOk && Math.abs(m) > l) {
    errors.push(`|m| must be <= l, got l=${l}, m=${m}`);
  }
  throwIfErrors(fn, errors);
}

/**
 * Principal/azimuthal pair of a hydrogen-like orbital: n >= 1, 0 <= l < n.
 */
export function validateQuantumNumbers(fn: string, n: number, l: number): void {
  const errors: string[] = [];
  const nOk = checkInteger(errors, "n", n, 1);
  const lOk = checkInteger(errors, "l", l, 0);
  if (nOk && lOk && l >= n) {
    errors.push(`l must be < n, got n=${n}, l=${l}`);
  }
  throwIfErrors(fn, errors);
}

/**
 * Check a Legendre argument and pull values within DOMAIN_SLACK of ±1 back onto ±1.
 */
export function clampUnitArgument(fn: string, x: number): number {
  requireFinite(fn, { x });
  if (Math.abs(x) > 1 + DOMAIN_SLACK) {
    throw new DomainError(fn, [`|x| must be <= 1, got ${x}`]);
  }
  return Math.max(-1, Math.min(1, x));
}
