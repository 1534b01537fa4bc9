/**
 * Rejection sampling of orbital clouds for renderers.
 */

import type { CloudPoint, Vec3 } from "../types.js";
import { ParticleNumericsError } from "../errors.js";
import {
  checkFinite,
  checkInteger,
  throwIfErrors,
  validateDegreeOrder,
  validateQuantumNumbers
} from "../validate.js";
import { createSeededRandom, uniform } from "../positions/random.js";

export interface CloudRequest {
  n: number;
  l: number;
  m: number;
  Z: number;
  count: number;
  seed: number;
}

export interface CloudSource {
  density(r: number, theta: number, phi: number): number;
  toCartesian(r: number, theta: number, phi: number): Vec3;
}

const SCAN_RADIAL_STEPS = 96;
const SCAN_POLAR_STEPS = 48;
/** Headroom over the scanned maximum; the grid can miss the true peak. */
const BOUND_MARGIN = 1.5;
const MAX_ATTEMPTS_PER_POINT = 20000;

/** Radius beyond which the cloud is not sampled. */
export function cloudRadius(n: number, Z: number): number {
  return (3 * n * n + 5) / Z;
}

/**
 * Largest density on a coarse (r, θ) grid at φ = 0, times BOUND_MARGIN.
 * The density is taken as independent of φ.
 */
export function densityBound(source: CloudSource, rMax: number): number {
  let peak = 0;
  for (let i = 0; i <= SCAN_RADIAL_STEPS; i++) {
    const r = (rMax * i) / SCAN_RADIAL_STEPS;
    for (let j = 0; j <= SCAN_POLAR_STEPS; j++) {
      const theta = (Math.PI * j) / SCAN_POLAR_STEPS;
      peak = Math.max(peak, source.density(r, theta, 0));
    }
  }
  return peak * BOUND_MARGIN;
}

/**
 * Draw `count` points inside the ball of radius (3n² + 5)/Z with probability
 * proportional to the density. Proposals are uniform in volume, so each one
 * consumes three draws (radius, cos θ, φ) and acceptance a fourth.
 */
export function sampleCloud(source: CloudSource, request: CloudRequest): CloudPoint[] {
  const { n, l, m, Z, count, seed } = request;
  validateQuantumNumbers("sampleCloud", n, l);
  validateDegreeOrder("sampleCloud", l, m);
  const errors: string[] = [];
  if (checkFinite(errors, "Z", Z) && Z <= 0) errors.push(`Z must be > 0, got ${Z}`);
  checkInteger(errors, "count", count, 0);
  checkInteger(errors, "seed", seed);
  throwIfErrors("sampleCloud", errors);

  if (count === 0) return [];

  const rMax = cloudRadius(n, Z);
  const bound = densityBound(source, rMax);
  const rng = createSeededRandom(seed);
  const points: CloudPoint[] = [];
  const maxAttempts = count * MAX_ATTEMPTS_PER_POINT;

  for (let attempt = 0; points.length < count; attempt++) {
    if (attempt >= maxAttempts) {
      throw new ParticleNumericsError(
        `sampleCloud: accepted ${points.length} of ${count} points in ${maxAttempts} attempts`
      );
    }
    const r = rMax * Math.cbrt(rng());
    const theta = Math.acos(uniform(rng, -1, 1));
    const phi = uniform(rng, 0, 2 * Math.PI);
    const density = source.density(r, theta, phi);
    if (rng() * bound < density) {
      points.push({ position: source.toCartesian(r, theta, phi), density });
    }
  }
  return points;
}
