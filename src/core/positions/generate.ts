/**
 * Seeded nucleon placement.
 *
 * Two models:
 * - uniform: points uniformly distributed in a ball of radius R (liquid drop)
 * - shell: points on concentric shells filled in magic-number order, with a
 *   small radial jitter
 *
 * The random stream is consumed in a fixed order per particle (radius or
 * jitter, then cos θ, then φ) and every call owns its generator, so a given
 * (model, count, seed) always yields the same points. Cartesian conversion
 * goes through the registry's vector backend; both backends evaluate the
 * same expression, so the output does not depend on the selection.
 */

import type { Nucleon, PositionModel, PositionSet, Vec3 } from "../types.js";
import type { VectorBackend } from "../backends/types.js";
import { DomainError } from "../errors.js";
import { NUCLEAR_RADIUS_R0_FM, SHELL_CAPACITIES, SHELL_JITTER } from "../constants.js";
import { checkFinite, checkInteger, throwIfErrors } from "../validate.js";
import { createSeededRandom, shuffleInPlace, uniform } from "./random.js";
import type { RandomSource } from "./random.js";

export interface PositionOptions {
  /** Outer radius; defaults to r₀·A^(1/3) with A the particle count. */
  radius?: number;
}

/**
 * Index of the shell that holds the i-th particle of a species.
 * The last shell takes everything past the final closure.
 */
export function shellIndex(i: number): number {
  let cumulative = 0;
  for (let shell = 0; shell < SHELL_CAPACITIES.length; shell++) {
    cumulative += SHELL_CAPACITIES[shell];
    if (i < cumulative) return shell;
  }
  return SHELL_CAPACITIES.length - 1;
}

/** Number of shells occupied by `count` particles of one species. */
export function occupiedShells(count: number): number {
  return count === 0 ? 0 : shellIndex(count - 1) + 1;
}

export function nuclearRadius(count: number): number {
  return NUCLEAR_RADIUS_R0_FM * Math.cbrt(count);
}

function validateRequest(fn: string, counts: Record<string, number>, seed: number, options: PositionOptions): void {
  const errors: string[] = [];
  for (const [name, value] of Object.entries(counts)) {
    checkInteger(errors, name, value, 0);
  }
  checkInteger(errors, "seed", seed);
  if (options.radius !== undefined && checkFinite(errors, "radius", options.radius) && options.radius <= 0) {
    errors.push(`radius must be > 0, got ${options.radius}`);
  }
  throwIfErrors(fn, errors);
}

export class PositionGenerator {
  constructor(private readonly registry: { readonly vector: VectorBackend }) {}

  generatePositions(model: PositionModel, count: number, seed: number, options: PositionOptions = {}): PositionSet {
    validateModel("generatePositions", model);
    validateRequest("generatePositions", { count }, seed, options);
    if (count === 0) return [];

    const rng = createSeededRandom(seed);
    const radius = options.radius ?? nuclearRadius(count);
    const shells = occupiedShells(count);

    const points: PositionSet = [];
    for (let i = 0; i < count; i++) {
      points.push(
        model === "uniform"
          ? this.placeUniform(rng, radius)
          : this.placeOnShell(rng, (radius * (shellIndex(i) + 1)) / shells)
      );
    }
    return points;
  }

  /**
   * Place `protons + neutrons` tagged nucleons. The tags are shuffled first;
   * each species then fills the shell sequence with its own counter.
   */
  generateNucleons(
    model: PositionModel,
    protons: number,
    neutrons: number,
    seed: number,
    options: PositionOptions = {}
  ): Nucleon[] {
    validateModel("generateNucleons", model);
    validateRequest("generateNucleons", { protons, neutrons }, seed, options);
    const total = protons + neutrons;
    if (total === 0) return [];

    const rng = createSeededRandom(seed);
    const tags = shuffleInPlace(
      Array.from({ length: total }, (_, i) => i < protons),
      rng
    );
    const radius = options.radius ?? nuclearRadius(total);
    const shells = Math.max(occupiedShells(protons), occupiedShells(neutrons));

    let protonIndex = 0;
    let neutronIndex = 0;
    return tags.map((isProton) => {
      if (model === "uniform") {
        return { position: this.placeUniform(rng, radius), isProton };
      }
      const index = isProton ? protonIndex++ : neutronIndex++;
      const shellRadius = (radius * (shellIndex(index) + 1)) / shells;
      return { position: this.placeOnShell(rng, shellRadius), isProton };
    });
  }

  private placeUniform(rng: RandomSource, radius: number): Vec3 {
    const r = radius * Math.cbrt(rng());
    return this.placeAt(rng, r);
  }

  private placeOnShell(rng: RandomSource, shellRadius: number): Vec3 {
    const jitter = uniform(rng, -SHELL_JITTER, SHELL_JITTER);
    return this.placeAt(rng, shellRadius * (1 + jitter));
  }

  private placeAt(rng: RandomSource, r: number): Vec3 {
    const cosTheta = uniform(rng, -1, 1);
    const phi = uniform(rng, 0, 2 * Math.PI);
    return this.registry.vector.fromSpherical(r, Math.acos(cosTheta), phi);
  }
}

function validateModel(fn: string, model: PositionModel): void {
  if (model !== "uniform" && model !== "shell") {
    throw new DomainError(fn, [`model must be "uniform" or "shell", got ${String(model)}`]);
  }
}
