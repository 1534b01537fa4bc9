/**
 * Hydrogen-like orbitals in Bohr units.
 *
 * All special functions are taken from the registry facade, so switching the
 * math backend switches the engine with it.
 */

import type { CloudPoint, OrbitalDescriptor } from "../types.js";
import type { SpecialFunctionBackend, VectorBackend } from "../backends/types.js";
import { BOHR_RADIUS_ANGSTROM, FACTORIAL_MAX } from "../constants.js";
import { checkFinite, throwIfErrors, validateDegreeOrder, validateQuantumNumbers } from "../validate.js";
import { effectiveNuclearCharge, orbitalLetter } from "./zeff.js";
import { sampleCloud } from "./cloud.js";

const SUBSHELL_SUFFIXES: Record<string, string> = {
  "1,-1": "x",
  "1,0": "z",
  "1,1": "y",
  "2,-2": "xy",
  "2,-1": "yz",
  "2,0": "z2",
  "2,1": "xz",
  "2,2": "x2-y2"
};

export function orbitalName(n: number, l: number, m = 0): string {
  validateQuantumNumbers("orbitalName", n, l);
  validateDegreeOrder("orbitalName", l, m);
  const base = `${n}${orbitalLetter(l)}`;
  if (l === 0) return base;
  return base + (SUBSHELL_SUFFIXES[`${l},${m}`] ?? String(m));
}

/**
 * Every (n, l, m) with 1 <= n <= maxN, in order of n, then l, then m.
 */
export function availableOrbitals(maxN = 4): OrbitalDescriptor[] {
  validateQuantumNumbers("availableOrbitals", maxN, 0);
  const orbitals: OrbitalDescriptor[] = [];
  for (let n = 1; n <= maxN; n++) {
    for (let l = 0; l < n; l++) {
      // start at +0, not -0, when l = 0
      for (let m = 0 - l; m <= l; m++) {
        orbitals.push({ n, l, m, name: orbitalName(n, l, m) });
      }
    }
  }
  return orbitals;
}

export interface OrbitalBackends {
  readonly math: SpecialFunctionBackend;
  readonly vector: VectorBackend;
}

export class OrbitalEngine {
  constructor(private readonly registry: OrbitalBackends) {}

  /**
   * R_nl(r) = N ρ^l e^{-ρ/2} L_{n-l-1}^{2l+1}(ρ), ρ = 2Zr/n,
   * N = sqrt((2Z/n)³ (n-l-1)! / (2n (n+l)!)).
   */
  radialWavefunction(n: number, l: number, r: number, Z = 1): number {
    validateQuantumNumbers("radialWavefunction", n, l);
    const errors: string[] = [];
    if (n + l > FACTORIAL_MAX) errors.push(`n + l must be <= ${FACTORIAL_MAX}, got n=${n}, l=${l}`);
    if (checkFinite(errors, "r", r) && r < 0) errors.push(`r must be >= 0, got ${r}`);
    if (checkFinite(errors, "Z", Z) && Z <= 0) errors.push(`Z must be > 0, got ${Z}`);
    throwIfErrors("radialWavefunction", errors);

    const math = this.registry.math;
    const rho = (2 * Z * r) / n;
    const norm = Math.sqrt(
      ((2 * Z / n) ** 3 * math.factorial(n - l - 1)) / (2 * n * math.factorial(n + l))
    );
    return norm * rho ** l * Math.exp(-rho / 2) * math.generalizedLaguerre(n - l - 1, 2 * l + 1, rho);
  }

  /** |Y_l^m(θ, φ)|² */
  angularWavefunction(l: number, m: number, theta: number, phi = 0): number {
    const y = this.registry.math.sphericalHarmonicComplex(l, m, theta, phi);
    return y.re * y.re + y.im * y.im;
  }

  orbitalProbability(n: number, l: number, m: number, r: number, theta: number, phi = 0, Z = 1): number {
    validateDegreeOrder("orbitalProbability", l, m);
    const radial = this.radialWavefunction(n, l, r, Z);
    return radial * radial * this.angularWavefunction(l, m, theta, phi);
  }

  /** Radial wavefunction with Z replaced by the screened Z_eff. */
  radialWavefunctionEnhanced(n: number, l: number, r: number, Z = 1): number {
    return this.radialWavefunction(n, l, r, effectiveNuclearCharge(Z, n, l));
  }

  orbitalProbabilityEnhanced(n: number, l: number, m: number, r: number, theta: number, phi = 0, Z = 1): number {
    return this.orbitalProbability(n, l, m, r, theta, phi, effectiveNuclearCharge(Z, n, l));
  }

  effectiveNuclearCharge(Z: number, n: number, l: number): number {
    return effectiveNuclearCharge(Z, n, l);
  }

  /** Bohr-model radius a₀ n² / Z_eff, in Å. */
  orbitalRadius(n: number, l: number, Z = 1): number {
    return (BOHR_RADIUS_ANGSTROM * n * n) / effectiveNuclearCharge(Z, n, l);
  }

  orbitalName(n: number, l: number, m = 0): string {
    return orbitalName(n, l, m);
  }

  availableOrbitals(maxN = 4): OrbitalDescriptor[] {
    return availableOrbitals(maxN);
  }

  sampleCloud(n: number, l: number, m: number, Z: number, count: number, seed: number): CloudPoint[] {
    return sampleCloud(
      {
        density: (r, theta, phi) => this.orbitalProbability(n, l, m, r, theta, phi, Z),
        toCartesian: (r, theta, phi) => this.registry.vector.fromSpherical(r, theta, phi)
      },
      { n, l, m, Z, count, seed }
    );
  }
}
