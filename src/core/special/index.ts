import type { Complex } from "../types.js";
import type { SpecialFunctionBackend } from "../backends/types.js";
import { FactorialTable, binomial, doubleFactorial } from "./factorial.js";
import { generalizedLaguerre } from "./laguerre.js";
import { associatedLegendre } from "./legendre.js";
import { sphericalHarmonicComplex, sphericalHarmonicReal } from "./harmonics.js";

export { FactorialTable, binomial, doubleFactorial } from "./factorial.js";
export { generalizedLaguerre, laguerreSeries } from "./laguerre.js";
export { associatedLegendre, legendreSeries } from "./legendre.js";
export {
  sphericalHarmonicComplex,
  sphericalHarmonicPrefactor,
  sphericalHarmonicReal
} from "./harmonics.js";

/**
 * Dependency-free special functions. Each instance owns its factorial table.
 */
export class SelfContainedSpecialFunctions implements SpecialFunctionBackend {
  readonly implementation = "self-contained" as const;
  readonly factorials = new FactorialTable();

  factorial(n: number): number {
    return this.factorials.factorial(n);
  }

  doubleFactorial(n: number): number {
    return doubleFactorial(n);
  }

  binomial(n: number, k: number): number {
    return binomial(n, k);
  }

  gammaHalfInteger(n: number): number {
    return this.factorials.gammaHalfInteger(n);
  }

  generalizedLaguerre(n: number, alpha: number, x: number): number {
    return generalizedLaguerre(n, alpha, x);
  }

  associatedLegendre(m: number, l: number, x: number): number {
    return associatedLegendre(m, l, x);
  }

  sphericalHarmonicComplex(l: number, m: number, theta: number, phi: number): Complex {
    return sphericalHarmonicComplex(l, m, theta, phi);
  }

  sphericalHarmonicReal(l: number, m: number, theta: number, phi: number): number {
    return sphericalHarmonicReal(l, m, theta, phi);
  }
}
