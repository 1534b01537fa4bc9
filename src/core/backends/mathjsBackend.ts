/**
 * Special functions delegated to mathjs.
 *
 * Factorials, Γ and binomial coefficients come straight from mathjs. mathjs
 * has no orthogonal polynomials, so Laguerre and Legendre are evaluated from
 * their closed forms over mathjs coefficients: the explicit Laguerre series
 * and the expanded Rodrigues formula. Neither shares an evaluation path with
 * the recurrences of the self-contained backend.
 *
 * The Rodrigues sum alternates over terms far larger than its result, so it
 * runs in BigNumber arithmetic and is rounded to a double once at the end.
 */
import { all, combinations, complex, create, exp, factorial, gamma } from "mathjs";
import type { BigNumber } from "mathjs";

import type { Complex } from "../types.js";
import type { SpecialFunctionBackend } from "./types.js";
import {
  BINOMIAL_MAX,
  DOUBLE_FACTORIAL_MAX,
  FACTORIAL_MAX,
  GAMMA_HALF_INTEGER_MAX
} from "../constants.js";
import {
  checkInteger,
  clampUnitArgument,
  requireFinite,
  requireInteger,
  throwIfErrors,
  validateDegreeOrder
} from "../validate.js";

/** Significant digits of the BigNumber instance used for the Rodrigues sum. */
const RODRIGUES_PRECISION = 100;

const big = create(all, { precision: RODRIGUES_PRECISION });

function libraryFactorial(n: number): number {
  requireInteger("factorial", "n", n, 0, FACTORIAL_MAX);
  return factorial(n);
}

function libraryDoubleFactorial(n: number): number {
  requireInteger("doubleFactorial", "n", n, -1, DOUBLE_FACTORIAL_MAX);
  if (n <= 0) return 1;
  if (n % 2 === 0) {
    const k = n / 2;
    return 2 ** k * factorial(k);
  }
  // (2k-1)!! = 2^k Γ(k + 1/2) / √π
  const k = (n + 1) / 2;
  return Math.round((2 ** k * gamma(k + 0.5)) / Math.sqrt(Math.PI));
}

function libraryBinomial(n: number, k: number): number {
  const errors: string[] = [];
  const nOk = checkInteger(errors, "n", n, 0, BINOMIAL_MAX);
  const kOk = checkInteger(errors, "k", k, 0);
  if (nOk && kOk && k > n) {
    errors.push(`k must be <= n, got n=${n}, k=${k}`);
  }
  throwIfErrors("binomial", errors);
  return combinations(n, k);
}

function libraryGammaHalfInteger(n: number): number {
  requireInteger("gammaHalfInteger", "n", n, 1, GAMMA_HALF_INTEGER_MAX);
  return gamma(n / 2);
}

function libraryLaguerre(n: number, alpha: number, x: number): number {
  requireInteger("generalizedLaguerre", "n", n, 0);
  requireFinite("generalizedLaguerre", { alpha, x });

  let result = 0;
  for (let k = 0; k <= n; k++) {
    // (n + α)(n + α - 1)···(α + k + 1) / (n - k)!
    let rising = 1;
    for (let j = 0; j < n - k; j++) {
      rising *= n + alpha - j;
    }
    const coefficient = rising / factorial(n - k);
    const term = (coefficient * x ** k) / factorial(k);
    result += k % 2 === 0 ? term : -term;
  }
  return result;
}

/**
 * P_l^m(x) for m >= 0 from the expanded Rodrigues formula:
 * (-1)^m (1-x²)^{m/2} / (2^l l!) · Σ_j C(l,j) (-1)^{l-j} (2j)!/(2j-l-m)! x^{2j-l-m}.
 */
function rodriguesLegendre(m: number, l: number, x: number): number {
  const order = l + m;
  const bx = big.bignumber(x);
  let derivative: BigNumber = big.bignumber(0);
  for (let j = Math.ceil(order / 2); j <= l; j++) {
    const falling = big.factorial(big.bignumber(2 * j)).div(big.factorial(big.bignumber(2 * j - order)));
    const term = big
      .combinations(big.bignumber(l), big.bignumber(j))
      .times(falling)
      .times(bx.pow(2 * j - order));
    derivative = (l - j) % 2 === 0 ? derivative.plus(term) : derivative.minus(term);
  }
  const envelope = big.bignumber(1).minus(bx).times(big.bignumber(1).plus(bx)).sqrt().pow(m);
  const value = envelope
    .times(derivative)
    .div(big.bignumber(2).pow(l).times(big.factorial(big.bignumber(l))))
    .toNumber();
  return m % 2 === 0 ? value : -value;
}

function libraryLegendre(m: number, l: number, x: number): number {
  validateDegreeOrder("associatedLegendre", l, m);
  const xc = clampUnitArgument("associatedLegendre", x);
  if (m >= 0) return rodriguesLegendre(m, l, xc);

  const mp = -m;
  const phase = mp % 2 === 0 ? 1 : -1;
  return (phase * factorial(l - mp) / factorial(l + mp)) * rodriguesLegendre(mp, l, xc);
}

function libraryHarmonicComplex(l: number, m: number, theta: number, phi: number): Complex {
  validateDegreeOrder("sphericalHarmonicComplex", l, m);
  requireFinite("sphericalHarmonicComplex", { theta, phi });

  const norm = Math.sqrt(((2 * l + 1) / (4 * Math.PI)) * (factorial(l - m) / factorial(l + m)));
  const amplitude = norm * libraryLegendre(m, l, Math.cos(theta));
  const phase = exp(complex(0, m * phi));
  return { re: amplitude * phase.re, im: amplitude * phase.im };
}

function libraryHarmonicReal(l: number, m: number, theta: number, phi: number): number {
  validateDegreeOrder("sphericalHarmonicReal", l, m);
  requireFinite("sphericalHarmonicReal", { theta, phi });

  if (m === 0) return libraryHarmonicComplex(l, 0, theta, phi).re;
  const mp = Math.abs(m);
  const y = libraryHarmonicComplex(l, mp, theta, phi);
  const sign = mp % 2 === 0 ? 1 : -1;
  return Math.SQRT2 * sign * (m > 0 ? y.re : y.im);
}

export const mathjsSpecialFunctions: SpecialFunctionBackend = {
  implementation: "library",
  factorial: libraryFactorial,
  doubleFactorial: libraryDoubleFactorial,
  binomial: libraryBinomial,
  gammaHalfInteger: libraryGammaHalfInteger,
  generalizedLaguerre: libraryLaguerre,
  associatedLegendre: libraryLegendre,
  sphericalHarmonicComplex: libraryHarmonicComplex,
  sphericalHarmonicReal: libraryHarmonicReal
};
