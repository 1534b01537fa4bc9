import { clampUnitArgument, requireInteger, validateDegreeOrder } from "../validate.js";
import { binomial } from "./factorial.js";

/**
 * Associated Legendre function P_l^m(x), Condon–Shortley phase included.
 *
 * For m >= 0: start from P_m^m = (-1)^m (2m-1)!! (1-x²)^{m/2} (built one
 * factor at a time), step to P_{m+1}^m = x(2m+1)P_m^m, then recur upward:
 *
 *   (k - m + 1)·P_{k+1}^m = (2k + 1)·x·P_k^m - (k + m)·P_{k-1}^m
 *
 * For m < 0: P_l^{-m} = (-1)^m · (l-m)!/(l+m)! · P_l^m.
 */
export function associatedLegendre(m: number, l: number, x: number): number {
  validateDegreeOrder("associatedLegendre", l, m);
  const xc = clampUnitArgument("associatedLegendre", x);
  return legendreUnchecked(m, l, xc);
}

function legendreUnchecked(m: number, l: number, x: number): number {
  if (m < 0) {
    const mp = -m;
    // (l - mp)! / (l + mp)! as a running quotient
    let ratio = 1;
    for (let k = l - mp + 1; k <= l + mp; k++) {
      ratio /= k;
    }
    const sign = mp % 2 === 0 ? 1 : -1;
    return sign * ratio * legendreUnchecked(mp, l, x);
  }

  const sinFactor = Math.sqrt((1 - x) * (1 + x));
  let pmm = 1;
  for (let k = 1; k <= m; k++) {
    pmm *= -(2 * k - 1) * sinFactor;
  }
  if (l === m) return pmm;

  let pPrev = pmm;
  let pCurr = x * (2 * m + 1) * pmm;
  for (let k = m + 1; k < l; k++) {
    const pNext = ((2 * k + 1) * x * pCurr - (k + m) * pPrev) / (k - m + 1);
    pPrev = pCurr;
    pCurr = pNext;
  }
  return pCurr;
}

/**
 * Legendre polynomial P_l(x) from the explicit sum
 * 2^{-l} Σ_{k ≤ l/2} (-1)^k C(l, k) C(2l - 2k, l) x^{l-2k}.
 */
export function legendreSeries(l: number, x: number): number {
  requireInteger("legendreSeries", "l", l, 0);
  const xc = clampUnitArgument("legendreSeries", x);

  let result = 0;
  for (let k = 0; k <= Math.floor(l / 2); k++) {
    const sign = k % 2 === 0 ? 1 : -1;
    result += sign * binomial(l, k) * binomial(2 * l - 2 * k, l) * xc ** (l - 2 * k);
  }
  return result / 2 ** l;
}
