import type { Complex } from "../types.js";
import { requireFinite, validateDegreeOrder } from "../validate.js";
import { associatedLegendre } from "./legendre.js";

/**
 * Normalization K_l^m = sqrt((2l+1)/(4π) · (l-m)!/(l+m)!).
 * The factorial quotient is accumulated as a product so nothing overflows.
 */
export function sphericalHarmonicPrefactor(l: number, m: number): number {
  validateDegreeOrder("sphericalHarmonicPrefactor", l, m);
  let ratio = 1;
  if (m >= 0) {
    for (let k = l - m + 1; k <= l + m; k++) ratio /= k;
  } else {
    for (let k = l + m + 1; k <= l - m; k++) ratio *= k;
  }
  return Math.sqrt(((2 * l + 1) / (4 * Math.PI)) * ratio);
}

/**
 * Complex spherical harmonic Y_l^m(θ, φ) = K_l^m · P_l^m(cos θ) · e^{imφ}.
 * Negative orders use Y_l^{-m} = (-1)^m · conj(Y_l^m).
 */
export function sphericalHarmonicComplex(l: number, m: number, theta: number, phi: number): Complex {
  validateDegreeOrder("sphericalHarmonicComplex", l, m);
  requireFinite("sphericalHarmonicComplex", { theta, phi });

  const mp = Math.abs(m);
  const magnitude = sphericalHarmonicPrefactor(l, mp) * associatedLegendre(mp, l, Math.cos(theta));
  const re = magnitude * Math.cos(mp * phi);
  const im = magnitude * Math.sin(mp * phi);
  if (m >= 0) return { re, im };

  const sign = mp % 2 === 0 ? 1 : -1;
  return { re: sign * re, im: -sign * im };
}

/**
 * Real spherical harmonic:
 *   m < 0: √2 (-1)^m Im Y_l^{|m|},  m = 0: Y_l^0,  m > 0: √2 (-1)^m Re Y_l^m.
 */
export function sphericalHarmonicReal(l: number, m: number, theta: number, phi: number): number {
  validateDegreeOrder("sphericalHarmonicReal", l, m);
  requireFinite("sphericalHarmonicReal", { theta, phi });

  const mp = Math.abs(m);
  const base = sphericalHarmonicPrefactor(l, mp) * associatedLegendre(mp, l, Math.cos(theta));
  if (m === 0) return base;

  const sign = mp % 2 === 0 ? 1 : -1;
  const azimuthal = m > 0 ? Math.cos(mp * phi) : Math.sin(mp * phi);
  return Math.SQRT2 * sign * base * azimuthal;
}
