/**
 * Effective nuclear charge seen by an electron in orbital (n, l).
 *
 * Lookup order:
 * 1. Clementi–Raimondi SCF values (data/clementiZeff.json)
 * 2. the nearest lighter element listing the same orbital, plus 0.85 per
 *    extra proton
 * 3. Slater's screening rules
 */

import clementiTable from "./data/clementiZeff.json" with { type: "json" };
import { checkInteger, throwIfErrors } from "../validate.js";

const CLEMENTI_ZEFF: Readonly<Record<string, Readonly<Record<string, number>>>> = clementiTable;

/** Z_eff added per proton when extrapolating from a lighter element. */
const EXTRAPOLATION_STEP = 0.85;

const ORBITAL_LETTERS = "spdfghik";

export function orbitalLetter(l: number): string {
  return l < ORBITAL_LETTERS.length ? ORBITAL_LETTERS[l] : `(l=${l})`;
}

export function orbitalLabel(n: number, l: number): string {
  return `${n}${orbitalLetter(l)}`;
}

export function clementiValue(Z: number, label: string): number | undefined {
  return CLEMENTI_ZEFF[String(Z)]?.[label];
}

export function slaterEffectiveCharge(Z: number, n: number): number {
  let sigma: number;
  switch (n) {
    case 1:
      sigma = Z > 1 ? 0.3 * (Z - 1) : 0;
      break;
    case 2:
      sigma = 2 * 0.85 + Math.max(0, Z - 3) * 0.35;
      break;
    case 3:
      sigma = 2 * 1.0 + 8 * 0.85 + Math.max(0, Z - 11) * 0.35;
      break;
    case 4:
      sigma = 10 * 1.0 + 8 * 0.85 + Math.max(0, Z - 19) * 0.35;
      break;
    case 5:
      sigma = 18 * 1.0 + 18 * 0.85 + Math.max(0, Z - 37) * 0.35;
      break;
    case 6:
      sigma = 36 * 1.0 + 18 * 0.85 + Math.max(0, Z - 55) * 0.35;
      break;
    default:
      sigma = 0.85 * (Z - 1);
  }
  return Math.max(1, Z - sigma);
}

export function effectiveNuclearCharge(Z: number, n: number, l: number): number {
  const errors: string[] = [];
  checkInteger(errors, "Z", Z, 1);
  const nOk = checkInteger(errors, "n", n, 1);
  const lOk = checkInteger(errors, "l", l, 0);
  if (nOk && lOk && l >= n) {
    errors.push(`l must be < n, got n=${n}, l=${l}`);
  }
  throwIfErrors("effectiveNuclearCharge", errors);

  const label = orbitalLabel(n, l);
  const exact = clementiValue(Z, label);
  if (exact !== undefined) return exact;

  for (let z = Z - 1; z >= 1; z--) {
    const lighter = clementiValue(z, label);
    if (lighter !== undefined) {
      return lighter + (Z - z) * EXTRAPOLATION_STEP;
    }
  }
  return slaterEffectiveCharge(Z, n);
}
