import {
  BINOMIAL_MAX,
  DOUBLE_FACTORIAL_MAX,
  FACTORIAL_MAX,
  GAMMA_HALF_INTEGER_MAX
} from "../constants.js";
import { requireInteger, throwIfErrors, checkInteger } from "../validate.js";

/**
 * Memoized n! for 0 <= n <= FACTORIAL_MAX.
 *
 * Entries are filled lazily in ascending order (`table[k] = table[k - 1] * k`)
 * and never evicted: the whole domain is 171 doubles.
 */
export class FactorialTable {
  private readonly values: number[] = [1];

  /** Number of cached entries. */
  get size(): number {
    return this.values.length;
  }

  factorial(n: number): number {
    requireInteger("factorial", "n", n, 0, FACTORIAL_MAX);
    for (let k = this.values.length; k <= n; k++) {
      this.values.push(this.values[k - 1] * k);
    }
    return this.values[n];
  }

  /**
   * Γ(n/2) for integer n >= 1.
   *
   * Even n: Γ(k) = (k-1)!. Odd n = 2k+1: Γ(k + 1/2) = (2k-1)!! / 2^k · √π.
   */
  gammaHalfInteger(n: number): number {
    requireInteger("gammaHalfInteger", "n", n, 1, GAMMA_HALF_INTEGER_MAX);
    if (n % 2 === 0) {
      return this.factorial(n / 2 - 1);
    }
    const k = (n - 1) / 2;
    return (doubleFactorial(2 * k - 1) / 2 ** k) * Math.sqrt(Math.PI);
  }
}

/**
 * n!! = n·(n-2)·(n-4)··· down to 1 or 2, with (-1)!! = 0!! = 1.
 */
export function doubleFactorial(n: number): number {
  requireInteger("doubleFactorial", "n", n, -1, DOUBLE_FACTORIAL_MAX);
  let result = 1;
  for (let current = n; current > 1; current -= 2) {
    result *= current;
  }
  return result;
}

/**
 * C(n, k) by the multiplicative formula; never forms a full factorial.
 */
export function binomial(n: number, k: number): number {
  const errors: string[] = [];
  const nOk = checkInteger(errors, "n", n, 0, BINOMIAL_MAX);
  const kOk = checkInteger(errors, "k", k, 0);
  if (nOk && kOk && k > n) {
    errors.push(`k must be <= n, got n=${n}, k=${k}`);
  }
  throwIfErrors("binomial", errors);

  const kk = Math.min(k, n - k);
  let result = 1;
  for (let i = 0; i < kk; i++) {
    // C(n, i) · (n - i) is divisible by (i + 1), so this stays integral while exact.
    result = (result * (n - i)) / (i + 1);
  }
  return result;
}
