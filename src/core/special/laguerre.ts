import { requireFinite, requireInteger } from "../validate.js";

/**
 * Generalized Laguerre polynomial L_n^α(x) by the three-term recurrence in n:
 *
 *   L_0 = 1,  L_1 = 1 + α - x,
 *   L_{k+1} = ((2k + 1 + α - x)·L_k - (k + α)·L_{k-1}) / (k + 1)
 */
export function generalizedLaguerre(n: number, alpha: number, x: number): number {
  requireInteger("generalizedLaguerre", "n", n, 0);
  requireFinite("generalizedLaguerre", { alpha, x });

  if (n === 0) return 1;

  let prev = 1;
  let curr = 1 + alpha - x;
  for (let k = 1; k < n; k++) {
    const next = ((2 * k + 1 + alpha - x) * curr - (k + alpha) * prev) / (k + 1);
    prev = curr;
    curr = next;
  }
  return curr;
}

/**
 * L_n^α(x) from the explicit series Σ (-1)^k · C(n + α, n - k) · x^k / k!.
 * Slower and less stable than the recurrence; kept as its cross-check.
 */
export function laguerreSeries(n: number, alpha: number, x: number): number {
  requireInteger("laguerreSeries", "n", n, 0);
  requireFinite("laguerreSeries", { alpha, x });

  let result = 0;
  let power = 1; // x^k / k!
  for (let k = 0; k <= n; k++) {
    if (k > 0) power = (power * x) / k;

    // Generalized binomial (n + α choose n - k) = Π_{j < n-k} (n + α - j) / (j + 1)
    let coefficient = 1;
    for (let j = 0; j < n - k; j++) {
      coefficient *= (n + alpha - j) / (j + 1);
    }

    const sign = k % 2 === 0 ? 1 : -1;
    result += sign * coefficient * power;
  }
  return result;
}
