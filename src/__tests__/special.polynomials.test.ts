import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { generalizedLaguerre, laguerreSeries } from "../core/special/laguerre.js";
import { associatedLegendre, legendreSeries } from "../core/special/legendre.js";
import { DomainError } from "../core/errors.js";
import { LEGENDRE_MAX_DEGREE } from "../core/constants.js";

function close(a: number, b: number, eps = 1e-12) {
  assert.ok(Math.abs(a - b) <= eps, `Expected ${a} ~ ${b}`);
}

describe("generalizedLaguerre", () => {
  it("starts the recurrence at L_0 = 1 and L_1 = 1 + α - x", () => {
    assert.equal(generalizedLaguerre(0, 3, 7), 1);
    assert.equal(generalizedLaguerre(1, 2, 0.5), 2.5);
  });

  it("matches the closed form of L_2^0", () => {
    for (const x of [0, 0.5, 1, 3, 6]) {
      close(generalizedLaguerre(2, 0, x), (x * x - 4 * x + 2) / 2);
    }
  });

  it("matches the closed form of L_2^1", () => {
    for (const x of [0, 1, 2.5, 4]) {
      close(generalizedLaguerre(2, 1, x), (x * x - 6 * x + 6) / 2);
    }
  });

  it("agrees with the explicit series for n <= 10, |α| <= 5, 0 <= x <= 8", () => {
    for (let n = 0; n <= 10; n++) {
      for (const alpha of [-5, -2.5, 0, 1.5, 5]) {
        for (const x of [0, 1, 2.5, 4, 8]) {
          close(generalizedLaguerre(n, alpha, x), laguerreSeries(n, alpha, x), 1e-10);
        }
      }
    }
  });

  it("equals C(n + α, n) at x = 0", () => {
    // C(5, 3) = 10
    close(generalizedLaguerre(3, 2, 0), 10);
  });

  it("rejects a negative or fractional degree", () => {
    assert.throws(() => generalizedLaguerre(-1, 0, 1), DomainError);
    assert.throws(() => generalizedLaguerre(1.5, 0, 1), DomainError);
    assert.throws(() => generalizedLaguerre(2, 0, Number.POSITIVE_INFINITY), DomainError);
  });
});

describe("associatedLegendre", () => {
  it("evaluates P_2(0.5) = -0.125", () => {
    assert.equal(associatedLegendre(0, 2, 0.5), -0.125);
  });

  it("includes the Condon–Shortley phase", () => {
    // P_1^1(x) = -sqrt(1 - x²)
    close(associatedLegendre(1, 1, 0.6), -0.8);
    // P_2^2(x) = 3(1 - x²)
    close(associatedLegendre(2, 2, 0.5), 2.25);
    // P_3^1(x) = -3/2 (5x² - 1) sqrt(1 - x²)
    const x = 0.3;
    close(associatedLegendre(1, 3, x), -1.5 * (5 * x * x - 1) * Math.sqrt(1 - x * x));
  });

  it("relates negative orders by (-1)^m (l-m)!/(l+m)!", () => {
    for (const x of [-0.8, -0.1, 0.35, 0.9]) {
      close(associatedLegendre(-1, 2, x), -associatedLegendre(1, 2, x) / 6);
      close(associatedLegendre(-2, 3, x), associatedLegendre(2, 3, x) / 120);
    }
  });

  it("agrees with the explicit Legendre series for m = 0", () => {
    for (let l = 0; l <= 12; l++) {
      for (const x of [-1, -0.9, -0.5, -0.1, 0, 0.3, 0.5, 0.77, 1]) {
        close(associatedLegendre(0, l, x), legendreSeries(l, x), 1e-12);
      }
    }
  });

  it("is exactly ±1 at the end points for m = 0", () => {
    for (let l = 0; l <= 10; l++) {
      assert.equal(associatedLegendre(0, l, 1), 1);
      assert.equal(associatedLegendre(0, l, -1), l % 2 === 0 ? 1 : -1);
    }
  });

  it("stays finite at x = ±1 for every order", () => {
    for (let l = 0; l <= 10; l++) {
      for (let m = -l; m <= l; m++) {
        assert.ok(Number.isFinite(associatedLegendre(m, l, 1)));
        assert.ok(Number.isFinite(associatedLegendre(m, l, -1)));
      }
    }
  });

  it("stays finite up to the largest supported degree", () => {
    for (const l of [40, 60, LEGENDRE_MAX_DEGREE]) {
      for (let m = -l; m <= l; m++) {
        for (const x of [-1, -0.5, 0, 0.3, 0.999, 1]) {
          assert.ok(Number.isFinite(associatedLegendre(m, l, x)), `P_${l}^${m}(${x})`);
        }
      }
    }
  });

  it("keeps |P_l(x)| <= 1 at high degree", () => {
    for (let l = 0; l <= LEGENDRE_MAX_DEGREE; l++) {
      for (const x of [-0.77, -0.2, 0.05, 0.5, 0.93]) {
        assert.ok(Math.abs(associatedLegendre(0, l, x)) <= 1, `P_${l}(${x})`);
      }
    }
    close(associatedLegendre(0, 60, 0.9), 0.0317895924173876, 1e-12);
  });

  it("rejects degrees above LEGENDRE_MAX_DEGREE", () => {
    assert.throws(
      () => associatedLegendre(0, LEGENDRE_MAX_DEGREE + 1, 0.5),
      (err: unknown) => err instanceof DomainError && err.errors.includes("l must be <= 85, got 86")
    );
    assert.throws(() => associatedLegendre(200, 200, 0.5), DomainError);
    assert.throws(() => associatedLegendre(-170, 180, 0.3), DomainError);
  });

  it("clamps arguments that overshoot ±1 by rounding", () => {
    assert.equal(associatedLegendre(0, 3, 1 + 1e-13), associatedLegendre(0, 3, 1));
    assert.equal(associatedLegendre(0, 3, -1 - 1e-13), associatedLegendre(0, 3, -1));
  });

  it("rejects |x| > 1", () => {
    assert.throws(
      () => associatedLegendre(0, 2, 1.001),
      (err: unknown) => err instanceof DomainError && err.errors.includes("|x| must be <= 1, got 1.001")
    );
  });

  it("rejects |m| > l and negative l", () => {
    assert.throws(
      () => associatedLegendre(3, 2, 0),
      (err: unknown) => err instanceof DomainError && err.errors.includes("|m| must be <= l, got l=2, m=3")
    );
    assert.throws(() => associatedLegendre(0, -1, 0), DomainError);
  });
});
