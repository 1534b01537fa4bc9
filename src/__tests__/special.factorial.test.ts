import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { FactorialTable, binomial, doubleFactorial } from "../core/special/factorial.js";
import { DomainError } from "../core/errors.js";
import { FACTORIAL_MAX } from "../core/constants.js";

function close(a: number, b: number, eps = 1e-12) {
  assert.ok(Math.abs(a - b) <= eps, `Expected ${a} ~ ${b}`);
}

const isDomainError = (fn: string) => (err: unknown) => err instanceof DomainError && err.fn === fn;

describe("FactorialTable", () => {
  it("computes small factorials exactly", () => {
    const table = new FactorialTable();
    assert.equal(table.factorial(0), 1);
    assert.equal(table.factorial(1), 1);
    assert.equal(table.factorial(5), 120);
    assert.equal(table.factorial(20), 2432902008176640000);
  });

  it("satisfies n! = n · (n-1)! across the whole domain", () => {
    const table = new FactorialTable();
    for (let n = 1; n <= FACTORIAL_MAX; n++) {
      assert.equal(table.factorial(n), n * table.factorial(n - 1));
    }
    assert.ok(Number.isFinite(table.factorial(FACTORIAL_MAX)));
  });

  it("fills lazily and never shrinks", () => {
    const table = new FactorialTable();
    assert.equal(table.size, 1);
    table.factorial(10);
    assert.equal(table.size, 11);
    table.factorial(4);
    assert.equal(table.size, 11);
  });

  it("keeps tables independent", () => {
    const a = new FactorialTable();
    const b = new FactorialTable();
    a.factorial(30);
    assert.equal(b.size, 1);
  });

  it("rejects arguments outside 0..170", () => {
    const table = new FactorialTable();
    assert.throws(() => table.factorial(171), isDomainError("factorial"));
    assert.throws(() => table.factorial(-1), isDomainError("factorial"));
    assert.throws(() => table.factorial(2.5), isDomainError("factorial"));
    assert.throws(() => table.factorial(Number.NaN), isDomainError("factorial"));
  });

  it("reports the offending value", () => {
    const table = new FactorialTable();
    assert.throws(
      () => table.factorial(-3),
      (err: unknown) => err instanceof DomainError && err.errors[0] === "n must be >= 0, got -3"
    );
  });
});

describe("gammaHalfInteger", () => {
  const table = new FactorialTable();

  it("gives (k-1)! for even arguments", () => {
    assert.equal(table.gammaHalfInteger(2), 1);
    assert.equal(table.gammaHalfInteger(4), 1);
    assert.equal(table.gammaHalfInteger(6), 2);
    assert.equal(table.gammaHalfInteger(12), 120);
  });

  it("gives half-integer values for odd arguments", () => {
    close(table.gammaHalfInteger(1), Math.sqrt(Math.PI));
    close(table.gammaHalfInteger(3), 0.5 * Math.sqrt(Math.PI));
    close(table.gammaHalfInteger(5), 0.75 * Math.sqrt(Math.PI));
    close(table.gammaHalfInteger(7), 1.875 * Math.sqrt(Math.PI));
  });

  it("satisfies Γ(x + 1) = x Γ(x)", () => {
    for (let n = 1; n <= 60; n++) {
      const ratio = table.gammaHalfInteger(n + 2) / table.gammaHalfInteger(n);
      close(ratio, n / 2, 1e-12 * n);
    }
  });

  it("rejects n < 1", () => {
    assert.throws(() => table.gammaHalfInteger(0), isDomainError("gammaHalfInteger"));
  });
});

describe("doubleFactorial", () => {
  it("handles the base cases", () => {
    assert.equal(doubleFactorial(-1), 1);
    assert.equal(doubleFactorial(0), 1);
    assert.equal(doubleFactorial(1), 1);
  });

  it("multiplies every other integer", () => {
    assert.equal(doubleFactorial(5), 15);
    assert.equal(doubleFactorial(6), 48);
    assert.equal(doubleFactorial(9), 945);
  });

  it("rejects n < -1 and n > 300", () => {
    assert.throws(() => doubleFactorial(-2), isDomainError("doubleFactorial"));
    assert.throws(() => doubleFactorial(301), isDomainError("doubleFactorial"));
  });
});

describe("binomial", () => {
  it("computes small coefficients exactly", () => {
    assert.equal(binomial(5, 2), 10);
    assert.equal(binomial(10, 0), 1);
    assert.equal(binomial(10, 10), 1);
    assert.equal(binomial(52, 5), 2598960);
  });

  it("is symmetric", () => {
    for (let k = 0; k <= 30; k++) {
      assert.equal(binomial(30, k), binomial(30, 30 - k));
    }
  });

  it("follows Pascal's rule", () => {
    for (let n = 1; n <= 40; n++) {
      for (let k = 1; k < n; k++) {
        assert.equal(binomial(n, k), binomial(n - 1, k - 1) + binomial(n - 1, k));
      }
    }
  });

  it("stays finite at the top of the domain", () => {
    assert.ok(Number.isFinite(binomial(1000, 500)));
  });

  it("rejects k outside [0, n]", () => {
    assert.throws(
      () => binomial(5, 6),
      (err: unknown) => err instanceof DomainError && err.errors.includes("k must be <= n, got n=5, k=6")
    );
    assert.throws(() => binomial(5, -1), isDomainError("binomial"));
  });
});
