import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  PositionGenerator,
  nuclearRadius,
  occupiedShells,
  shellIndex
} from "../core/positions/generate.js";
import { createSeededRandom, shuffleInPlace, uniform } from "../core/positions/random.js";
import { BackendRegistry, createDefaultRegistry } from "../core/backends/registry.js";
import { fromSpherical, length } from "../core/math/vec.js";
import { DomainError } from "../core/errors.js";

const generator = new PositionGenerator(createDefaultRegistry());

describe("createSeededRandom", () => {
  it("repeats its stream for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    for (let i = 0; i < 20; i++) assert.equal(a(), b());
  });

  it("returns values in [0, 1)", () => {
    const rng = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const x = rng();
      assert.ok(x >= 0 && x < 1);
    }
  });

  it("reduces the seed to 32 bits", () => {
    assert.equal(createSeededRandom(-1)(), createSeededRandom(4294967295)());
  });

  it("keeps its 32-bit state past millions of draws", () => {
    // the state after k draws is seed + k·0x6d2b79f5 mod 2^32
    const seed = 99;
    const draws = 6_000_000;
    const rng = createSeededRandom(seed);
    for (let i = 0; i < draws; i++) rng();
    const skipped = Number((BigInt(seed) + BigInt(draws) * 0x6d2b79f5n) % 0x100000000n);
    const fresh = createSeededRandom(skipped);
    for (let i = 0; i < 5; i++) assert.equal(rng(), fresh());
  });

  it("maps uniform draws onto [lo, hi)", () => {
    const reference = createSeededRandom(3);
    const rng = createSeededRandom(3);
    assert.equal(uniform(rng, -1, 1), -1 + 2 * reference());
  });

  it("shuffles with one draw per position after the first", () => {
    const items = [1, 2, 3, 4, 5];
    const rng = createSeededRandom(11);
    shuffleInPlace(items, rng);
    assert.deepEqual([...items].sort(), [1, 2, 3, 4, 5]);

    const replay = createSeededRandom(11);
    for (let i = 0; i < 4; i++) replay();
    assert.equal(rng(), replay());
  });
});

describe("shell layout", () => {
  it("fills shells in magic-number order", () => {
    assert.equal(shellIndex(0), 0);
    assert.equal(shellIndex(1), 0);
    assert.equal(shellIndex(2), 1);
    assert.equal(shellIndex(7), 1);
    assert.equal(shellIndex(8), 2);
    assert.equal(shellIndex(19), 2);
    assert.equal(shellIndex(20), 3);
    assert.equal(shellIndex(27), 3);
    assert.equal(shellIndex(28), 4);
    assert.equal(shellIndex(125), 6);
  });

  it("puts overflow past 126 into the last shell", () => {
    assert.equal(shellIndex(126), 6);
    assert.equal(shellIndex(500), 6);
    assert.equal(occupiedShells(300), 7);
  });

  it("counts occupied shells", () => {
    assert.equal(occupiedShells(0), 0);
    assert.equal(occupiedShells(2), 1);
    assert.equal(occupiedShells(3), 2);
    assert.equal(occupiedShells(8), 2);
    assert.equal(occupiedShells(9), 3);
  });

  it("scales the nuclear radius with A^(1/3)", () => {
    assert.equal(nuclearRadius(8), 2.4);
    assert.equal(nuclearRadius(1), 1.2);
  });
});

describe("PositionGenerator.generatePositions", () => {
  it("is deterministic for the shell model with count 8 and seed 42", () => {
    const first = generator.generatePositions("shell", 8, 42);
    const second = generator.generatePositions("shell", 8, 42);
    assert.equal(first.length, 8);
    assert.deepEqual(first, second);
  });

  it("differs between seeds", () => {
    const a = generator.generatePositions("uniform", 10, 1);
    const b = generator.generatePositions("uniform", 10, 2);
    assert.notDeepEqual(a, b);
  });

  it("does not depend on the vector backend", () => {
    const library = createDefaultRegistry();
    const selfContained = new BackendRegistry();
    for (const model of ["uniform", "shell"] as const) {
      assert.deepEqual(
        new PositionGenerator(library).generatePositions(model, 30, 99),
        new PositionGenerator(selfContained).generatePositions(model, 30, 99)
      );
    }
  });

  it("draws radius, cos θ and φ in that order", () => {
    const rng = createSeededRandom(7);
    const radius = nuclearRadius(1) * Math.cbrt(rng());
    const cosTheta = uniform(rng, -1, 1);
    const phi = uniform(rng, 0, 2 * Math.PI);
    assert.deepEqual(generator.generatePositions("uniform", 1, 7), [
      fromSpherical(radius, Math.acos(cosTheta), phi)
    ]);
  });

  it("keeps uniform points inside the nuclear radius", () => {
    const radius = nuclearRadius(200);
    for (const p of generator.generatePositions("uniform", 200, 5)) {
      assert.ok(length(p) <= radius + 1e-12);
    }
  });

  it("places shell points within the jitter band of their shell", () => {
    // 8 nucleons: two shells at R/2 and R, R = 2.4
    const points = generator.generatePositions("shell", 8, 42);
    points.forEach((p, i) => {
      const shellRadius = i < 2 ? 1.2 : 2.4;
      const r = length(p);
      assert.ok(r >= shellRadius * 0.95 - 1e-9 && r <= shellRadius * 1.05 + 1e-9, `point ${i} at r=${r}`);
    });
  });

  it("honours an explicit radius", () => {
    for (const p of generator.generatePositions("uniform", 50, 8, { radius: 0.5 })) {
      assert.ok(length(p) <= 0.5 + 1e-12);
    }
  });

  it("returns an empty set for count 0", () => {
    assert.deepEqual(generator.generatePositions("shell", 0, 1), []);
  });

  it("rejects invalid counts, seeds and radii", () => {
    assert.throws(() => generator.generatePositions("uniform", -1, 1), DomainError);
    assert.throws(() => generator.generatePositions("uniform", 2.5, 1), DomainError);
    assert.throws(() => generator.generatePositions("uniform", 3, 1.5), DomainError);
    assert.throws(
      () => generator.generatePositions("uniform", 3, 1, { radius: 0 }),
      (err: unknown) => err instanceof DomainError && err.errors.includes("radius must be > 0, got 0")
    );
  });
});

describe("PositionGenerator.generateNucleons", () => {
  it("tags the requested number of protons", () => {
    const nucleons = generator.generateNucleons("uniform", 6, 8, 12);
    assert.equal(nucleons.length, 14);
    assert.equal(nucleons.filter((n) => n.isProton).length, 6);
  });

  it("is deterministic per seed", () => {
    assert.deepEqual(generator.generateNucleons("shell", 8, 8, 3), generator.generateNucleons("shell", 8, 8, 3));
  });

  it("fills shells per species", () => {
    // two of each: every nucleon sits in the first (and only) shell, R = 1.2 · 4^(1/3)
    const radius = nuclearRadius(4);
    for (const { position } of generator.generateNucleons("shell", 2, 2, 21)) {
      const r = length(position);
      assert.ok(r >= radius * 0.95 - 1e-9 && r <= radius * 1.05 + 1e-9);
    }
  });

  it("shuffles tags before placing positions", () => {
    const total = 10;
    const rng = createSeededRandom(5);
    const expectedTags = shuffleInPlace(
      Array.from({ length: total }, (_, i) => i < 4),
      rng
    );
    const tags = generator.generateNucleons("uniform", 4, 6, 5).map((n) => n.isProton);
    assert.deepEqual(tags, expectedTags);
  });

  it("returns nothing for an empty nucleus", () => {
    assert.deepEqual(generator.generateNucleons("uniform", 0, 0, 1), []);
  });

  it("rejects negative species counts", () => {
    assert.throws(() => generator.generateNucleons("shell", -1, 2, 1), DomainError);
  });
});
