import { createParticleCore, roundVec } from "../core/index.js";
import type { ParticleCore, Vec3 } from "../core/index.js";
import type { RegistryTraceContext } from "../core/trace.js";
import {
  UsageError,
  implementationFlag,
  modelFlag,
  numberFlag,
  optionalNumberFlag
} from "./args.js";

export const USAGE = `Usage: particle-numerics <command> [flags]

Commands:
  status                                   current backend per subsystem
  validate [--tolerance 1e-8]              compare both backends on the fixed battery
  positions --model uniform|shell --count N --seed S [--radius R] [--decimals D] [--out path]
  nucleons --model uniform|shell --protons P --neutrons N --seed S [--radius R] [--decimals D] [--out path]
  orbital --n N --l L [--m M] --r R [--theta T] [--phi P] [--z Z] [--enhanced]
  cloud --n N --l L [--m M] [--z Z] --count C --seed S [--decimals D] [--out path]

Global flags:
  --math library|self-contained
  --vector library|self-contained
  --trace                                  log backend events to stderr`;

export interface CommandResult {
  exitCode: number;
  output: unknown;
}

export function createCore(flags: Record<string, string>, tracer?: RegistryTraceContext): ParticleCore {
  const math = implementationFlag(flags, "math");
  const vector = implementationFlag(flags, "vector");
  return createParticleCore({
    initial: {
      ...(math !== undefined ? { math } : {}),
      ...(vector !== undefined ? { vector } : {})
    },
    tracer
  });
}

export function runCommand(
  command: string | undefined,
  flags: Record<string, string>,
  core: ParticleCore
): CommandResult {
  const { registry, positions, orbitals } = core;
  const decimals = optionalNumberFlag(flags, "decimals");
  const round = (v: Vec3): Vec3 => (decimals === undefined ? v : roundVec(v, decimals));

  switch (command) {
    case "status":
      return {
        exitCode: 0,
        output: {
          math: registry.current("math"),
          vector: registry.current("vector"),
          libraries: {
            math: registry.isAvailable("math", "library"),
            vector: registry.isAvailable("vector", "library")
          }
        }
      };

    case "validate": {
      const report = registry.validate(optionalNumberFlag(flags, "tolerance"));
      const failed = Object.entries(report)
        .filter(([, result]) => !result.passed)
        .map(([name]) => name);
      return { exitCode: failed.length > 0 ? 1 : 0, output: { passed: failed.length === 0, failed, report } };
    }

    case "positions": {
      const points = positions.generatePositions(
        modelFlag(flags),
        numberFlag(flags, "count"),
        numberFlag(flags, "seed"),
        { radius: optionalNumberFlag(flags, "radius") }
      );
      return { exitCode: 0, output: points.map(round) };
    }

    case "nucleons": {
      const nucleons = positions.generateNucleons(
        modelFlag(flags),
        numberFlag(flags, "protons"),
        numberFlag(flags, "neutrons"),
        numberFlag(flags, "seed"),
        { radius: optionalNumberFlag(flags, "radius") }
      );
      return {
        exitCode: 0,
        output: nucleons.map((nucleon) => ({ ...nucleon, position: round(nucleon.position) }))
      };
    }

    case "orbital": {
      const n = numberFlag(flags, "n");
      const l = numberFlag(flags, "l");
      const m = numberFlag(flags, "m", 0);
      const r = numberFlag(flags, "r");
      const theta = numberFlag(flags, "theta", 0);
      const phi = numberFlag(flags, "phi", 0);
      const Z = numberFlag(flags, "z", 1);

      if (flags["enhanced"] === "true") {
        return {
          exitCode: 0,
          output: {
            name: orbitals.orbitalName(n, l, m),
            zEff: orbitals.effectiveNuclearCharge(Z, n, l),
            radial: orbitals.radialWavefunctionEnhanced(n, l, r, Z),
            angular: orbitals.angularWavefunction(l, m, theta, phi),
            probability: orbitals.orbitalProbabilityEnhanced(n, l, m, r, theta, phi, Z),
            radiusAngstrom: orbitals.orbitalRadius(n, l, Z)
          }
        };
      }
      return {
        exitCode: 0,
        output: {
          name: orbitals.orbitalName(n, l, m),
          radial: orbitals.radialWavefunction(n, l, r, Z),
          angular: orbitals.angularWavefunction(l, m, theta, phi),
          probability: orbitals.orbitalProbability(n, l, m, r, theta, phi, Z)
        }
      };
    }

    case "cloud": {
      const cloud = orbitals.sampleCloud(
        numberFlag(flags, "n"),
        numberFlag(flags, "l"),
        numberFlag(flags, "m", 0),
        numberFlag(flags, "z", 1),
        numberFlag(flags, "count"),
        numberFlag(flags, "seed")
      );
      return { exitCode: 0, output: cloud.map((point) => ({ ...point, position: round(point.position) })) };
    }

    default:
      throw new UsageError(command === undefined ? "missing command" : `unknown command "${command}"`);
  }
}
