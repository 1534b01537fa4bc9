import type {
  Implementation,
  Mat3,
  Subsystem,
  ValidationReport,
  Vec3
} from "../types.js";
import type { SpecialFunctionBackend, VectorBackend } from "./types.js";
import { SPECIAL_FUNCTION_NAMES, VECTOR_FUNCTION_NAMES } from "./types.js";
import type { RegistryTraceContext } from "../trace.js";
import { noopTracer } from "../trace.js";
import { DomainError, UnavailableBackendError } from "../errors.js";
import { VALIDATION_TOLERANCE } from "../constants.js";
import { requireFinite, requireMat3, requireVec3 } from "../validate.js";
import { SelfContainedSpecialFunctions } from "../special/index.js";
import { selfContainedVectors } from "../math/index.js";
import { SPECIAL_FUNCTION_BATTERY, VECTOR_BATTERY, compareSamples } from "./battery.js";
import { mathjsSpecialFunctions } from "./mathjsBackend.js";
import { threeVectors } from "./threeBackend.js";

export interface LibraryBackends {
  math?: SpecialFunctionBackend;
  vector?: VectorBackend;
}

export interface BackendRegistryOptions {
  /** Library implementations present in this environment. Absent ones are simply unavailable. */
  libraries?: LibraryBackends;
  /** Starting selection per subsystem; defaults to the library when present. */
  initial?: Partial<Record<Subsystem, Implementation>>;
  tracer?: RegistryTraceContext;
}

const SUBSYSTEMS: readonly Subsystem[] = ["math", "vector"];

/**
 * Per-subsystem switch between the self-contained and the library
 * implementation.
 *
 * `math` and `vector` are facades: every call looks up the current selection,
 * so a `select` takes effect on the next call. Nothing here is global; each
 * registry owns its selection and its own factorial table.
 */
export class BackendRegistry {
  readonly math: SpecialFunctionBackend;
  readonly vector: VectorBackend;

  private readonly libraries: LibraryBackends;
  private readonly selfContainedMath = new SelfContainedSpecialFunctions();
  private readonly selection: Record<Subsystem, Implementation>;
  private readonly tracer: RegistryTraceContext;

  constructor(options: BackendRegistryOptions = {}) {
    this.libraries = { ...options.libraries };
    this.tracer = options.tracer ?? noopTracer;

    const resolve = (subsystem: Subsystem): Implementation => {
      const requested = options.initial?.[subsystem];
      if (requested !== undefined) {
        if (!this.isAvailable(subsystem, requested)) {
          throw new UnavailableBackendError(subsystem, requested);
        }
        return requested;
      }
      return this.isAvailable(subsystem, "library") ? "library" : "self-contained";
    };
    this.selection = { math: resolve("math"), vector: resolve("vector") };

    for (const subsystem of SUBSYSTEMS) {
      this.tracer.onBackendResolved?.(
        subsystem,
        this.selection[subsystem],
        this.isAvailable(subsystem, "library")
      );
    }

    this.math = this.createMathFacade();
    this.vector = this.createVectorFacade();
  }

  isAvailable(subsystem: Subsystem, implementation: Implementation): boolean {
    if (implementation === "self-contained") return true;
    return subsystem === "math" ? this.libraries.math !== undefined : this.libraries.vector !== undefined;
  }

  current(subsystem: Subsystem): Implementation {
    return this.selection[subsystem];
  }

  /**
   * Switch one subsystem. Requesting an absent library throws and leaves the
   * selection unchanged.
   */
  select(subsystem: Subsystem, implementation: Implementation): void {
    if (!this.isAvailable(subsystem, implementation)) {
      throw new UnavailableBackendError(subsystem, implementation);
    }
    const previous = this.selection[subsystem];
    this.selection[subsystem] = implementation;
    if (previous !== implementation) {
      this.tracer.onBackendSelected?.(subsystem, previous, implementation);
    }
  }

  /**
   * Evaluate every function of both subsystems on a fixed battery with both
   * implementations and report the largest deviation per function.
   * The selection is not touched.
   */
  validate(tolerance: number = VALIDATION_TOLERANCE): ValidationReport {
    requireFinite("validate", { tolerance });
    if (tolerance < 0) {
      throw new DomainError("validate", [`tolerance must be >= 0, got ${tolerance}`]);
    }
    const mathLibrary = this.libraries.math;
    if (!mathLibrary) throw new UnavailableBackendError("math", "library");
    const vectorLibrary = this.libraries.vector;
    if (!vectorLibrary) throw new UnavailableBackendError("vector", "library");

    const report: ValidationReport = {};

    for (const name of SPECIAL_FUNCTION_NAMES) {
      const sampler = SPECIAL_FUNCTION_BATTERY[name];
      report[name] = compareSamples("math", sampler(mathLibrary), sampler(this.selfContainedMath), tolerance);
      this.tracer.onValidationResult?.(name, report[name]);
    }

    for (const name of VECTOR_FUNCTION_NAMES) {
      const sampler = VECTOR_BATTERY[name];
      report[name] = compareSamples("vector", sampler(vectorLibrary), sampler(selfContainedVectors), tolerance);
      this.tracer.onValidationResult?.(name, report[name]);
    }

    this.tracer.onValidationComplete?.(report, tolerance);
    return report;
  }

  private activeMath(): SpecialFunctionBackend {
    const library = this.libraries.math;
    return this.selection.math === "library" && library ? library : this.selfContainedMath;
  }

  private activeVector(): VectorBackend {
    const library = this.libraries.vector;
    return this.selection.vector === "library" && library ? library : selfContainedVectors;
  }

  private createMathFacade(): SpecialFunctionBackend {
    const active = () => this.activeMath();
    return {
      get implementation() {
        return active().implementation;
      },
      factorial: (n) => active().factorial(n),
      doubleFactorial: (n) => active().doubleFactorial(n),
      binomial: (n, k) => active().binomial(n, k),
      gammaHalfInteger: (n) => active().gammaHalfInteger(n),
      generalizedLaguerre: (n, alpha, x) => active().generalizedLaguerre(n, alpha, x),
      associatedLegendre: (m, l, x) => active().associatedLegendre(m, l, x),
      sphericalHarmonicComplex: (l, m, theta, phi) => active().sphericalHarmonicComplex(l, m, theta, phi),
      sphericalHarmonicReal: (l, m, theta, phi) => active().sphericalHarmonicReal(l, m, theta, phi)
    };
  }

  private createVectorFacade(): VectorBackend {
    const active = () => this.activeVector();
    const vec = (fn: string, values: Record<string, Vec3>) => {
      for (const [name, value] of Object.entries(values)) requireVec3(fn, name, value);
    };
    const mat = (fn: string, values: Record<string, Mat3>) => {
      for (const [name, value] of Object.entries(values)) requireMat3(fn, name, value);
    };

    return {
      get implementation() {
        return active().implementation;
      },
      add(a, b) {
        vec("add", { a, b });
        return active().add(a, b);
      },
      subtract(a, b) {
        vec("subtract", { a, b });
        return active().subtract(a, b);
      },
      scale(v, s) {
        vec("scale", { v });
        requireFinite("scale", { s });
        return active().scale(v, s);
      },
      dot(a, b) {
        vec("dot", { a, b });
        return active().dot(a, b);
      },
      cross(a, b) {
        vec("cross", { a, b });
        return active().cross(a, b);
      },
      length(v) {
        vec("length", { v });
        return active().length(v);
      },
      normalize(v) {
        vec("normalize", { v });
        return active().normalize(v);
      },
      fromSpherical: (r, theta, phi) => active().fromSpherical(r, theta, phi),
      rotationX: (angle) => active().rotationX(angle),
      rotationY: (angle) => active().rotationY(angle),
      rotationZ: (angle) => active().rotationZ(angle),
      rotationAxisAngle(axis, angle) {
        vec("rotationAxisAngle", { axis });
        return active().rotationAxisAngle(axis, angle);
      },
      rotationEuler: (roll, pitch, yaw) => active().rotationEuler(roll, pitch, yaw),
      multiplyMatrices(a, b) {
        mat("multiplyMatrices", { a, b });
        return active().multiplyMatrices(a, b);
      },
      applyMatrix(m, v) {
        mat("applyMatrix", { m });
        vec("applyMatrix", { v });
        return active().applyMatrix(m, v);
      }
    };
  }
}

/**
 * Registry with the mathjs special functions and the three vector math
 * installed as library backends.
 */
export function createDefaultRegistry(options: Omit<BackendRegistryOptions, "libraries"> = {}): BackendRegistry {
  return new BackendRegistry({
    ...options,
    libraries: { math: mathjsSpecialFunctions, vector: threeVectors }
  });
}
