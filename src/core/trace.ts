/**
 * Lightweight tracing for backend resolution, selection and validation.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.error);
 *
 * // Silent:
 * const tracer = noopTracer;
 * ```
 */

import type { FunctionValidation, Implementation, Subsystem, ValidationReport } from "./types.js";

export interface RegistryTraceContext {
  /** Called once per subsystem when a registry is constructed */
  onBackendResolved?(subsystem: Subsystem, implementation: Implementation, libraryAvailable: boolean): void;

  /** Called when `select` switches a subsystem */
  onBackendSelected?(subsystem: Subsystem, previous: Implementation, next: Implementation): void;

  /** Called after each function has been compared */
  onValidationResult?(name: string, result: FunctionValidation): void;

  /** Called when a validation run is complete */
  onValidationComplete?(report: ValidationReport, tolerance: number): void;
}

/**
 * No-op tracer for when tracing is disabled.
 */
export const noopTracer: RegistryTraceContext = {};

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): RegistryTraceContext {
  return {
    onBackendResolved(subsystem, implementation, libraryAvailable) {
      log(
        `[TRACE] ${subsystem}: resolved ${implementation} (library ${libraryAvailable ? "available" : "missing"})`
      );
    },

    onBackendSelected(subsystem, previous, next) {
      log(`[TRACE] ${subsystem}: ${previous} -> ${next}`);
    },

    onValidationResult(name, result) {
      log(
        `[TRACE] ${name} (${result.subsystem}): ${result.passed ? "pass" : "FAIL"} - maxError=${result.maxError.toExponential(2)} over ${result.testsRun} samples`
      );
    },

    onValidationComplete(report, tolerance) {
      const results = Object.values(report);
      const failed = results.filter((r) => !r.passed).length;
      log(
        `[TRACE] Validation complete: ${results.length - failed}/${results.length} passed at tolerance ${tolerance}`
      );
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): {
  tracer: RegistryTraceContext;
  getEvents: () => TraceEvent[];
  clear: () => void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  const tracer: RegistryTraceContext = {
    onBackendResolved(subsystem, implementation, libraryAvailable) {
      addEvent("backend_resolved", { subsystem, implementation, libraryAvailable });
    },

    onBackendSelected(subsystem, previous, next) {
      addEvent("backend_selected", { subsystem, previous, next });
    },

    onValidationResult(name, result) {
      addEvent("validation_result", { name, passed: result.passed, maxError: result.maxError });
    },

    onValidationComplete(report, tolerance) {
      addEvent("validation_complete", { functions: Object.keys(report).length, tolerance });
    }
  };

  return {
    tracer,
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: RegistryTraceContext[]): RegistryTraceContext {
  return {
    onBackendResolved(subsystem, implementation, libraryAvailable) {
      for (const t of tracers) t.onBackendResolved?.(subsystem, implementation, libraryAvailable);
    },
    onBackendSelected(subsystem, previous, next) {
      for (const t of tracers) t.onBackendSelected?.(subsystem, previous, next);
    },
    onValidationResult(name, result) {
      for (const t of tracers) t.onValidationResult?.(name, result);
    },
    onValidationComplete(report, tolerance) {
      for (const t of tracers) t.onValidationComplete?.(report, tolerance);
    }
  };
}
