/**
 * Domain-specific error types for particle-numerics.
 *
 * These errors say which function rejected its input or which backend was
 * missing, so callers can correct the input or fall back.
 */

import type { Implementation, Subsystem } from "./types.js";

/**
 * Base error class for all particle-numerics errors.
 */
export class ParticleNumericsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParticleNumericsError";
  }
}

/**
 * Error thrown when an argument lies outside a function's mathematical domain.
 * Contains every problem found for the call.
 */
export class DomainError extends ParticleNumericsError {
  readonly fn: string;
  readonly errors: string[];

  constructor(fn: string, errors: string[]) {
    super(`${fn}: ${errors.join("; ")}`);
    this.name = "DomainError";
    this.fn = fn;
    this.errors = errors;
  }
}

/**
 * Error thrown when a backend is requested that the environment does not provide.
 */
export class UnavailableBackendError extends ParticleNumericsError {
  readonly subsystem: Subsystem;
  readonly implementation: Implementation;

  constructor(subsystem: Subsystem, implementation: Implementation) {
    super(`The ${implementation} backend for "${subsystem}" is not available`);
    this.name = "UnavailableBackendError";
    this.subsystem = subsystem;
    this.implementation = implementation;
  }
}
