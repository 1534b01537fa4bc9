import { BackendRegistry, createDefaultRegistry } from "./backends/registry.js";
import type { BackendRegistryOptions } from "./backends/registry.js";
import { PositionGenerator } from "./positions/generate.js";
import { OrbitalEngine } from "./orbital/engine.js";

export { BackendRegistry, createDefaultRegistry } from "./backends/registry.js";
export type { BackendRegistryOptions, LibraryBackends } from "./backends/registry.js";
export type {
  SpecialFunctionBackend,
  SpecialFunctionName,
  VectorBackend,
  VectorFunctionName
} from "./backends/types.js";
export { SPECIAL_FUNCTION_NAMES, VECTOR_FUNCTION_NAMES } from "./backends/types.js";
export { mathjsSpecialFunctions } from "./backends/mathjsBackend.js";
export { threeVectors } from "./backends/threeBackend.js";
export { componentError, compareSamples } from "./backends/battery.js";

export * from "./special/index.js";
export { selfContainedVectors } from "./math/index.js";
export {
  add,
  subtract,
  scale,
  dot,
  cross,
  length,
  normalize,
  fromSpherical,
  roundScalar,
  roundVec
} from "./math/vec.js";
export {
  applyMatrix,
  identityMatrix,
  isRotationMatrix,
  multiplyMatrices,
  rotationAxisAngle,
  rotationEuler,
  rotationX,
  rotationY,
  rotationZ,
  transpose
} from "./math/rotation.js";

export { PositionGenerator, nuclearRadius, occupiedShells, shellIndex } from "./positions/generate.js";
export type { PositionOptions } from "./positions/generate.js";
export { createSeededRandom, uniform } from "./positions/random.js";
export type { RandomSource } from "./positions/random.js";

export { OrbitalEngine, availableOrbitals, orbitalName } from "./orbital/engine.js";
export type { OrbitalBackends } from "./orbital/engine.js";
export { effectiveNuclearCharge, slaterEffectiveCharge } from "./orbital/zeff.js";
export { cloudRadius, sampleCloud } from "./orbital/cloud.js";
export type { CloudRequest, CloudSource } from "./orbital/cloud.js";

export { DomainError, ParticleNumericsError, UnavailableBackendError } from "./errors.js";
export { createCollectorTracer, createTracer, mergeTracers, noopTracer } from "./trace.js";
export type { RegistryTraceContext, TraceEvent } from "./trace.js";
export * from "./constants.js";

export type {
  CloudPoint,
  Complex,
  FunctionValidation,
  Implementation,
  Mat3,
  Nucleon,
  OrbitalDescriptor,
  PositionModel,
  PositionSet,
  QuantumNumbers,
  Subsystem,
  ValidationReport,
  Vec3
} from "./types.js";

export interface ParticleCore {
  registry: BackendRegistry;
  positions: PositionGenerator;
  orbitals: OrbitalEngine;
}

/**
 * A registry with both library backends installed, plus a position generator
 * and an orbital engine bound to it.
 */
export function createParticleCore(options: Omit<BackendRegistryOptions, "libraries"> = {}): ParticleCore {
  const registry = createDefaultRegistry(options);
  return {
    registry,
    positions: new PositionGenerator(registry),
    orbitals: new OrbitalEngine(registry)
  };
}
