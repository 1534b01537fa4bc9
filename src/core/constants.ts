/**
 * Centralized numerical and physical constants for particle-numerics.
 *
 * Tolerances are used for domain checks and for comparing the two backends;
 * physical constants feed the position generators and the orbital engine.
 */

/**
 * General purpose epsilon for small numerical comparisons.
 */
export const EPS = 1e-9;

/**
 * How far past ±1 an associated Legendre argument may drift through rounding
 * before it is treated as out of domain. Values inside the slack are clamped.
 */
export const DOMAIN_SLACK = 1e-12;

/**
 * Epsilon for detecting zero-length vectors in normalization and axis-angle input.
 */
export const EPS_VECTOR_NORM = 1e-12;

/**
 * A matrix counts as a rotation when `M·Mᵀ` differs from identity by at most this.
 */
export const EPS_ORTHOGONAL = 1e-9;

/**
 * Default tolerance for `BackendRegistry.validate`.
 */
export const VALIDATION_TOLERANCE = 1e-8;

/**
 * Below this magnitude of the library value, validation compares absolute error.
 */
export const VALIDATION_ABS_FLOOR = 1e-10;

/**
 * Largest n whose factorial is finite in double precision (170! ≈ 7.26e306).
 */
export const FACTORIAL_MAX = 170;

/**
 * Largest degree l accepted by the Legendre functions and spherical harmonics
 * of either backend. Both evaluate factorials up to (l + |m|)!, so 2·85 stays
 * within FACTORIAL_MAX.
 */
export const LEGENDRE_MAX_DEGREE = 85;

/**
 * Largest n accepted by doubleFactorial (300!! ≈ 8.2e307).
 */
export const DOUBLE_FACTORIAL_MAX = 300;

/**
 * Largest n accepted by binomial; C(1000, 500) ≈ 2.7e299 is still finite.
 */
export const BINOMIAL_MAX = 1000;

/**
 * Largest integer n accepted by gammaHalfInteger (Γ(150) ≈ 3.8e260).
 */
export const GAMMA_HALF_INTEGER_MAX = 300;

/**
 * Bohr radius in Angstroms.
 */
export const BOHR_RADIUS_ANGSTROM = 0.529177;

/**
 * Liquid-drop radius parameter r₀ in femtometres: R = r₀·A^(1/3).
 */
export const NUCLEAR_RADIUS_R0_FM = 1.2;

/**
 * Nuclear shell capacities in filling order. Their running sums are the
 * magic numbers 2, 8, 20, 28, 50, 82, 126.
 */
export const SHELL_CAPACITIES: readonly number[] = [2, 6, 12, 8, 22, 32, 44];

/**
 * Half-width of the relative radial jitter applied to shell-model positions.
 */
export const SHELL_JITTER = 0.05;
