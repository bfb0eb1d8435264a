/**
 * pascals-triangle — tunables
 *
 * Every magic number the containers depend on lives here.
 */

// ─── Lazy Containers ──────────────────────────────────────────────────────────

/**
 * Neighbourhood radius for LazyColumn and LazyCentre.
 *
 * On a cache miss the requested value is computed from the binomial formula,
 * then up to PRECALC_NUMBER values above and below it are filled in by
 * movement. A movement step costs one multiply and one divide; a fresh
 * binomial costs O(k) big-integer multiplications.
 */
export const PRECALC_NUMBER = 5;

// ─── Display ──────────────────────────────────────────────────────────────────

/** Rows with at least this many values are abbreviated by Row.toString(). */
export const DISPLAY_THRESHOLD = 10;

/** Values shown at each end of an abbreviated row. */
export const DISPLAY_HALF = 4;

// ─── Floating Point ───────────────────────────────────────────────────────────

/**
 * Relative tolerance for approximate value equality: |a - b| ≤ rtol·max(|a|, |b|).
 * √ε keeps about half the significand, the usual default for isapprox-style checks.
 */
export const FLOAT_RTOL = Math.sqrt(Number.EPSILON);
