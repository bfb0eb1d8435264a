// ─── Types ────────────────────────────────────────────────────────────────────
export type { NumericValue, Numeric, Coordinates } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  PRECALC_NUMBER,
  DISPLAY_THRESHOLD,
  DISPLAY_HALF,
  FLOAT_RTOL,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { DomainError, OutOfBoundsError, NonAdjacentError } from './errors';

// ─── Numeric ──────────────────────────────────────────────────────────────────
export {
  EXACT,
  FLOAT,
  binomial,
  valuesEqual,
  valuesApproxEqual,
  compareValues,
} from './numeric';

// ─── Movement ─────────────────────────────────────────────────────────────────
export {
  upValue,
  downValue,
  leftValue,
  rightValue,
  upLeftValue,
  downRightValue,
} from './movement';

// ─── Entry ────────────────────────────────────────────────────────────────────
export {
  Entry,
  isAdjacent,
  isSubtractable,
  areAdjacent,
  areSubtractable,
} from './entry';

// ─── Containers ───────────────────────────────────────────────────────────────
export { ZeroRange } from './range';
export { Row, numElements } from './row';
export { Column, LazyColumn } from './column';
export { Centre, LazyCentre, Center, LazyCenter } from './centre';

// ─── Repeated Values ──────────────────────────────────────────────────────────
export { MinHeap } from './heap';
export { findCollisions, confirmCollisions } from './singmaster';
export type { Collision } from './singmaster';
