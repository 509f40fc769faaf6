/**
 * @nstest/assert - assertions reporting into an nstest run
 */
export {
  is,
  isEqual,
  isSubset,
  isThrown,
  isThrownWithMsg,
  tryExpr,
  are,
  check,
} from "./assertions.js";
export type { ErrorClass } from "./assertions.js";
export { findSubsetMismatch, describeMismatch, formatValue } from "./subset.js";
export type { SubsetMismatch, SubsetMismatchKind } from "./subset.js";
export { testing, asyncTest } from "@nstest/core";
