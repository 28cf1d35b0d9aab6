export {
  Align,
  MAX_ALIGN_POW2,
  Size,
  alignErrorIdent,
  alignErrorValue,
  formatAlignError,
  type AlignFromBytesError,
  type AlignResult,
} from "./align.js";
export {
  checkTargetDataLayout,
  defaultDataLayout,
  loadTargetDataLayout,
  parseDataLayout,
  type AbiAndPrefAlign,
  type CheckedDataLayout,
  type Endian,
  type TargetDataLayout,
  type TargetLayoutFacts,
} from "./data-layout.js";
export {
  fail,
  ok,
  type LayoutResult,
  type TargetDataLayoutError,
  type TargetDataLayoutErrorKind,
} from "./errors.js";
export { ParseIntError, parseUnsigned, type IntErrorKind, type ParseIntResult } from "./parse-int.js";
