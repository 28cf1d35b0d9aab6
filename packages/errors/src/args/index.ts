export {
  bigintArg,
  boolArg,
  cStringArg,
  displayString,
  errorArg,
  intoDiagnosticArg,
  isIntoDiagnosticArg,
  numberArg,
  type Displayable,
  type IntoDiagnosticArg,
  type IntoDiagnosticArgInput,
} from "./into-arg.js";
export { INTEGER_RANGES, Integer, type IntegerWidth } from "./integer.js";
export { Char, escapeChar, unquoteChar } from "./char.js";
export { FilePath } from "./path.js";
export { DiagnosticArgFromDisplay, fromDisplay } from "./display.js";
export { fromRef, type Cloneable } from "./forward.js";
export { Ident } from "./ident.js";
export { DiagnosticSymbolList } from "./symbol-list.js";
export { TargetTriple, type TargetTripleSource } from "./target-triple.js";
export {
  DEF_KIND_LABELS,
  LEVEL_LABELS,
  LINT_LEVEL_FLAGS,
  RES_LABELS,
  closureKindArg,
  constContextArg,
  defKindArg,
  editionArg,
  floatTyArg,
  labelledArg,
  levelArg,
  lintLevelArg,
  panicStrategyArg,
  paramKindOrdArg,
  resArg,
  splitDebuginfoArg,
  stackProtectorArg,
  type ClosureKind,
  type ConstContext,
  type DefKind,
  type Edition,
  type FloatTy,
  type LintLevel,
  type PanicStrategy,
  type ParamKindOrd,
  type Res,
  type SplitDebuginfo,
  type StackProtector,
} from "./enums.js";
