export type { IntoDiagnostic } from "./types.js";
export { TargetDataLayoutErrors, intoDiagnostic, targetDataLayoutDiagnostic } from "./target-data-layout.js";
