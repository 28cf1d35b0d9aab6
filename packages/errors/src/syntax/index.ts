export type {
  AddrOfExpr,
  ArrayExpr,
  BinaryExpr,
  BinaryOperator,
  CallExpr,
  CastExpr,
  Delimiter,
  Expr,
  FieldExpr,
  GenericArg,
  Identifier,
  IndexExpr,
  LitExpr,
  LitKind,
  MethodCallExpr,
  ParenExpr,
  Path,
  PathExpr,
  PathSegment,
  Punct,
  SyntaxFragment,
  Token,
  TokenKind,
  TupleExpr,
  UnaryExpr,
  UnaryOperator,
  Visibility,
  VisibilityKind,
} from "./ast.js";
export {
  exprToString,
  identToString,
  isSyntaxFragment,
  literalToString,
  pathToString,
  syntaxFragmentToString,
  tokenKindToString,
  tokenToString,
  visToString,
} from "./print.js";
export { syntaxArg } from "./args.js";
