// src/core/transform/host.ts
// Thin helpers over ts.factory for the node shapes the transformer emits.

import ts from "typescript";
import { HOST_RESERVED } from "./mangle";

const f = ts.factory;

export const ident = (name: string): ts.Identifier => f.createIdentifier(name);

export function numLit(value: number): ts.Expression {
  return value < 0 || Object.is(value, -0)
    ? f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, f.createNumericLiteral(-value))
    : f.createNumericLiteral(value);
}

export const strLit = (value: string): ts.Expression => f.createStringLiteral(value);
export const boolLit = (value: boolean): ts.Expression => (value ? f.createTrue() : f.createFalse());
export const nullLit = (): ts.Expression => f.createNull();

export const prop = (target: ts.Expression, name: string): ts.Expression =>
  f.createPropertyAccessExpression(target, name);

export const index = (target: ts.Expression, i: number): ts.Expression =>
  f.createElementAccessExpression(target, i);

export const call = (callee: ts.Expression, args: readonly ts.Expression[] = []): ts.Expression =>
  f.createCallExpression(callee, undefined, args);

export const method = (target: ts.Expression, name: string, args: readonly ts.Expression[] = []): ts.Expression =>
  call(prop(target, name), args);

/** `$rt.name(args)` */
export const rt = (name: string, args: readonly ts.Expression[] = []): ts.Expression =>
  method(ident(HOST_RESERVED.runtime), name, args);

/** `Symbol.for("name")`: interned tag for keywords and quoted atoms. */
export const symbolFor = (name: string): ts.Expression => method(ident("Symbol"), "for", [strLit(name)]);

export const arrayLit = (elements: readonly ts.Expression[]): ts.Expression =>
  f.createArrayLiteralExpression([...elements], false);

export const spread = (e: ts.Expression): ts.Expression => f.createSpreadElement(e);

/** `Object.freeze([...])`: runtime shape of a tuple. */
export const frozen = (elements: readonly ts.Expression[]): ts.Expression =>
  method(ident("Object"), "freeze", [arrayLit(elements)]);

export type BinaryOp =
  | ts.SyntaxKind.PlusToken
  | ts.SyntaxKind.MinusToken
  | ts.SyntaxKind.AsteriskToken
  | ts.SyntaxKind.SlashToken
  | ts.SyntaxKind.PercentToken
  | ts.SyntaxKind.LessThanToken
  | ts.SyntaxKind.GreaterThanToken
  | ts.SyntaxKind.LessThanEqualsToken
  | ts.SyntaxKind.GreaterThanEqualsToken
  | ts.SyntaxKind.EqualsEqualsToken
  | ts.SyntaxKind.EqualsEqualsEqualsToken
  | ts.SyntaxKind.AmpersandAmpersandToken
  | ts.SyntaxKind.BarBarToken;

export const binary = (left: ts.Expression, op: BinaryOp, right: ts.Expression): ts.Expression =>
  f.createBinaryExpression(left, op, right);

export const not = (e: ts.Expression): ts.Expression =>
  f.createPrefixUnaryExpression(ts.SyntaxKind.ExclamationToken, e);

export const negate = (e: ts.Expression): ts.Expression =>
  f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, e);

export const strictEq = (a: ts.Expression, b: ts.Expression): ts.Expression =>
  binary(a, ts.SyntaxKind.EqualsEqualsEqualsToken, b);

/** Conjunction of tests; the empty conjunction is `true`. */
export function allOf(tests: readonly ts.Expression[]): ts.Expression {
  if (tests.length === 0) return f.createTrue();
  return tests.reduce((acc, t) => binary(acc, ts.SyntaxKind.AmpersandAmpersandToken, t));
}

export const conditional = (test: ts.Expression, then: ts.Expression, otherwise: ts.Expression): ts.Expression =>
  f.createConditionalExpression(
    test,
    f.createToken(ts.SyntaxKind.QuestionToken),
    then,
    f.createToken(ts.SyntaxKind.ColonToken),
    otherwise
  );

export const typeOfIs = (e: ts.Expression, type: string): ts.Expression =>
  strictEq(f.createTypeOfExpression(e), strLit(type));

// ── statements ──────────────────────────────────────────────

export const ret = (e: ts.Expression): ts.Statement => f.createReturnStatement(e);

export const exprStmt = (e: ts.Expression): ts.Statement => f.createExpressionStatement(e);

export const constDecl = (name: string, init: ts.Expression): ts.Statement =>
  f.createVariableStatement(
    undefined,
    f.createVariableDeclarationList([f.createVariableDeclaration(name, undefined, undefined, init)], ts.NodeFlags.Const)
  );

export const block = (statements: readonly ts.Statement[]): ts.Block => f.createBlock([...statements], true);

export const ifStmt = (test: ts.Expression, then: readonly ts.Statement[]): ts.Statement =>
  f.createIfStatement(test, block(then));

export const tryCatch = (body: readonly ts.Statement[], errName: string, handler: readonly ts.Statement[]): ts.Statement =>
  f.createTryStatement(
    block(body),
    f.createCatchClause(f.createVariableDeclaration(errName), block(handler)),
    undefined
  );

// ── functions ───────────────────────────────────────────────

export const param = (name: string): ts.ParameterDeclaration =>
  f.createParameterDeclaration(undefined, undefined, name);

export const restParam = (name: string): ts.ParameterDeclaration =>
  f.createParameterDeclaration(undefined, f.createToken(ts.SyntaxKind.DotDotDotToken), name);

export const functionDecl = (name: string, params: readonly ts.ParameterDeclaration[], body: readonly ts.Statement[]): ts.FunctionDeclaration =>
  f.createFunctionDeclaration(undefined, undefined, name, undefined, [...params], undefined, block(body));

export const functionExpr = (name: string | undefined, params: readonly ts.ParameterDeclaration[], body: readonly ts.Statement[]): ts.Expression =>
  f.createFunctionExpression(undefined, undefined, name, undefined, [...params], undefined, block(body));

/** Arrow function; a lone `return e` body collapses to the concise form. */
export function arrow(params: readonly ts.ParameterDeclaration[], body: readonly ts.Statement[]): ts.Expression {
  const only = body.length === 1 ? body[0] : undefined;
  const concise = only && ts.isReturnStatement(only) && only.expression ? only.expression : undefined;
  return f.createArrowFunction(
    undefined,
    undefined,
    [...params],
    undefined,
    f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    concise ? parenthesizeObjectBody(concise) : block(body)
  );
}

function parenthesizeObjectBody(e: ts.Expression): ts.ConciseBody {
  return ts.isObjectLiteralExpression(e) ? f.createParenthesizedExpression(e) : e;
}

/** `(() => { ...body })()`, or the bare expression when the body is a lone return. */
export function iife(body: readonly ts.Statement[]): ts.Expression {
  const only = body.length === 1 ? body[0] : undefined;
  if (only && ts.isReturnStatement(only) && only.expression) return only.expression;
  return call(f.createParenthesizedExpression(arrow([], body)));
}

export const objectLit = (entries: readonly (readonly [key: string, value: ts.Expression])[]): ts.Expression =>
  f.createObjectLiteralExpression(
    entries.map(([key, value]) =>
      ts.isIdentifier(value) && value.text === key
        ? f.createShorthandPropertyAssignment(key)
        : f.createPropertyAssignment(f.createStringLiteral(key), value)
    ),
    false
  );
