// src/core/transform/index.ts
// AST transformer: S-expressions → TypeScript compiler API nodes

export { transform, transformProgram, lowerExpr, lowerSequence, type ProgramOptions, type Definition } from "./transform";
export { Env, NameSupply } from "./env";
export { mangle, HOST_RESERVED } from "./mangle";
export { SPECIAL_FORMS, isSpecialForm, type SpecialForm } from "./forms";
