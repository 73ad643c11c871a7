// src/index.ts
//
// Public surface of the Kaleidoscope front end.

export * from "./core/ast";
export * from "./core/cursor";
export * from "./core/lexer";
export * from "./core/token-stream";
export * from "./core/parser";
export * from "./core/walk";
export * from "./core/symbols";
export * from "./codegen/backend";
export * from "./diagnostics";
export * from "./language/configuration";
export * from "./language/kaleidoscope.language";
export * from "./utils/logger";
export * from "./utils/result";
