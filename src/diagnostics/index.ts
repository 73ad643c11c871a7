// src/diagnostics/index.ts
//
// Diagnostics barrel export.

export * from "./errors";
