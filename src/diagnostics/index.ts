// src/diagnostics/index.ts
//
// Lox Diagnostics Barrel Export
// -----------------------------
// One import point for the runner and the language server.

export * from "./errors";
export * from "./reporter";
