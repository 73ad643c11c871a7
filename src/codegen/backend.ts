// src/codegen/backend.ts
//
// Codegen boundary
// ----------------
// Code generation lives outside this package. A backend receives the parsed
// declarations through exactly two operations and hands back an opaque
// function handle (an LLVM function value, a JS closure, a table index...).
//
// Re-declaring a known prototype must give back the existing handle, so that
//
//   extern sin(x)
//   def sin(x) ...
//
// composes. PrototypeRegistry implements that rule for backends that want it.

import type { FunctionNode, Program, Prototype, Range, TopLevel } from "../core/ast";
import { declarationName } from "../core/ast";
import { silentLogger, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

export type CodegenError = {
  kind: "CodegenError";
  message: string;
  range?: Range;
};

export function codegenError(message: string, range?: Range): CodegenError {
  return { kind: "CodegenError", message, range };
}

export interface CodegenBackend<H> {
  compilePrototype(prototype: Prototype): Result<H, CodegenError>;
  compileFunction(fn: FunctionNode): Result<H, CodegenError>;
}

/* =========================================================
   Prototype registry
   ========================================================= */

export class PrototypeRegistry<H> {
  private readonly entries = new Map<string, { arity: number; handle: H }>();

  /**
   * Returns the handle already registered under `prototype.name`, or registers
   * the one produced by `create`. A known name with a different arity is an error.
   */
  public declare(prototype: Prototype, create: () => Result<H, CodegenError>): Result<H, CodegenError> {
    const existing = this.entries.get(prototype.name);
    if (existing) {
      if (existing.arity !== prototype.params.length) {
        return err(
          codegenError(
            `Function '${prototype.name}' redeclared with ${prototype.params.length} parameter(s); ` +
              `it was declared with ${existing.arity}.`,
            prototype.range
          )
        );
      }
      return ok(existing.handle);
    }

    const created = create();
    if (created.ok) this.entries.set(prototype.name, { arity: prototype.params.length, handle: created.value });
    return created;
  }

  public lookup(name: string): H | undefined {
    return this.entries.get(name)?.handle;
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public get size(): number {
    return this.entries.size;
  }
}

/* =========================================================
   Driver
   ========================================================= */

export type CompiledDeclaration<H> = {
  declaration: TopLevel;
  handle: H;
};

export type FailedDeclaration = {
  declaration: TopLevel;
  error: CodegenError;
};

export type CompileProgramOptions = {
  /** Stop feeding declarations after the first codegen error. Default: false */
  stopOnError?: boolean;
  logger?: Logger;
};

export type CompileProgramResult<H> = {
  compiled: CompiledDeclaration<H>[];
  errors: FailedDeclaration[];
};

export function compileDeclaration<H>(declaration: TopLevel, backend: CodegenBackend<H>): Result<H, CodegenError> {
  return declaration.kind === "ExternDeclaration"
    ? backend.compilePrototype(declaration.prototype)
    : backend.compileFunction(declaration.function);
}

/** Feeds every declaration of `program` to `backend`, in order. */
export function compileProgram<H>(
  program: Program,
  backend: CodegenBackend<H>,
  options: CompileProgramOptions = {}
): CompileProgramResult<H> {
  const log = options.logger ?? silentLogger;
  const out: CompileProgramResult<H> = { compiled: [], errors: [] };

  for (const declaration of program.body) {
    const r = compileDeclaration(declaration, backend);
    const name = declarationName(declaration);

    if (r.ok) {
      log.debug(`compiled ${declaration.kind === "ExternDeclaration" ? "extern" : "function"} ${name}`);
      out.compiled.push({ declaration, handle: r.value });
      continue;
    }

    log.warn(`codegen failed for ${name}: ${r.error.message}`);
    out.errors.push({ declaration, error: r.error });
    if (options.stopOnError) break;
  }

  return out;
}
