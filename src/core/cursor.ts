// src/core/cursor.ts
//
// Character sources + Input Cursor
// --------------------------------
// The lexer never sees a string directly. It reads through an InputCursor,
// a one-character lookahead window over any single-pass CharSource:
//
//   - stringSource(text)       buffered text
//   - iterableSource(chunks)   arrays, generators, anything iterable
//   - fdSource(fd)             synchronous reads (stdin, files, pipes)
//
// The cursor reads lazily: the current character is fetched on first use and
// the lookahead only when peek() asks for it or advance() moves onto it.
// Once a source reports the end it is not read again.

import * as fs from "fs";
import { StringDecoder } from "string_decoder";

import type { Position } from "./ast";

/* =========================================================
   Sources
   ========================================================= */

export interface CharSource {
  /** Next character (one code point), or null at end of input. */
  read(): string | null;
}

export function stringSource(text: string): CharSource {
  return iterableSource([text]);
}

/**
 * Flattens an iterable of string chunks into code points.
 * Empty chunks are skipped.
 */
export function iterableSource(chunks: Iterable<string>): CharSource {
  const outer = chunks[Symbol.iterator]();
  let inner: Iterator<string> | null = null;

  return {
    read(): string | null {
      for (;;) {
        if (inner) {
          const step = inner.next();
          if (!step.done) return step.value;
          inner = null;
        }

        const chunk = outer.next();
        if (chunk.done) return null;
        inner = chunk.value[Symbol.iterator]();
      }
    },
  };
}

export type FdSourceOptions = {
  /** Bytes per read. Default: 4096 */
  chunkSize?: number;
};

/**
 * Reads a file descriptor synchronously, decoding UTF-8 across chunk boundaries.
 * On an interactive descriptor each read blocks until input is available.
 */
export function fdSource(fd: number, options: FdSourceOptions = {}): CharSource {
  const buffer = Buffer.alloc(Math.max(1, options.chunkSize ?? 4096));
  const decoder = new StringDecoder("utf8");
  let pending: string[] = [];
  let index = 0;
  let finished = false;

  const fill = (): void => {
    while (index >= pending.length && !finished) {
      const n = readChunk(fd, buffer);
      const text = n === 0 ? decoder.end() : decoder.write(buffer.subarray(0, n));
      if (n === 0) finished = true;
      pending = Array.from(text);
      index = 0;
    }
  };

  return {
    read(): string | null {
      fill();
      if (index >= pending.length) return null;
      const c = pending[index];
      index++;
      return c;
    },
  };
}

function readChunk(fd: number, buffer: Buffer): number {
  try {
    return fs.readSync(fd, buffer, 0, buffer.length, null);
  } catch (e: unknown) {
    // Windows reports end of a console/pipe as an "EOF" error instead of 0 bytes.
    if (isErrnoException(e) && e.code === "EOF") return 0;
    throw e;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/* =========================================================
   Input Cursor
   ========================================================= */

export class InputCursor {
  private readonly source: CharSource;

  // undefined = not fetched yet, null = end of input
  private cur: string | null | undefined = undefined;
  private next: string | null | undefined = undefined;
  private exhausted = false;

  private offset = 0;
  private line = 0;
  private column = 0;

  constructor(source: CharSource | string) {
    this.source = typeof source === "string" ? stringSource(source) : source;
  }

  /** Current character, or null at end of input. */
  public current(): string | null {
    if (this.cur === undefined) this.cur = this.pull();
    return this.cur;
  }

  /** Character after the current one, without consuming anything. */
  public peek(): string | null {
    if (this.current() === null) return null;
    if (this.next === undefined) this.next = this.pull();
    return this.next;
  }

  /** Moves past the current character and returns the new current one. */
  public advance(): string | null {
    const c = this.current();
    if (c === null) return null;

    this.offset++;
    if (c === "\n") {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }

    this.cur = this.next === undefined ? this.pull() : this.next;
    this.next = undefined;
    return this.cur;
  }

  public isAtEnd(): boolean {
    return this.current() === null;
  }

  /** Position of the current character (or of the end of input). */
  public position(): Position {
    return { offset: this.offset, line: this.line, column: this.column };
  }

  private pull(): string | null {
    if (this.exhausted) return null;
    const c = this.source.read();
    if (c === null) this.exhausted = true;
    return c;
  }
}
