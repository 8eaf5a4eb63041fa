// SPDX-License-Identifier: Apache-2.0

function charWidth(cp: number): number {
  return cp > 0xffff ? 2 : 1;
}

function containsCodePoint(set: string, cp: number): boolean {
  let i = 0;
  let member = set.codePointAt(i);
  while (member !== undefined) {
    if (member === cp) return true;
    i += charWidth(member);
    member = set.codePointAt(i);
  }
  return false;
}

/** A saved cursor position. Only meaningful for the cursor that produced it. */
export interface CursorSnapshot {
  readonly offset: number;
}

/**
 * Forward-only scanner over a pattern string. Every match method either
 * consumes exactly one character and returns it, or returns `null` (or
 * `false`) and leaves the position alone. The cursor never rewinds on its
 * own; callers backtrack with {@link Cursor.snapshot} and
 * {@link Cursor.restore}.
 *
 * Characters are code points, so a surrogate pair is one character and
 * advances the offset by two.
 */
export class Cursor {
  readonly input: string;
  private offset: number;

  constructor(input: string, start = 0) {
    if (!Number.isInteger(start) || start < 0 || start > input.length) {
      throw new RangeError(`Start offset ${start} is outside the input (length ${input.length})`);
    }
    this.input = input;
    this.offset = start;
  }

  get position(): number {
    return this.offset;
  }

  get atEnd(): boolean {
    return this.offset >= this.input.length;
  }

  // Lookahead works on code point numbers; a string is only produced for
  // the character a match consumes and returns.
  private peek(): number | undefined {
    return this.input.codePointAt(this.offset);
  }

  private take(cp: number): string {
    const start = this.offset;
    this.offset += charWidth(cp);
    return this.input.slice(start, this.offset);
  }

  matchAnyChar(): string | null {
    const cp = this.peek();
    return cp === undefined ? null : this.take(cp);
  }

  matchChar(c: string): boolean {
    const cp = this.peek();
    if (cp === undefined || cp !== c.codePointAt(0) || charWidth(cp) !== c.length) return false;
    this.offset += c.length;
    return true;
  }

  matchCharNotIn(set: string): string | null {
    const cp = this.peek();
    if (cp === undefined || containsCodePoint(set, cp)) return null;
    return this.take(cp);
  }

  matchAnyCharIn(set: string): string | null {
    const cp = this.peek();
    if (cp === undefined || !containsCodePoint(set, cp)) return null;
    return this.take(cp);
  }

  snapshot(): CursorSnapshot {
    return { offset: this.offset };
  }

  restore(snapshot: CursorSnapshot): void {
    if (snapshot.offset < 0 || snapshot.offset > this.input.length) {
      throw new RangeError(`Snapshot offset ${snapshot.offset} does not belong to this input`);
    }
    this.offset = snapshot.offset;
  }

  /** Unconsumed suffix, for diagnostics. */
  rest(): string {
    return this.input.slice(this.offset);
  }
}
