export interface Span {
  start: number;
  end: number;
}

/** The text the user is editing; the source of selections and the target of replacements. */
export interface EditingSurface {
  readonly commentMarker: string;
  isAlive(): boolean;
  getText(span?: Span): string;
  deleteRange(span: Span): void;
  insert(offset: number, text: string): void;
}

/** Shared scratch destination for completions that do not replace source text. */
export interface DisplaySurface {
  readonly name: string;
  isAlive(): boolean;
  clear(): void;
  insert(text: string): void;
  setReadOnly(readOnly: boolean): void;
  isReadOnly(): boolean;
  isVisible(): boolean;
  reveal(): void;
  getContents(): string;
}

/**
 * True when `offset` falls between the two UTF-16 code units of a surrogate
 * pair, where cutting or inserting would leave a lone surrogate behind.
 */
export function splitsSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) {
    return false;
  }

  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/** Offsets are UTF-16 code units, the unit of `String.prototype.length`. */
export function assertSpan(span: Span, text: string): void {
  const { length } = text;

  if (
    !Number.isInteger(span.start) ||
    !Number.isInteger(span.end) ||
    span.start < 0 ||
    span.end < span.start ||
    span.end > length
  ) {
    throw new RangeError(`Invalid span ${span.start}-${span.end} for text of length ${length}`);
  }

  for (const offset of [span.start, span.end]) {
    if (splitsSurrogatePair(text, offset)) {
      throw new RangeError(`Offset ${offset} splits a surrogate pair`);
    }
  }
}
