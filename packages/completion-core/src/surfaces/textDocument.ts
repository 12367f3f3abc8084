import { DEFAULT_COMMENT_MARKER } from '../prompt/promptBuilder.js';
import { assertSpan, type EditingSurface, type Span } from './types.js';

export class TextDocument implements EditingSurface {
  readonly commentMarker: string;

  private text: string;

  private alive = true;

  constructor(text: string, commentMarker: string = DEFAULT_COMMENT_MARKER) {
    this.text = text;
    this.commentMarker = commentMarker;
  }

  get length(): number {
    return this.text.length;
  }

  isAlive(): boolean {
    return this.alive;
  }

  getText(span?: Span): string {
    if (!span) {
      return this.text;
    }

    assertSpan(span, this.text);
    return this.text.slice(span.start, span.end);
  }

  deleteRange(span: Span): void {
    this.assertAlive();
    assertSpan(span, this.text);
    this.text = this.text.slice(0, span.start) + this.text.slice(span.end);
  }

  insert(offset: number, text: string): void {
    this.assertAlive();
    assertSpan({ start: offset, end: offset }, this.text);
    this.text = this.text.slice(0, offset) + text + this.text.slice(offset);
  }

  dispose(): void {
    this.alive = false;
  }

  private assertAlive(): void {
    if (!this.alive) {
      throw new Error('Document has been disposed');
    }
  }
}
