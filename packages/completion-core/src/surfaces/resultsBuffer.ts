import type { DisplaySurface } from './types.js';

export const DEFAULT_DISPLAY_NAME = '*completion*';

export interface ResultsBufferOptions {
  onReveal?: (buffer: ResultsBuffer) => void;
}

export class ResultsBuffer implements DisplaySurface {
  readonly name: string;

  private contents = '';

  private readOnly = false;

  private visible = false;

  private alive = true;

  private readonly onReveal?: (buffer: ResultsBuffer) => void;

  constructor(name: string = DEFAULT_DISPLAY_NAME, options: ResultsBufferOptions = {}) {
    this.name = name;
    this.onReveal = options.onReveal;
  }

  isAlive(): boolean {
    return this.alive;
  }

  /** Empties the buffer and lifts the read-only flag so it can be repopulated. */
  clear(): void {
    this.assertAlive();
    this.contents = '';
    this.readOnly = false;
  }

  insert(text: string): void {
    this.assertAlive();

    if (this.readOnly) {
      throw new Error(`Buffer '${this.name}' is read-only`);
    }

    this.contents += text;
  }

  setReadOnly(readOnly: boolean): void {
    this.readOnly = readOnly;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  isVisible(): boolean {
    return this.visible;
  }

  reveal(): void {
    this.assertAlive();
    this.visible = true;
    this.onReveal?.(this);
  }

  hide(): void {
    this.visible = false;
  }

  getContents(): string {
    return this.contents;
  }

  dispose(): void {
    this.alive = false;
    this.visible = false;
  }

  private assertAlive(): void {
    if (!this.alive) {
      throw new Error(`Buffer '${this.name}' has been disposed`);
    }
  }
}
