import { DEFAULT_DISPLAY_NAME, ResultsBuffer, type ResultsBufferOptions } from './resultsBuffer.js';

/**
 * Owns the named scratch buffers. Callers hold the registry instead of a
 * global buffer; `getOrCreate` replaces a buffer that has been disposed.
 */
export class DisplaySurfaceRegistry {
  private readonly buffers = new Map<string, ResultsBuffer>();

  private readonly bufferOptions: ResultsBufferOptions;

  constructor(bufferOptions: ResultsBufferOptions = {}) {
    this.bufferOptions = bufferOptions;
  }

  getOrCreate(name: string = DEFAULT_DISPLAY_NAME): ResultsBuffer {
    const existing = this.buffers.get(name);

    if (existing?.isAlive()) {
      return existing;
    }

    const buffer = new ResultsBuffer(name, this.bufferOptions);
    this.buffers.set(name, buffer);
    return buffer;
  }

  find(name: string): ResultsBuffer | undefined {
    const buffer = this.buffers.get(name);
    return buffer?.isAlive() ? buffer : undefined;
  }
}
