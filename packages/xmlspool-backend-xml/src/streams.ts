/**
 * Output streams for the XML text sink
 *
 * Streams are synchronous: a write either reaches the stream's buffer or
 * throws. Nothing written is ever taken back.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Output stream abstraction
 */
export interface OutputStream {
  write(data: string): void;
  flush(): void;
  close(): void;
}

/**
 * In-memory stream; the whole output is available from getOutput()
 */
export class StringStream implements OutputStream {
  private chunks: string[] = [];

  write(data: string): void {
    this.chunks.push(data);
  }

  flush(): void {
    // Nothing to flush
  }

  close(): void {
    // Output stays available after closing
  }

  getOutput(): string {
    return this.chunks.join('');
  }
}

/**
 * Writes each chunk of XML straight to the process's standard output.
 */
export class StdoutStream implements OutputStream {
  write(data: string): void {
    process.stdout.write(data);
  }

  /** Nothing is held back here. */
  flush(): void {}

  /** Standard output stays open for whoever runs after the document. */
  close(): void {}
}

/**
 * File output stream. Output is collected in a small buffer and written
 * out whenever the buffer fills up, so memory use does not grow with the
 * document.
 */
export class FileStream implements OutputStream {
  private fd: number | null = null;
  private buffer: string = '';

  constructor(
    public readonly filePath: string,
    private readonly bufferSize: number = 8192
  ) {}

  /**
   * Open the file for writing, creating its directory if needed
   */
  open(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.fd = fs.openSync(this.filePath, 'w');
  }

  write(data: string): void {
    if (this.fd === null) {
      throw new Error(`File ${this.filePath} is not open`);
    }
    this.buffer += data;
    if (this.buffer.length >= this.bufferSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.fd !== null && this.buffer) {
      fs.writeSync(this.fd, this.buffer, undefined, 'utf-8');
      this.buffer = '';
    }
  }

  close(): void {
    if (this.fd !== null) {
      this.flush();
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}
