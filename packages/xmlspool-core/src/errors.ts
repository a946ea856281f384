/**
 * Error types raised by the output tree.
 *
 * IllegalStateError covers programmer errors (re-linking a node, writing to
 * a closed container, adding attributes after content). SinkError is raised
 * by sinks when the underlying write fails; the output tree passes it
 * through to the caller unchanged.
 */

export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
  }
}
