/**
 * Buffered containers
 *
 * A buffered fragment or element is built independently of the output
 * position: it starts out blocked, holds its content in memory, and blocks
 * every sibling that follows it until release() is called. Nothing of it is
 * written until it has been released and nothing buffered is left inside
 * it; it also waits until everything before it in document order has been
 * output ("reached" by the parent's drain).
 */

import type { OutputContext } from '../output-context';
import type { Outputtable } from './outputtable';
import { OutputContainer } from './container';
import { OutputElement, OutputState } from './element';

export type BufferedNode = BufferedFragment | BufferedElement;

/**
 * Fragment: container without markup of its own
 */
export class BufferedFragment extends OutputContainer {
  private state: OutputState = OutputState.None;

  private released: boolean = false;

  /**
   * True until the parent's drain has reached this node, i.e. while
   * something before it is still pending (or it has no parent yet)
   */
  private blocked: boolean = true;

  constructor(context: OutputContext) {
    super(context);
  }

  getState(): OutputState {
    return this.state;
  }

  isReleased(): boolean {
    return this.released;
  }

  isBuffered(): boolean {
    return !this.released;
  }

  /**
   * Mark the content of this fragment as finished. If the fragment has
   * been reached and holds nothing buffered, its content is output right
   * away; either way the ancestors are told, so that output blocked on
   * this fragment can continue.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    if (this.parent === null || this.state === OutputState.Closed) {
      return;
    }
    if (!this.blocked && !this.outputReleased()) {
      return;
    }
    this.notifyReleased();
  }

  canOutputNewChild(): boolean {
    switch (this.state) {
      case OutputState.None:
        return false;
      case OutputState.Closed:
        return this.throwClosed();
      case OutputState.Open:
        return this.closeAndOutputChildren();
    }
  }

  /** @internal */
  hasBufferedContent(): boolean {
    return !this.released || super.hasBufferedContent();
  }

  doOutput(_context: OutputContext, canClose: boolean): boolean {
    if (this.state === OutputState.Closed) {
      return true;
    }
    this.blocked = false;
    if (this.state === OutputState.None) {
      if (this.hasBufferedContent()) {
        return false;
      }
      this.state = OutputState.Open;
    }
    if (canClose) {
      if (!this.closeAndOutputChildren()) {
        return false;
      }
      this.state = OutputState.Closed;
      return true;
    }
    this.closeAllButLastChild();
    return false;
  }

  forceOutput(_context: OutputContext): void {
    this.blocked = false;
    this.forceChildOutput();
    this.state = OutputState.Closed;
  }

  protected onChildReleased(_child: Outputtable): boolean {
    if (!this.released) {
      // release() of this fragment will pick it up
      return false;
    }
    if (this.blocked) {
      return true;
    }
    return this.outputReleased();
  }

  protected onLinked(blocked: boolean): void {
    this.blocked = blocked;
    if (!blocked && this.released) {
      this.outputReleased();
    }
  }

  protected pathSegment(): null {
    return null;
  }

  /**
   * Output as much as possible once released and reached
   *
   * @returns true if the queue was emptied
   */
  private outputReleased(): boolean {
    if (this.state === OutputState.None) {
      if (this.hasBufferedContent()) {
        return false;
      }
      this.state = OutputState.Open;
    }
    return this.closeAndOutputChildren();
  }
}

/**
 * Element whose start tag, attributes and content are held back until it
 * has been released
 */
export class BufferedElement extends OutputElement {
  private released: boolean = false;
  private blocked: boolean = true;

  isReleased(): boolean {
    return this.released;
  }

  isBuffered(): boolean {
    return !this.released;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    if (this.parent === null || this.state === OutputState.Closed) {
      return;
    }
    if (!this.blocked && !this.outputReleased()) {
      return;
    }
    this.notifyReleased();
  }

  /** @internal */
  hasBufferedContent(): boolean {
    return !this.released || super.hasBufferedContent();
  }

  doOutput(context: OutputContext, canClose: boolean): boolean {
    if (this.state === OutputState.Closed) {
      return true;
    }
    this.blocked = false;
    if (this.state === OutputState.None && this.hasBufferedContent()) {
      return false;
    }
    return super.doOutput(context, canClose);
  }

  forceOutput(context: OutputContext): void {
    this.blocked = false;
    super.forceOutput(context);
  }

  protected onChildReleased(_child: Outputtable): boolean {
    if (!this.released) {
      return false;
    }
    if (this.blocked) {
      return true;
    }
    // Released content is final, so every child can be closed
    return this.outputReleased();
  }

  protected onLinked(blocked: boolean): void {
    this.blocked = blocked;
    if (!blocked && this.released) {
      this.outputReleased();
    }
  }

  private outputReleased(): boolean {
    if (this.state === OutputState.None) {
      if (this.hasBufferedContent()) {
        return false;
      }
      this.writeStartTag();
    }
    return this.closeAndOutputChildren();
  }
}
