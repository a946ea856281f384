/**
 * Outputtable - base unit of the output tree
 *
 * Every node that can sit in a container's pending queue extends this
 * class. The queue is a singly-linked list threaded through `next`; the
 * link is set by the parent when the following sibling is queued, and
 * never changes afterwards.
 */

import type { OutputContext } from '../output-context';
import { IllegalStateError } from '../errors';

export abstract class Outputtable {
  private nextSibling: Outputtable | null = null;

  /**
   * Following sibling in document order, or null while this is the last
   * queued child
   */
  get next(): Outputtable | null {
    return this.nextSibling;
  }

  /**
   * Attach the following sibling
   */
  link(next: Outputtable): void {
    if (this.nextSibling !== null) {
      throw new IllegalStateError('Can not re-link an output node: next sibling already set');
    }
    this.nextSibling = next;
  }

  /**
   * Whether this node, or anything queued inside it, is buffered and not
   * yet released
   * @internal
   */
  hasBufferedContent(): boolean {
    return false;
  }

  /**
   * Try to output this node, and everything it owns, right now.
   *
   * @param canClose false when this is the last child being drained and
   *   it has to stay open for content appended later
   * @returns true iff the node is completely output; false if it, or
   *   something inside it, is still blocked
   * @internal
   */
  abstract doOutput(context: OutputContext, canClose: boolean): boolean;

  /**
   * Output this node and everything it owns, ignoring buffering state.
   * @internal
   */
  abstract forceOutput(context: OutputContext): void;
}
