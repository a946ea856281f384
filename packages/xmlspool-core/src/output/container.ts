/**
 * OutputContainer - output node that can have children
 *
 * Every container keeps a queue of children that have not yet been
 * completely output. For each addition it decides whether the new child
 * can go straight to the sink (nothing before it is pending) or has to be
 * built as a node and queued behind whatever is still blocked.
 *
 * Blocking depends on buffering state of preceding nodes in document
 * order: if an ancestor or a preceding sibling is buffered, so is every
 * node added after it, until all such nodes have been released.
 */

import type { OutputContext } from '../output-context';
import type { OutputNamespace } from '../namespace';
import type { OutputElement } from './element';
import type { BufferedElement, BufferedFragment, BufferedNode } from './buffered';
import { Outputtable } from './outputtable';
import { IllegalStateError } from '../errors';

/**
 * Values accepted wherever character content is added
 */
export type TextValue = string | number | boolean | bigint;

export abstract class OutputContainer extends Outputtable {
  /**
   * Parent of this container; null for root containers, as well as for
   * buffered containers that have not yet been added anywhere.
   */
  protected parent: OutputContainer | null = null;

  /**
   * First child that has not yet been completely output; null when the
   * queue is empty.
   */
  protected firstChild: Outputtable | null = null;

  /**
   * Last child that has not yet been completely output.
   */
  protected lastChild: Outputtable | null = null;

  protected constructor(protected readonly context: OutputContext) {
    super();
  }

  // ============ Accessors ============

  getParent(): OutputContainer | null {
    return this.parent;
  }

  getContext(): OutputContext {
    return this.context;
  }

  /**
   * Namespace instance for the URI in this container's context. The
   * context never hands out more than one instance per URI.
   */
  getNamespace(uri: string, preferredPrefix?: string): OutputNamespace {
    return this.context.getNamespace(uri, preferredPrefix);
  }

  /**
   * Enable or disable heuristic indentation for the whole context.
   *
   * @example
   * container.setIndentation('\n        ', 1, 2); // lf and 2 spaces per level
   * container.setIndentation(null, 0, 0);         // disable indentation
   */
  setIndentation(indent: string | null, startOffset: number, step: number): void {
    this.context.setIndentation(indent, startOffset, step);
  }

  /**
   * Children currently waiting in the queue, in document order
   */
  pendingChildren(): Outputtable[] {
    const children: Outputtable[] = [];
    for (let child = this.firstChild; child !== null; child = child.next) {
      children.push(child);
      if (child === this.lastChild) {
        break;
      }
    }
    return children;
  }

  // ============ Simple content ============

  addCharacters(value: TextValue): void {
    const text = String(value);
    if (this.acceptNewChild()) {
      this.context.writeCharacters(text);
    } else {
      this.linkNewChild(this.context.createCharacters(text));
    }
  }

  addCData(text: string): void {
    if (this.acceptNewChild()) {
      this.context.writeCData(text);
    } else {
      this.linkNewChild(this.context.createCData(text));
    }
  }

  addComment(text: string): void {
    if (this.acceptNewChild()) {
      this.context.writeComment(text);
    } else {
      this.linkNewChild(this.context.createComment(text));
    }
  }

  addEntityRef(name: string): void {
    if (this.acceptNewChild()) {
      this.context.writeEntityRef(name);
    } else {
      this.linkNewChild(this.context.createEntityRef(name));
    }
  }

  addProcessingInstruction(target: string, data: string = ''): void {
    if (this.acceptNewChild()) {
      this.context.writeProcessingInstruction(target, data);
    } else {
      this.linkNewChild(this.context.createProcessingInstruction(target, data));
    }
  }

  // ============ Elements and buffered nodes ============

  /**
   * Add an element child. Passing null (or only a local name) adds an
   * element in no namespace, which is not the same as an element without
   * a prefix under some default namespace.
   */
  addElement(localName: string): OutputElement;
  addElement(namespace: OutputNamespace | null, localName: string): OutputElement;
  addElement(first: OutputNamespace | string | null, second?: string): OutputElement {
    const [namespace, localName] = splitName(first, second);
    const ns = this.resolveNamespace(namespace);

    const blocked = !this.acceptNewChild();
    const element = this.context.createElement(ns, localName);
    this.linkNewChild(element);
    element.linkParent(this, blocked);
    return element;
  }

  /**
   * Add an element that holds nothing but the given text
   */
  addElementWithCharacters(
    namespace: OutputNamespace | null,
    localName: string,
    value: TextValue
  ): OutputElement {
    const element = this.addElement(namespace, localName);
    element.addCharacters(value);
    return element;
  }

  /**
   * Add a buffered fragment or element created earlier with
   * createBufferedFragment() / createBufferedElement(). It stays blocked,
   * and blocks everything after it, until release() is called on it.
   */
  addBuffered<T extends BufferedNode>(node: T): T {
    if (node.getParent() !== null) {
      node.throwRelinking();
    }
    if (node.getContext() !== this.context) {
      throw new IllegalStateError(
        `Can not add ${node.describe()}: it belongs to a different output context`
      );
    }
    for (let ancestor: OutputContainer | null = this; ancestor !== null; ancestor = ancestor.parent) {
      if (ancestor === node) {
        throw new IllegalStateError(`Can not add ${node.describe()} inside itself`);
      }
    }

    const blocked = !this.acceptNewChild();
    this.linkNewChild(node);
    node.linkParent(this, blocked);
    return node;
  }

  addAndReleaseBuffered<T extends BufferedNode>(node: T): T {
    this.addBuffered(node);
    node.release();
    return node;
  }

  // Buffered construction: these couple the container to its subclasses
  // through the context, which creates the actual nodes.

  createBufferedFragment(): BufferedFragment {
    return this.context.createBufferedFragment();
  }

  createBufferedElement(localName: string): BufferedElement;
  createBufferedElement(namespace: OutputNamespace | null, localName: string): BufferedElement;
  createBufferedElement(first: OutputNamespace | string | null, second?: string): BufferedElement {
    const [namespace, localName] = splitName(first, second);
    return this.context.createBufferedElement(this.resolveNamespace(namespace), localName);
  }

  // ============ Output protocol ============

  /**
   * Figure out whether a newly added child can be output right away,
   * without being queued. Closes and outputs all non-blocked children
   * first.
   *
   * @returns true if the queue is now empty; false if there is at least
   *   one buffered child (or descendant) that could not be output
   */
  abstract canOutputNewChild(): boolean;

  /**
   * Called on a container when a child (or a child's descendant) has been
   * released, so that it neither is nor contains anything buffered. The
   * container drains what it can.
   *
   * @returns true if the container's own parent should be notified in
   *   turn; false if this container is itself still blocked
   */
  protected abstract onChildReleased(child: Outputtable): boolean;

  /**
   * Path segment of this container for getPath(); null for containers
   * that are transparent in paths (root containers, fragments)
   */
  protected abstract pathSegment(): string | null;

  /**
   * Called right after the parent has been set
   *
   * @param blocked true if something before this node in document order
   *   is still pending
   */
  protected onLinked(_blocked: boolean): void {
    throw new IllegalStateError(`${this.describe()} can not be added to another container`);
  }

  /**
   * Called before each new child is added, before any blocking check
   */
  protected noteNewChild(): void {}

  /** @internal */
  hasBufferedContent(): boolean {
    for (let child = this.firstChild; child !== null; child = child.next) {
      if (child.hasBufferedContent()) {
        return true;
      }
      if (child === this.lastChild) {
        break;
      }
    }
    return false;
  }

  // ============ Diagnostics ============

  /**
   * XPath-like description of where this container is, starting from the
   * root. Only meant for error messages.
   */
  getPath(): string {
    const segments: string[] = [];
    for (let node: OutputContainer | null = this; node !== null; node = node.parent) {
      const segment = node.pathSegment();
      if (segment !== null) {
        segments.push(segment);
      }
    }
    return '/' + segments.reverse().join('/');
  }

  /** @internal */
  describe(): string {
    return `${this.constructor.name} (${this.getPath()})`;
  }

  // ============ Internal ============

  /**
   * Set the parent; done exactly once, by the parent itself.
   * @internal
   */
  linkParent(parent: OutputContainer, blocked: boolean): void {
    if (this.parent !== null) {
      this.throwRelinking();
    }
    this.parent = parent;
    this.onLinked(blocked);
  }

  protected linkNewChild(child: Outputtable): void {
    const last = this.lastChild;
    if (last === null) {
      this.firstChild = child;
    } else {
      last.link(child);
    }
    this.lastChild = child;
  }

  protected resolveNamespace(namespace: OutputNamespace | null): OutputNamespace {
    if (namespace === null) {
      return this.context.getEmptyNamespace();
    }
    // Namespace instances are not supposed to be shared between contexts,
    // but finding the local instance is easy enough. A local preference
    // always wins over the foreign one.
    if (!namespace.isValidIn(this.context)) {
      return (
        this.context.findNamespace(namespace.uri) ??
        this.context.getNamespace(namespace.uri, namespace.preferredPrefix ?? undefined)
      );
    }
    return namespace;
  }

  /**
   * Close and output all children that can be output, front to back.
   *
   * @returns true if the queue was emptied; false if a buffered child (or
   *   a child with buffered descendants) stopped the drain, in which case
   *   the queue still starts with that child
   */
  protected closeAndOutputChildren(): boolean {
    while (this.firstChild !== null) {
      if (!this.firstChild.doOutput(this.context, true)) {
        if (process.env.DEBUG_XMLSPOOL) {
          console.error(`drain stopped in ${this.describe()} at ${this.firstChild.constructor.name}`);
        }
        return false;
      }
      this.firstChild = this.firstChild.next;
    }
    this.lastChild = null;
    return true;
  }

  /**
   * Like closeAndOutputChildren(), except that the last child is not
   * closed: it may still get content appended to it. Simple children are
   * complete once written; an element or fragment left open stays queued.
   */
  protected closeAllButLastChild(): boolean {
    let child = this.firstChild;
    while (child !== null) {
      const next = child.next;
      if (!child.doOutput(this.context, next !== null)) {
        return false;
      }
      this.firstChild = child = next;
    }
    this.lastChild = null;
    return true;
  }

  /**
   * Output every queued child regardless of buffering. The queue is
   * detached first, so a failing child leaves nothing queued behind it.
   */
  protected forceChildOutput(): void {
    let child = this.firstChild;
    this.firstChild = null;
    this.lastChild = null;
    for (; child !== null; child = child.next) {
      child.forceOutput(this.context);
    }
  }

  /**
   * Propagate a release up the tree. Each ancestor drains what it can; the
   * walk stops at the first ancestor that is itself still blocked, or at
   * the root.
   */
  protected notifyReleased(): void {
    let child: OutputContainer = this;
    let parent = this.parent;
    while (parent !== null && parent.onChildReleased(child)) {
      if (process.env.DEBUG_XMLSPOOL) {
        console.error(`release cascades from ${child.describe()} to ${parent.describe()}`);
      }
      child = parent;
      parent = parent.parent;
    }
  }

  /**
   * Whether the queue is empty, or holds only the last child (which may
   * just be open rather than blocked)
   */
  protected drainedUpToLast(): boolean {
    return this.firstChild === null || this.firstChild === this.lastChild;
  }

  private acceptNewChild(): boolean {
    this.noteNewChild();
    return this.canOutputNewChild();
  }

  protected throwClosed(): never {
    throw new IllegalStateError(`Illegal call when ${this.describe()} was closed`);
  }

  /** @internal */
  throwRelinking(): never {
    throw new IllegalStateError(
      `Can not re-set parent of ${this.describe()} once it has been set`
    );
  }
}

function splitName(
  first: OutputNamespace | string | null,
  second: string | undefined
): [OutputNamespace | null, string] {
  if (typeof first === 'string') {
    return [null, first];
  }
  if (second === undefined) {
    throw new TypeError('Local name is required');
  }
  return [first, second];
}
