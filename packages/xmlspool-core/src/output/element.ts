/**
 * OutputElement - element node of the output tree
 *
 * An element added while nothing before it is pending writes its start
 * tag at once and stays open: attributes go straight into the start tag
 * until content is added, and content goes straight to the sink while the
 * element is the open tail of its parent. Adding a sibling after it closes
 * it.
 *
 * An element added behind something buffered starts with nothing written;
 * attributes and content are queued until its parent's drain reaches it.
 */

import type { OutputContext, ElementScope } from '../output-context';
import type { OutputNamespace } from '../namespace';
import type { Outputtable } from './outputtable';
import { OutputContainer, type TextValue } from './container';
import { IllegalStateError } from '../errors';

/**
 * Output progress of an element or buffered fragment
 */
export enum OutputState {
  /** Nothing written yet (for elements: no start tag) */
  None = 'none',
  /** Started; for elements, the end tag is not yet written */
  Open = 'open',
  Closed = 'closed',
}

export class OutputElement extends OutputContainer {
  protected state: OutputState = OutputState.None;

  /**
   * Set once any child content has been added; attributes and namespace
   * declarations are refused from then on.
   */
  private contentAdded: boolean = false;

  private scope: ElementScope | null = null;

  constructor(
    context: OutputContext,
    readonly namespace: OutputNamespace,
    readonly localName: string
  ) {
    super(context);
  }

  getState(): OutputState {
    return this.state;
  }

  // ============ Attributes ============

  /**
   * Add an attribute. Only allowed before any content has been added.
   */
  addAttribute(localName: string, value: TextValue): void;
  addAttribute(namespace: OutputNamespace | null, localName: string, value: TextValue): void;
  addAttribute(
    first: OutputNamespace | string | null,
    second: TextValue,
    third?: TextValue
  ): void {
    let namespace: OutputNamespace | null;
    let localName: string;
    let value: TextValue;
    if (typeof first === 'string') {
      namespace = null;
      localName = first;
      value = second;
    } else {
      if (typeof second !== 'string' || third === undefined) {
        throw new TypeError('addAttribute: local name and value are required');
      }
      namespace = first;
      localName = second;
      value = third;
    }

    const ns = this.resolveNamespace(namespace);
    this.checkStartTagWritable('attribute');
    if (this.state === OutputState.None) {
      this.linkNewChild(this.context.createAttribute(ns, localName, String(value)));
    } else {
      this.context.writeAttribute(ns, localName, String(value));
    }
  }

  /**
   * Bind a namespace on this element, so that descendants using it share
   * one declaration instead of each declaring it again.
   */
  predeclareNamespace(namespace: OutputNamespace): void {
    const ns = this.resolveNamespace(namespace);
    this.checkStartTagWritable('namespace declaration');
    if (this.state === OutputState.None) {
      this.linkNewChild(this.context.createNamespace(ns));
    } else {
      this.context.writeNamespace(ns);
    }
  }

  // ============ Output protocol ============

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

  doOutput(_context: OutputContext, canClose: boolean): boolean {
    if (this.state === OutputState.Closed) {
      return true;
    }
    if (this.state === OutputState.None) {
      this.writeStartTag();
    }
    if (canClose) {
      if (!this.closeAndOutputChildren()) {
        return false;
      }
      this.writeEndTag();
      return true;
    }
    // Still open: later content may be appended
    this.closeAllButLastChild();
    return false;
  }

  forceOutput(_context: OutputContext): void {
    if (this.state === OutputState.Closed) {
      return;
    }
    if (this.state === OutputState.None) {
      this.writeStartTag();
    }
    this.forceChildOutput();
    this.writeEndTag();
  }

  protected onChildReleased(_child: Outputtable): boolean {
    if (this.state === OutputState.None) {
      // Waiting to be reached: only the parent can move things along
      return true;
    }
    this.closeAllButLastChild();
    return this.drainedUpToLast();
  }

  protected onLinked(blocked: boolean): void {
    if (!blocked) {
      this.writeStartTag();
    }
  }

  protected noteNewChild(): void {
    if (this.state === OutputState.Closed) {
      this.throwClosed();
    }
    this.contentAdded = true;
  }

  protected pathSegment(): string {
    const prefix = this.scope !== null ? this.scope.prefix : this.namespace.preferredPrefix;
    return prefix ? `${prefix}:${this.localName}` : this.localName;
  }

  protected writeStartTag(): void {
    this.scope = this.context.writeStartElement(this.namespace, this.localName);
    this.state = OutputState.Open;
  }

  protected writeEndTag(): void {
    if (this.scope === null) {
      throw new IllegalStateError(`End tag of ${this.describe()} written before its start tag`);
    }
    this.context.writeEndElement(this.scope);
    this.state = OutputState.Closed;
  }

  private checkStartTagWritable(what: string): void {
    if (this.state === OutputState.Closed) {
      this.throwClosed();
    }
    if (this.contentAdded) {
      throw new IllegalStateError(
        `Can not add ${what} to ${this.describe()}: content has already been added`
      );
    }
  }
}
