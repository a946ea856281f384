/**
 * Namespace handles
 *
 * An output context hands out exactly one OutputNamespace per URI, so two
 * handles from the same context are equal iff they are the same object.
 * Handles remember the context that created them; a handle from another
 * context has to be re-resolved before it is used (see isValidIn()).
 */

import type { OutputContext } from './output-context';

export const XML_NAMESPACE_URI = 'http://www.w3.org/XML/1998/namespace';
export const XMLNS_NAMESPACE_URI = 'http://www.w3.org/2000/xmlns/';

export class OutputNamespace {
  constructor(
    private readonly owner: OutputContext,
    readonly uri: string,
    private preferred: string | null
  ) {}

  get preferredPrefix(): string | null {
    return this.preferred;
  }

  /**
   * Set the prefix to try first when this namespace has to be bound.
   * An explicitly requested prefix replaces an earlier preference.
   */
  setPreferredPrefix(prefix: string): void {
    this.preferred = prefix;
  }

  /**
   * The empty namespace: elements and attributes that are in no namespace
   */
  isEmpty(): boolean {
    return this.uri === '';
  }

  isValidIn(context: OutputContext): boolean {
    return this.owner === context;
  }

  toString(): string {
    return this.preferred ? `${this.preferred}={${this.uri}}` : `{${this.uri}}`;
  }
}
