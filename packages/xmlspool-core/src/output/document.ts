/**
 * Root containers
 *
 * OutputDocument writes a complete document (XML declaration, optional
 * DOCTYPE, content); RootFragment writes content into a sink that is
 * already positioned inside some document. Neither has a parent, so both
 * can always write as soon as their own queue is empty.
 *
 * closeRoot() has to be called once all content has been added: anything
 * still queued, including buffered content that was never released, is
 * output then.
 */

import type { XmlSink } from '../sink';
import type { Outputtable } from './outputtable';
import { OutputContext, type OutputOptions } from '../output-context';
import { OutputContainer } from './container';
import { IllegalStateError } from '../errors';

export interface DocumentOptions extends OutputOptions {
  /** XML version for the declaration; null omits the declaration */
  version?: string | null;
  encoding?: string | null;
  standalone?: boolean | null;
}

/**
 * Container without a parent: everything it holds can be written as soon
 * as its own queue allows
 */
export abstract class RootContainer extends OutputContainer {
  private closed: boolean = false;

  isClosed(): boolean {
    return this.closed;
  }

  canOutputNewChild(): boolean {
    if (this.closed) {
      return this.throwClosed();
    }
    return this.closeAndOutputChildren();
  }

  /**
   * Output everything still pending, buffered or not, and finish output.
   * The container can not be used afterwards.
   */
  closeRoot(): void {
    if (this.closed) {
      this.throwClosed();
    }
    this.closed = true;
    this.forceChildOutput();
    this.finishOutput();
  }

  doOutput(_context: OutputContext, _canClose: boolean): boolean {
    return this.closeAndOutputChildren();
  }

  forceOutput(_context: OutputContext): void {
    this.forceChildOutput();
  }

  protected onChildReleased(_child: Outputtable): boolean {
    if (!this.closed) {
      this.closeAllButLastChild();
    }
    return false;
  }

  protected pathSegment(): null {
    return null;
  }

  protected abstract finishOutput(): void;
}

export class OutputDocument extends RootContainer {
  private contentAdded: boolean = false;

  constructor(
    context: OutputContext,
    version: string | null = '1.0',
    encoding: string | null = null,
    standalone: boolean | null = null
  ) {
    super(context);
    if (version !== null) {
      context.writeStartDocument(version, encoding, standalone);
    }
  }

  /**
   * Write the DOCTYPE declaration. Only allowed before any content.
   */
  addDoctypeDeclaration(
    rootName: string,
    systemId: string | null = null,
    publicId: string | null = null,
    internalSubset: string | null = null
  ): void {
    if (this.isClosed()) {
      this.throwClosed();
    }
    if (this.contentAdded) {
      throw new IllegalStateError('DOCTYPE declaration must come before any document content');
    }
    if (publicId !== null && systemId === null) {
      throw new IllegalStateError('DOCTYPE declaration with a public id needs a system id');
    }
    this.context.writeDoctype(rootName, systemId, publicId, internalSubset);
  }

  protected noteNewChild(): void {
    this.contentAdded = true;
  }

  protected finishOutput(): void {
    this.context.writeEndDocument();
    this.context.flush();
  }
}

export class RootFragment extends RootContainer {
  constructor(context: OutputContext) {
    super(context);
  }

  protected finishOutput(): void {
    this.context.flush();
  }
}

/**
 * Create a document writing to the sink. Writes the XML declaration
 * (version 1.0 unless told otherwise) right away.
 */
export function createOutputDocument(sink: XmlSink, options: DocumentOptions = {}): OutputDocument {
  const context = new OutputContext(sink, options);
  return new OutputDocument(
    context,
    options.version === undefined ? '1.0' : options.version,
    options.encoding ?? null,
    options.standalone ?? null
  );
}

/**
 * Create a root fragment writing to the sink, for output that is not a
 * complete document
 */
export function createOutputFragment(sink: XmlSink, options: OutputOptions = {}): RootFragment {
  return new RootFragment(new OutputContext(sink, options));
}
