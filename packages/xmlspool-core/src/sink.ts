/**
 * XmlSink - Backend abstraction for serialized output
 *
 * The output tree never talks to a stream directly: every primitive write
 * goes through a sink. A sink is append-only and writes each call in the
 * order it receives it; it never buffers or reorders across calls.
 *
 * Prefixes are already resolved when a sink sees them: an empty prefix
 * means "no prefix" (for namespace declarations: the default namespace).
 */
export interface XmlSink {
  /**
   * Write the XML declaration
   */
  startDocument(version: string, encoding: string | null, standalone: boolean | null): void;

  /**
   * Write a DOCTYPE declaration
   */
  doctype(
    rootName: string,
    systemId: string | null,
    publicId: string | null,
    internalSubset: string | null
  ): void;

  /**
   * Open a start tag. The tag stays open for attribute() and namespace()
   * calls until the next content or element event.
   */
  startElement(prefix: string, localName: string, uri: string): void;

  /**
   * Add an attribute to the currently open start tag
   */
  attribute(prefix: string, localName: string, uri: string, value: string): void;

  /**
   * Add a namespace declaration to the currently open start tag
   */
  namespace(prefix: string, uri: string): void;

  endElement(prefix: string, localName: string, uri: string): void;

  characters(text: string): void;

  cdata(text: string): void;

  comment(text: string): void;

  entityRef(name: string): void;

  processingInstruction(target: string, data: string): void;

  /**
   * Ignorable whitespace (indentation); written without escaping
   */
  space(whitespace: string): void;

  endDocument(): void;

  flush(): void;

  /**
   * Get the generated output (for sinks that keep it in memory)
   */
  getOutput?(): string;
}
