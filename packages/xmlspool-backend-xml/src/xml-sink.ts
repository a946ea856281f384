/**
 * XML text sink
 *
 * Serializes sink calls as XML text onto an output stream. A start tag is
 * kept open after startElement() so attributes and namespace declarations
 * can still be added; the next event closes it, and an element ended
 * while its start tag is still open is written as an empty-element tag.
 */

import { SinkError, type XmlSink } from 'xmlspool-core';
import { StringStream, type OutputStream } from './streams';
import { cdataBody, escapeAttribute, escapeText, qualifiedName } from './escape';

export class XmlTextSink implements XmlSink {
  private startTagOpen: boolean = false;

  /**
   * @param stream Output stream (default: in-memory string)
   */
  constructor(private readonly stream: OutputStream = new StringStream()) {}

  getStream(): OutputStream {
    return this.stream;
  }

  startDocument(version: string, encoding: string | null, standalone: boolean | null): void {
    let decl = `<?xml version="${version}"`;
    if (encoding !== null) {
      decl += ` encoding="${encoding}"`;
    }
    if (standalone !== null) {
      decl += ` standalone="${standalone ? 'yes' : 'no'}"`;
    }
    this.write(decl + '?>');
  }

  doctype(
    rootName: string,
    systemId: string | null,
    publicId: string | null,
    internalSubset: string | null
  ): void {
    let decl = `<!DOCTYPE ${rootName}`;
    if (publicId !== null) {
      decl += ` PUBLIC "${publicId}" "${systemId ?? ''}"`;
    } else if (systemId !== null) {
      decl += ` SYSTEM "${systemId}"`;
    }
    if (internalSubset !== null) {
      decl += ` [${internalSubset}]`;
    }
    this.closeStartTag();
    this.write(decl + '>');
  }

  startElement(prefix: string, localName: string, _uri: string): void {
    this.closeStartTag();
    this.write(`<${qualifiedName(prefix, localName)}`);
    this.startTagOpen = true;
  }

  attribute(prefix: string, localName: string, _uri: string, value: string): void {
    this.requireStartTag(`attribute ${qualifiedName(prefix, localName)}`);
    this.write(` ${qualifiedName(prefix, localName)}="${escapeAttribute(value)}"`);
  }

  namespace(prefix: string, uri: string): void {
    this.requireStartTag(`namespace declaration for ${uri}`);
    const name = prefix ? `xmlns:${prefix}` : 'xmlns';
    this.write(` ${name}="${escapeAttribute(uri)}"`);
  }

  endElement(prefix: string, localName: string, _uri: string): void {
    if (this.startTagOpen) {
      this.startTagOpen = false;
      this.write('/>');
      return;
    }
    this.write(`</${qualifiedName(prefix, localName)}>`);
  }

  characters(text: string): void {
    this.closeStartTag();
    this.write(escapeText(text));
  }

  cdata(text: string): void {
    this.closeStartTag();
    this.write(`<![CDATA[${cdataBody(text)}]]>`);
  }

  comment(text: string): void {
    if (text.includes('--') || text.endsWith('-')) {
      throw new SinkError(`Comment text can not contain '--' or end with '-': ${text}`);
    }
    this.closeStartTag();
    this.write(`<!--${text}-->`);
  }

  entityRef(name: string): void {
    this.closeStartTag();
    this.write(`&${name};`);
  }

  processingInstruction(target: string, data: string): void {
    if (target.toLowerCase() === 'xml') {
      throw new SinkError(`Processing instruction target '${target}' is reserved`);
    }
    if (data.includes('?>')) {
      throw new SinkError(`Processing instruction data can not contain '?>': ${data}`);
    }
    this.closeStartTag();
    this.write(data ? `<?${target} ${data}?>` : `<?${target}?>`);
  }

  space(whitespace: string): void {
    this.closeStartTag();
    this.write(whitespace);
  }

  endDocument(): void {
    this.closeStartTag();
  }

  flush(): void {
    try {
      this.stream.flush();
    } catch (err) {
      throw toSinkError(err);
    }
  }

  /**
   * Get the generated output, when writing to a StringStream
   */
  getOutput(): string {
    if (this.stream instanceof StringStream) {
      return this.stream.getOutput();
    }
    throw new Error('Output is only available for in-memory streams');
  }

  private closeStartTag(): void {
    if (this.startTagOpen) {
      this.startTagOpen = false;
      this.write('>');
    }
  }

  private requireStartTag(what: string): void {
    if (!this.startTagOpen) {
      throw new SinkError(`Can not write ${what}: no start tag is open`);
    }
  }

  private write(data: string): void {
    try {
      this.stream.write(data);
    } catch (err) {
      throw toSinkError(err);
    }
  }
}

function toSinkError(err: unknown): SinkError {
  if (err instanceof SinkError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new SinkError(`Failed to write output: ${message}`, { cause: err });
}

/**
 * Create an XML text sink
 *
 * @param stream Output stream (default: in-memory string)
 */
export function createXmlSink(stream?: OutputStream): XmlTextSink {
  return new XmlTextSink(stream);
}
