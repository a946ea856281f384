/**
 * Trace backend for xmlspool - records sink calls as text
 *
 * Every sink call becomes one line: the call name followed by its
 * arguments, string values JSON-quoted. Useful for debugging the order in
 * which the output tree writes things, and for tests that care about
 * exactly which events reach the sink.
 *
 * @example
 * startElement p:item {urn:example}
 * namespace xmlns:p="urn:example"
 * attribute id="1"
 * characters "hello"
 * endElement p:item
 */

import type { XmlSink } from 'xmlspool-core';

export class TraceSink implements XmlSink {
  private lines: string[] = [];

  startDocument(version: string, encoding: string | null, standalone: boolean | null): void {
    let line = `startDocument ${version}`;
    if (encoding !== null) {
      line += ` encoding=${encoding}`;
    }
    if (standalone !== null) {
      line += ` standalone=${standalone ? 'yes' : 'no'}`;
    }
    this.record(line);
  }

  doctype(
    rootName: string,
    systemId: string | null,
    publicId: string | null,
    internalSubset: string | null
  ): void {
    let line = `doctype ${rootName}`;
    if (publicId !== null) {
      line += ` public=${quote(publicId)}`;
    }
    if (systemId !== null) {
      line += ` system=${quote(systemId)}`;
    }
    if (internalSubset !== null) {
      line += ` subset=${quote(internalSubset)}`;
    }
    this.record(line);
  }

  startElement(prefix: string, localName: string, uri: string): void {
    const name = qname(prefix, localName);
    this.record(uri ? `startElement ${name} {${uri}}` : `startElement ${name}`);
  }

  attribute(prefix: string, localName: string, _uri: string, value: string): void {
    this.record(`attribute ${qname(prefix, localName)}=${quote(value)}`);
  }

  namespace(prefix: string, uri: string): void {
    this.record(`namespace ${qname(prefix ? 'xmlns' : '', prefix || 'xmlns')}=${quote(uri)}`);
  }

  endElement(prefix: string, localName: string, _uri: string): void {
    this.record(`endElement ${qname(prefix, localName)}`);
  }

  characters(text: string): void {
    this.record(`characters ${quote(text)}`);
  }

  cdata(text: string): void {
    this.record(`cdata ${quote(text)}`);
  }

  comment(text: string): void {
    this.record(`comment ${quote(text)}`);
  }

  entityRef(name: string): void {
    this.record(`entityRef ${name}`);
  }

  processingInstruction(target: string, data: string): void {
    this.record(data ? `processingInstruction ${target} ${quote(data)}` : `processingInstruction ${target}`);
  }

  space(whitespace: string): void {
    this.record(`space ${quote(whitespace)}`);
  }

  endDocument(): void {
    this.record('endDocument');
  }

  flush(): void {
    this.record('flush');
  }

  /**
   * Recorded lines, oldest first
   */
  getLines(): string[] {
    return [...this.lines];
  }

  getOutput(): string {
    return this.lines.join('\n');
  }

  /**
   * Forget everything recorded so far
   */
  clear(): void {
    this.lines = [];
  }

  protected record(line: string): void {
    if (process.env.DEBUG_XMLSPOOL) {
      console.error(`trace: ${line}`);
    }
    this.lines.push(line);
  }
}

function qname(prefix: string, localName: string): string {
  return prefix ? `${prefix}:${localName}` : localName;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

/**
 * Create a trace sink
 */
export function createTraceSink(): TraceSink {
  return new TraceSink();
}
