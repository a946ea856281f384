/**
 * Output Context
 *
 * The context sits between the output tree and the sink. It owns the
 * namespace table (one handle per URI) and the prefix bindings in scope,
 * does heuristic indentation, writes content straight through to the sink
 * on the unblocked path, and creates the node objects used when content
 * has to be queued.
 */

import type { XmlSink } from './sink';
import { OutputNamespace, XML_NAMESPACE_URI, XMLNS_NAMESPACE_URI } from './namespace';
import { ContentKind, SimpleOutput, type SimpleContent } from './output/simple';
import { OutputElement } from './output/element';
import { BufferedElement, BufferedFragment } from './output/buffered';

export interface IndentationOptions {
  /**
   * Indentation text, typically a linefeed followed by spaces or tabs.
   * Each indentation writes a prefix of it.
   */
  indent: string;
  /** Characters of `indent` written for the outermost level */
  startOffset?: number;
  /** Characters added per nesting level */
  step?: number;
}

export interface OutputOptions {
  indentation?: IndentationOptions | null;
  /**
   * Base for generated prefixes (`ns0`, `ns1`, ... by default)
   */
  prefixBase?: string;
  /**
   * Bind element namespaces without a preferred prefix as the default
   * namespace rather than under a generated prefix
   */
  preferDefaultNamespace?: boolean;
}

/**
 * What an element's end tag needs to know about its start tag
 */
export interface ElementScope {
  readonly prefix: string;
  readonly localName: string;
  readonly uri: string;
  /** Number of prefix bindings in scope before the start tag */
  readonly bindingCount: number;
  /** Default namespace in scope before the start tag */
  readonly parentDefaultUri: string;
}

interface Binding {
  prefix: string;
  uri: string;
}

type LastEvent = 'none' | 'start' | 'end' | 'text' | 'markup';

export class OutputContext {
  private readonly namespaces: Map<string, OutputNamespace> = new Map();
  private readonly emptyNamespace: OutputNamespace;

  private readonly bindings: Binding[] = [];
  private defaultUri: string = '';
  private prefixCounter: number = 0;
  private readonly prefixBase: string;
  private readonly preferDefaultNamespace: boolean;

  private indent: string | null = null;
  private indentOffset: number = 0;
  private indentStep: number = 0;
  private level: number = 0;
  private lastEvent: LastEvent = 'none';

  constructor(
    private readonly sink: XmlSink,
    options: OutputOptions = {}
  ) {
    this.emptyNamespace = new OutputNamespace(this, '', null);
    this.prefixBase = options.prefixBase ?? 'ns';
    this.preferDefaultNamespace = options.preferDefaultNamespace ?? false;
    if (options.indentation) {
      const { indent, startOffset = 0, step = 0 } = options.indentation;
      this.setIndentation(indent, startOffset, step);
    }
  }

  getSink(): XmlSink {
    return this.sink;
  }

  // ============ Namespaces ============

  /**
   * Namespace instance for the URI; the same instance is returned for the
   * same URI every time. A preferred prefix given here replaces an earlier
   * preference for the namespace.
   */
  getNamespace(uri: string, preferredPrefix?: string): OutputNamespace {
    if (uri === '') {
      return this.emptyNamespace;
    }
    if (uri === XMLNS_NAMESPACE_URI) {
      throw new Error(`Namespace ${uri} is reserved for namespace declarations`);
    }
    if (preferredPrefix !== undefined) {
      checkPrefix(uri, preferredPrefix);
    }

    let namespace = this.namespaces.get(uri);
    if (!namespace) {
      const prefix = uri === XML_NAMESPACE_URI ? 'xml' : preferredPrefix ?? null;
      namespace = new OutputNamespace(this, uri, prefix);
      this.namespaces.set(uri, namespace);
    } else if (preferredPrefix !== undefined && uri !== XML_NAMESPACE_URI) {
      namespace.setPreferredPrefix(preferredPrefix);
    }
    return namespace;
  }

  /**
   * Namespace already registered for the URI, if any. Never creates one and
   * never changes a preferred prefix.
   */
  findNamespace(uri: string): OutputNamespace | undefined {
    if (uri === '') {
      return this.emptyNamespace;
    }
    return this.namespaces.get(uri);
  }

  /**
   * The namespace of elements and attributes that are in no namespace
   */
  getEmptyNamespace(): OutputNamespace {
    return this.emptyNamespace;
  }

  /**
   * Prefix bound to the URI in the current scope; null if there is none.
   * The default namespace does not count: it has no prefix.
   */
  findPrefix(uri: string): string | null {
    if (uri === XML_NAMESPACE_URI) {
      return 'xml';
    }
    const shadowed = new Set<string>();
    for (let i = this.bindings.length - 1; i >= 0; i--) {
      const binding = this.bindings[i];
      if (shadowed.has(binding.prefix)) {
        continue;
      }
      if (binding.uri === uri) {
        return binding.prefix;
      }
      shadowed.add(binding.prefix);
    }
    return null;
  }

  getDefaultNamespaceUri(): string {
    return this.defaultUri;
  }

  // ============ Indentation ============

  /**
   * Enable (indent non-null) or disable heuristic indentation.
   *
   * @param startOffset characters of `indent` written for the outermost level
   * @param step characters added per nesting level
   */
  setIndentation(indent: string | null, startOffset: number, step: number): void {
    this.indent = indent;
    this.indentOffset = startOffset;
    this.indentStep = step;
  }

  // ============ Write-now primitives ============

  writeStartDocument(version: string, encoding: string | null, standalone: boolean | null): void {
    this.sink.startDocument(version, encoding, standalone);
    this.lastEvent = 'markup';
  }

  writeDoctype(
    rootName: string,
    systemId: string | null,
    publicId: string | null,
    internalSubset: string | null
  ): void {
    this.indentMarkup();
    this.sink.doctype(rootName, systemId, publicId, internalSubset);
    this.lastEvent = 'markup';
  }

  writeEndDocument(): void {
    this.sink.endDocument();
  }

  /**
   * Write a start tag, choosing the element's prefix and declaring its
   * namespace if it is not yet bound in scope.
   */
  writeStartElement(namespace: OutputNamespace, localName: string): ElementScope {
    this.indentMarkup();

    const uri = namespace.uri;
    const bindingCount = this.bindings.length;
    const parentDefaultUri = this.defaultUri;

    let prefix = '';
    let declaration: 'none' | 'default' | 'prefix' = 'none';
    if (namespace.isEmpty()) {
      // Undeclare an inherited default namespace
      if (this.defaultUri !== '') {
        declaration = 'default';
      }
    } else if (this.defaultUri !== uri) {
      const bound = this.findPrefix(uri);
      if (bound !== null) {
        prefix = bound;
      } else if (
        namespace.preferredPrefix === '' ||
        (namespace.preferredPrefix === null && this.preferDefaultNamespace)
      ) {
        declaration = 'default';
      } else {
        prefix = this.choosePrefix(namespace);
        declaration = 'prefix';
      }
    }

    this.sink.startElement(prefix, localName, uri);
    if (declaration === 'default') {
      this.defaultUri = uri;
      this.sink.namespace('', uri);
    } else if (declaration === 'prefix') {
      this.bind(prefix, uri);
    }

    this.level++;
    this.lastEvent = 'start';
    return { prefix, localName, uri, bindingCount, parentDefaultUri };
  }

  writeEndElement(scope: ElementScope): void {
    this.level--;
    if (this.lastEvent !== 'start' && this.lastEvent !== 'text') {
      this.writeIndentation();
    }
    this.sink.endElement(scope.prefix, scope.localName, scope.uri);
    this.bindings.length = scope.bindingCount;
    this.defaultUri = scope.parentDefaultUri;
    this.lastEvent = 'end';
  }

  /**
   * Write an attribute into the open start tag. Attributes in a namespace
   * always get a prefix.
   */
  writeAttribute(namespace: OutputNamespace, localName: string, value: string): void {
    let prefix = '';
    if (!namespace.isEmpty()) {
      const bound = this.findPrefix(namespace.uri);
      if (bound !== null) {
        prefix = bound;
      } else {
        prefix = this.choosePrefix(namespace);
        this.bind(prefix, namespace.uri);
      }
    }
    this.sink.attribute(prefix, localName, namespace.uri, value);
  }

  /**
   * Declare a namespace on the open start tag, unless a prefix for it is
   * already in scope. Predeclared namespaces always get a prefix.
   */
  writeNamespace(namespace: OutputNamespace): void {
    if (namespace.isEmpty() || this.findPrefix(namespace.uri) !== null) {
      return;
    }
    this.bind(this.choosePrefix(namespace), namespace.uri);
  }

  writeCharacters(text: string): void {
    this.sink.characters(text);
    this.lastEvent = 'text';
  }

  writeCData(text: string): void {
    this.sink.cdata(text);
    this.lastEvent = 'text';
  }

  writeEntityRef(name: string): void {
    this.sink.entityRef(name);
    this.lastEvent = 'text';
  }

  writeComment(text: string): void {
    this.indentMarkup();
    this.sink.comment(text);
    this.lastEvent = 'markup';
  }

  writeProcessingInstruction(target: string, data: string): void {
    this.indentMarkup();
    this.sink.processingInstruction(target, data);
    this.lastEvent = 'markup';
  }

  /**
   * Write queued simple content
   */
  writeContent(content: SimpleContent): void {
    switch (content.kind) {
      case ContentKind.Characters:
        this.writeCharacters(content.text);
        break;
      case ContentKind.CData:
        this.writeCData(content.text);
        break;
      case ContentKind.Comment:
        this.writeComment(content.text);
        break;
      case ContentKind.EntityRef:
        this.writeEntityRef(content.name);
        break;
      case ContentKind.ProcessingInstruction:
        this.writeProcessingInstruction(content.target, content.data);
        break;
      case ContentKind.Attribute:
        this.writeAttribute(content.namespace, content.localName, content.value);
        break;
      case ContentKind.Namespace:
        this.writeNamespace(content.namespace);
        break;
      default: {
        const unknown: never = content;
        throw new Error(`Unknown content: ${JSON.stringify(unknown)}`);
      }
    }
  }

  flush(): void {
    this.sink.flush();
  }

  // ============ Node factories ============

  createCharacters(text: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.Characters, text });
  }

  createCData(text: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.CData, text });
  }

  createComment(text: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.Comment, text });
  }

  createEntityRef(name: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.EntityRef, name });
  }

  createProcessingInstruction(target: string, data: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.ProcessingInstruction, target, data });
  }

  createAttribute(namespace: OutputNamespace, localName: string, value: string): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.Attribute, namespace, localName, value });
  }

  createNamespace(namespace: OutputNamespace): SimpleOutput {
    return new SimpleOutput({ kind: ContentKind.Namespace, namespace });
  }

  createElement(namespace: OutputNamespace, localName: string): OutputElement {
    return new OutputElement(this, namespace, localName);
  }

  createBufferedElement(namespace: OutputNamespace, localName: string): BufferedElement {
    return new BufferedElement(this, namespace, localName);
  }

  createBufferedFragment(): BufferedFragment {
    return new BufferedFragment(this);
  }

  // ============ Internal ============

  private bind(prefix: string, uri: string): void {
    this.bindings.push({ prefix, uri });
    this.sink.namespace(prefix, uri);
  }

  private isPrefixBound(prefix: string): boolean {
    return prefix === 'xml' || this.bindings.some((binding) => binding.prefix === prefix);
  }

  /**
   * The preferred prefix if it is free in scope, otherwise a generated one
   */
  private choosePrefix(namespace: OutputNamespace): string {
    const preferred = namespace.preferredPrefix;
    if (preferred && !this.isPrefixBound(preferred)) {
      return preferred;
    }
    let prefix: string;
    do {
      prefix = `${this.prefixBase}${this.prefixCounter++}`;
    } while (this.isPrefixBound(prefix));
    return prefix;
  }

  /**
   * Indentation before a start tag, comment, PI or DOCTYPE: not at the very
   * start of output, and not right after text
   */
  private indentMarkup(): void {
    if (this.lastEvent !== 'none' && this.lastEvent !== 'text') {
      this.writeIndentation();
    }
  }

  private writeIndentation(): void {
    if (this.indent === null) {
      return;
    }
    const length = this.indentOffset + this.level * this.indentStep;
    if (length > 0) {
      this.sink.space(this.indent.slice(0, length));
    }
  }
}

function checkPrefix(uri: string, prefix: string): void {
  if (prefix === 'xmlns' || (prefix === 'xml' && uri !== XML_NAMESPACE_URI)) {
    throw new Error(`Prefix '${prefix}' can not be bound to ${uri}`);
  }
  if (prefix.includes(':')) {
    throw new Error(`Invalid namespace prefix '${prefix}'`);
  }
}
