/**
 * Render a document description through the output tree
 *
 * Plain nodes are written as they are added. Buffered nodes are built
 * detached (their whole content is added before they are attached), then
 * added and released. Deferred nodes are added unreleased and only released
 * once all their following siblings have been added, so the siblings are
 * held back in memory until then.
 */

import {
  XML_NAMESPACE_URI,
  createOutputDocument,
  type BufferedNode,
  type OutputContainer,
  type OutputElement,
  type OutputNamespace,
  type XmlSink,
} from 'xmlspool-core';
import type { DocumentDescription, ElementDescription, NodeDescription } from './description';

export interface RenderOptions {
  /** Do not write the XML declaration */
  omitDeclaration?: boolean;
  /** Spaces per nesting level; 0 disables indentation */
  indent?: number;
}

/** Deepest nesting level that gets its full indentation */
const MAX_INDENT_LEVELS = 32;

export function renderDescription(
  description: DocumentDescription,
  sink: XmlSink,
  options: RenderOptions = {}
): void {
  const declaration = description.declaration ?? {};
  const indent = options.indent ?? 0;
  const doc = createOutputDocument(sink, {
    version: options.omitDeclaration ? null : declaration.version ?? '1.0',
    encoding: declaration.encoding ?? null,
    standalone: declaration.standalone ?? null,
    indentation:
      indent > 0 ? { indent: '\n' + ' '.repeat(indent * MAX_INDENT_LEVELS), startOffset: 1, step: indent } : null,
  });

  const namespaces = new Map<string, OutputNamespace>();
  for (const [prefix, uri] of Object.entries(description.namespaces ?? {})) {
    namespaces.set(prefix, doc.getNamespace(uri, prefix));
  }
  namespaces.set('xml', doc.getNamespace(XML_NAMESPACE_URI));

  if (description.doctype) {
    const { name, systemId, publicId, internalSubset } = description.doctype;
    doc.addDoctypeDeclaration(name, systemId ?? null, publicId ?? null, internalSubset ?? null);
  }

  new Renderer(namespaces).renderChildren(doc, [description.root]);
  doc.closeRoot();
}

class Renderer {
  constructor(private readonly namespaces: Map<string, OutputNamespace>) {}

  /**
   * Add the nodes to the container in order, releasing deferred nodes
   * after the last of them
   */
  renderChildren(container: OutputContainer, nodes: NodeDescription[]): void {
    const deferred: BufferedNode[] = [];
    for (const node of nodes) {
      const held = this.renderNode(container, node);
      if (held) {
        deferred.push(held);
      }
    }
    for (const node of deferred) {
      node.release();
    }
  }

  /**
   * @returns the node to release later, for deferred nodes
   */
  private renderNode(container: OutputContainer, node: NodeDescription): BufferedNode | null {
    if ('element' in node) {
      return this.renderElement(container, node);
    }
    if ('fragment' in node) {
      const fragment = container.createBufferedFragment();
      this.renderChildren(fragment, node.fragment);
      return this.attach(container, fragment, node.deferred ?? false);
    }
    if ('text' in node) {
      container.addCharacters(node.text);
    } else if ('cdata' in node) {
      container.addCData(node.cdata);
    } else if ('comment' in node) {
      container.addComment(node.comment);
    } else if ('entity' in node) {
      container.addEntityRef(node.entity);
    } else {
      container.addProcessingInstruction(node.pi, node.data ?? '');
    }
    return null;
  }

  private renderElement(container: OutputContainer, node: ElementDescription): BufferedNode | null {
    const ns = node.ns !== undefined ? this.lookup(node.ns) : null;
    const deferred = node.deferred ?? false;
    if (!node.buffered && !deferred) {
      this.fillElement(container.addElement(ns, node.element), node);
      return null;
    }
    const element = container.createBufferedElement(ns, node.element);
    this.fillElement(element, node);
    return this.attach(container, element, deferred);
  }

  private fillElement(element: OutputElement, node: ElementDescription): void {
    for (const [name, value] of Object.entries(node.attributes ?? {})) {
      const colon = name.indexOf(':');
      if (colon < 0) {
        element.addAttribute(name, value);
      } else {
        element.addAttribute(this.lookup(name.slice(0, colon)), name.slice(colon + 1), value);
      }
    }
    this.renderChildren(element, node.children ?? []);
  }

  private attach(container: OutputContainer, node: BufferedNode, deferred: boolean): BufferedNode | null {
    if (deferred) {
      container.addBuffered(node);
      return node;
    }
    container.addAndReleaseBuffered(node);
    return null;
  }

  private lookup(prefix: string): OutputNamespace {
    const namespace = this.namespaces.get(prefix);
    if (!namespace) {
      throw new Error(`Undeclared namespace prefix '${prefix}'`);
    }
    return namespace;
  }
}
