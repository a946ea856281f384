/**
 * xmlspool core - streaming XML output tree
 *
 * - Output tree: elements, fragments and simple content written through to
 *   a sink as soon as they are final, with buffered nodes for content
 *   built out of document order
 * - Output context: namespaces, prefix scoping, indentation
 * - Sink interface (backend abstraction)
 */

export * from './errors';
export * from './sink';
export * from './namespace';
export * from './output-context';
export { Outputtable } from './output/outputtable';
export { ContentKind, SimpleOutput, type SimpleContent } from './output/simple';
export { OutputContainer, type TextValue } from './output/container';
export { OutputElement, OutputState } from './output/element';
export { BufferedElement, BufferedFragment, type BufferedNode } from './output/buffered';
export {
  OutputDocument,
  RootContainer,
  RootFragment,
  createOutputDocument,
  createOutputFragment,
  type DocumentOptions,
} from './output/document';
