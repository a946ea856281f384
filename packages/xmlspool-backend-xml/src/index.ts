/**
 * XML text backend for xmlspool
 */

export { XmlTextSink, createXmlSink } from './xml-sink';
export { type OutputStream, StringStream, StdoutStream, FileStream } from './streams';
export { escapeText, escapeAttribute, cdataBody, qualifiedName } from './escape';
