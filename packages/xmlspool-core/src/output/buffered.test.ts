/**
 * Buffered fragment and element tests
 */

import { describe, it, expect } from 'vitest';
import { XmlTextSink } from 'xmlspool-backend-xml';
import { TraceSink } from 'xmlspool-backend-trace';
import { createOutputDocument } from './document';
import { OutputState } from './element';

function newDocument() {
  const sink = new XmlTextSink();
  const doc = createOutputDocument(sink, { version: null });
  return { sink, doc };
}

describe('BufferedFragment', () => {
  it('should report its buffering state', () => {
    const { doc } = newDocument();
    const fragment = doc.createBufferedFragment();

    expect(fragment.isBuffered()).toBe(true);
    expect(fragment.isReleased()).toBe(false);
    expect(fragment.getState()).toBe(OutputState.None);

    fragment.release();
    expect(fragment.isBuffered()).toBe(false);
    expect(fragment.isReleased()).toBe(true);
  });

  it('should output content released before the fragment was added', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.createBufferedFragment();
    fragment.addCharacters('x');
    fragment.release();
    expect(sink.getOutput()).toBe('<root');

    root.addBuffered(fragment);
    expect(sink.getOutput()).toBe('<root>x');
  });

  it('should ignore a second release', () => {
    const sink = new TraceSink();
    const doc = createOutputDocument(sink, { version: null });
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    fragment.addCharacters('once');
    fragment.release();
    fragment.release();
    doc.closeRoot();

    expect(sink.getLines()).toEqual([
      'startElement root',
      'characters "once"',
      'endElement root',
      'endDocument',
      'flush',
    ]);
  });

  it('should output unreleased content when the document is closed', () => {
    const sink = new TraceSink();
    const doc = createOutputDocument(sink, { version: null });
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    fragment.addCharacters('x');
    root.addCharacters('y');
    doc.closeRoot();

    expect(fragment.getState()).toBe(OutputState.Closed);
    expect(sink.getLines()).toEqual([
      'startElement root',
      'characters "x"',
      'characters "y"',
      'endElement root',
      'endDocument',
      'flush',
    ]);
  });

  it('should be transparent in paths', () => {
    const { doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    const inner = fragment.addElement('inner');

    expect(inner.getPath()).toBe('/root/inner');
  });
});

describe('BufferedElement', () => {
  it('should hold back a released element until its buffered child is released', () => {
    const { sink, doc } = newDocument();
    const e1 = doc.addBuffered(doc.createBufferedElement('e1'));
    const e2 = e1.addBuffered(e1.createBufferedElement('e2'));

    e1.release();
    expect(sink.getOutput()).toBe('');

    e2.release();
    expect(sink.getOutput()).toBe('<e1><e2/>');

    doc.closeRoot();
    expect(sink.getOutput()).toBe('<e1><e2/></e1>');
  });

  it('should output nested elements once both are released, inner first', () => {
    const { sink, doc } = newDocument();
    const e1 = doc.addBuffered(doc.createBufferedElement('e1'));
    const e2 = e1.addBuffered(e1.createBufferedElement('e2'));

    e2.release();
    expect(sink.getOutput()).toBe('');

    e1.release();
    expect(sink.getOutput()).toBe('<e1><e2/>');
  });

  it('should keep attributes added while detached', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const item = root.createBufferedElement('item');
    item.addAttribute('id', 7);
    item.addCharacters('t');
    expect(item.getState()).toBe(OutputState.None);

    root.addAndReleaseBuffered(item);
    expect(sink.getOutput()).toBe('<root><item id="7">t');

    doc.closeRoot();
    expect(sink.getOutput()).toBe('<root><item id="7">t</item></root>');
  });

  it('should create elements in the namespace it is given', () => {
    const { sink, doc } = newDocument();
    const ns = doc.getNamespace('urn:b', 'b');
    const root = doc.addElement('root');
    const item = root.addAndReleaseBuffered(root.createBufferedElement(ns, 'item'));
    doc.closeRoot();

    expect(item.namespace).toBe(ns);
    expect(sink.getOutput()).toBe('<root><b:item xmlns:b="urn:b"/></root>');
  });

  it('should let siblings added later wait for it', () => {
    const sink = new TraceSink();
    const doc = createOutputDocument(sink, { version: null });
    const root = doc.addElement('root');
    const header = root.addBuffered(root.createBufferedElement('header'));
    root.addElementWithCharacters(null, 'body', 'text');
    header.addCharacters('title');
    expect(sink.getLines()).toEqual(['startElement root']);

    header.release();
    expect(sink.getLines()).toEqual([
      'startElement root',
      'startElement header',
      'characters "title"',
      'endElement header',
      'startElement body',
      'characters "text"',
    ]);
  });
});
