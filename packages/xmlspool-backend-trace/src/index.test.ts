/**
 * Trace sink tests
 */

import { describe, it, expect } from 'vitest';
import { TraceSink, createTraceSink } from './index';

describe('TraceSink', () => {
  it('should record one line per call', () => {
    const sink = createTraceSink();
    sink.startDocument('1.0', 'UTF-8', null);
    sink.doctype('r', 'r.dtd', '-//Example//EN', null);
    sink.startElement('p', 'r', 'urn:p');
    sink.namespace('p', 'urn:p');
    sink.namespace('', 'urn:d');
    sink.attribute('', 'id', '', 'a"1');
    sink.characters('text\n');
    sink.cdata('raw');
    sink.comment('note');
    sink.entityRef('amp');
    sink.processingInstruction('pi', 'data');
    sink.processingInstruction('bare', '');
    sink.space('\n  ');
    sink.endElement('p', 'r', 'urn:p');
    sink.endDocument();
    sink.flush();

    expect(sink.getLines()).toEqual([
      'startDocument 1.0 encoding=UTF-8',
      'doctype r public="-//Example//EN" system="r.dtd"',
      'startElement p:r {urn:p}',
      'namespace xmlns:p="urn:p"',
      'namespace xmlns="urn:d"',
      'attribute id="a\\"1"',
      'characters "text\\n"',
      'cdata "raw"',
      'comment "note"',
      'entityRef amp',
      'processingInstruction pi "data"',
      'processingInstruction bare',
      'space "\\n  "',
      'endElement p:r',
      'endDocument',
      'flush',
    ]);
  });

  it('should join lines for getOutput and forget them on clear', () => {
    const sink = new TraceSink();
    sink.startElement('', 'a', '');
    sink.endElement('', 'a', '');

    expect(sink.getOutput()).toBe('startElement a\nendElement a');

    sink.clear();
    expect(sink.getLines()).toEqual([]);
    expect(sink.getOutput()).toBe('');
  });
});
