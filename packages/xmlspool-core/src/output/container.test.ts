/**
 * Container tests - queueing, blocking and release order
 */

import { describe, it, expect } from 'vitest';
import { XmlTextSink } from 'xmlspool-backend-xml';
import { TraceSink } from 'xmlspool-backend-trace';
import { createOutputDocument } from './document';
import { SimpleOutput, ContentKind } from './simple';
import { OutputState } from './element';
import { IllegalStateError, SinkError } from '../errors';
import type { OutputContainer } from './container';
import type { BufferedNode } from './buffered';

function newDocument() {
  const sink = new XmlTextSink();
  const doc = createOutputDocument(sink, { version: null });
  return { sink, doc };
}

describe('OutputContainer - direct output', () => {
  it('should write content straight through when nothing is pending', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    root.addCharacters('x');

    expect(sink.getOutput()).toBe('<root>x');
    expect(root.pendingChildren()).toEqual([]);
    expect(doc.pendingChildren()).toEqual([root]);
  });

  it('should render non-string character values', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    root.addCharacters(42);
    root.addCharacters(true);
    root.addCharacters(7n);
    doc.closeRoot();

    expect(sink.getOutput()).toBe('<root>42true7</root>');
  });

  it('should close the previous element when a sibling is added', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const first = root.addElement('first');
    root.addElement('second');

    expect(sink.getOutput()).toBe('<root><first/><second');
    expect(() => first.addCharacters('late')).toThrow(
      'Illegal call when OutputElement (/root/first) was closed'
    );
  });

  it('should add an element holding only text', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const title = root.addElementWithCharacters(null, 'title', 'Hello');
    doc.closeRoot();

    expect(title.localName).toBe('title');
    expect(sink.getOutput()).toBe('<root><title>Hello</title></root>');
  });

  it('should write every kind of simple content', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    root.addCData('raw');
    root.addComment(' note ');
    root.addEntityRef('nbsp');
    root.addProcessingInstruction('render', 'fast');
    doc.closeRoot();

    expect(sink.getOutput()).toBe(
      '<root><![CDATA[raw]]><!-- note -->&nbsp;<?render fast?></root>'
    );
  });
});

describe('OutputContainer - buffering', () => {
  it('should queue content behind an unreleased fragment', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    root.addCharacters('after');

    expect(sink.getOutput()).toBe('<root');
    const pending = root.pendingChildren();
    expect(pending).toHaveLength(2);
    expect(pending[0]).toBe(fragment);
    const queued = pending[1];
    expect(queued).toBeInstanceOf(SimpleOutput);
    if (queued instanceof SimpleOutput) {
      expect(queued.kind).toBe(ContentKind.Characters);
    }
  });

  it('should output a released fragment and what follows it in order', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    root.addCharacters('B');
    fragment.addCharacters('A');
    fragment.release();

    expect(sink.getOutput()).toBe('<root>AB');
    expect(root.pendingChildren()).toEqual([]);
  });

  it('should hold a released fragment back while it contains buffered content', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const outer = root.addBuffered(root.createBufferedFragment());
    outer.addCharacters('a');
    const inner = outer.addBuffered(outer.createBufferedFragment());
    outer.addCharacters('b');
    inner.addCharacters('f');

    outer.release();
    expect(sink.getOutput()).toBe('<root');

    inner.release();
    expect(sink.getOutput()).toBe('<root>afb');

    doc.closeRoot();
    expect(sink.getOutput()).toBe('<root>afb</root>');
  });

  it('should give the same output when the inner fragment is released first', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const outer = root.addBuffered(root.createBufferedFragment());
    outer.addCharacters('a');
    const inner = outer.addBuffered(outer.createBufferedFragment());
    outer.addCharacters('b');
    inner.addCharacters('f');

    inner.release();
    expect(sink.getOutput()).toBe('<root');

    outer.release();
    expect(sink.getOutput()).toBe('<root>afb');
  });

  it('should start an element queued behind a fragment once the fragment is released', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    const late = root.addElement('late');
    late.addAttribute('a', '1');
    late.addCharacters('t');

    expect(late.getState()).toBe(OutputState.None);
    expect(sink.getOutput()).toBe('<root');

    fragment.release();
    expect(late.getState()).toBe(OutputState.Open);
    expect(sink.getOutput()).toBe('<root><late a="1">t');

    doc.closeRoot();
    expect(sink.getOutput()).toBe('<root><late a="1">t</late></root>');
  });

  it('should keep a buffered child of an unreached element until the blocker is released', () => {
    const { sink, doc } = newDocument();
    const root = doc.addElement('root');
    const blocker = root.addBuffered(root.createBufferedFragment());
    const el = root.addElement('el');
    el.addAndReleaseBuffered(el.createBufferedElement('be'));

    expect(sink.getOutput()).toBe('<root');

    blocker.release();
    expect(sink.getOutput()).toBe('<root><el><be');

    doc.closeRoot();
    expect(sink.getOutput()).toBe('<root><el><be/></el></root>');
  });
});

describe('OutputContainer - linking errors', () => {
  it('should refuse to add a buffered node twice', () => {
    const { doc } = newDocument();
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());

    expect(() => root.addBuffered(fragment)).toThrow(IllegalStateError);
    expect(() => root.addBuffered(fragment)).toThrow(
      'Can not re-set parent of BufferedFragment (/root) once it has been set'
    );
  });

  it('should refuse to add a fragment inside itself', () => {
    const { doc } = newDocument();
    const fragment = doc.createBufferedFragment();

    expect(() => fragment.addBuffered(fragment)).toThrow(
      'Can not add BufferedFragment (/) inside itself'
    );
  });

  it('should refuse buffered nodes from another context', () => {
    const { doc } = newDocument();
    const other = newDocument().doc;
    const foreign = other.createBufferedElement('item');

    expect(() => doc.addBuffered(foreign)).toThrow(
      'Can not add BufferedElement (/item): it belongs to a different output context'
    );
  });
});

describe('OutputContainer - sink failures', () => {
  class FailingSink extends TraceSink {
    characters(text: string): void {
      if (text === 'boom') {
        throw new SinkError('disk full');
      }
      super.characters(text);
    }
  }

  it('should pass sink errors through and not write past the failure', () => {
    const sink = new FailingSink();
    const doc = createOutputDocument(sink, { version: null });
    const root = doc.addElement('root');
    const fragment = root.addBuffered(root.createBufferedFragment());
    fragment.addCharacters('a');
    fragment.addCharacters('boom');
    fragment.addCharacters('c');

    expect(() => fragment.release()).toThrow(SinkError);
    expect(() => doc.closeRoot()).toThrow('disk full');
    expect(sink.getLines()).toEqual(['startElement root', 'characters "a"']);
    expect(() => doc.closeRoot()).toThrow(IllegalStateError);
  });
});

type Shape =
  | { kind: 'text'; text: string }
  | { kind: 'element'; name: string; buffered: boolean; children: Shape[] }
  | { kind: 'fragment'; children: Shape[] };

/** Small seeded generator so failures can be replayed. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomShapes(random: () => number, depth: number, counter: { next: number }): Shape[] {
  const shapes: Shape[] = [];
  const count = Math.floor(random() * 4);
  for (let i = 0; i < count; i++) {
    const id = counter.next++;
    const roll = random();
    if (depth === 0 || roll < 0.3) {
      shapes.push({ kind: 'text', text: `t${id}` });
    } else if (roll < 0.5) {
      shapes.push({ kind: 'fragment', children: randomShapes(random, depth - 1, counter) });
    } else {
      shapes.push({
        kind: 'element',
        name: `e${id}`,
        buffered: roll < 0.75,
        children: randomShapes(random, depth - 1, counter),
      });
    }
  }
  return shapes;
}

function buildPlain(container: OutputContainer, shapes: Shape[]): void {
  for (const shape of shapes) {
    if (shape.kind === 'text') {
      container.addCharacters(shape.text);
    } else if (shape.kind === 'fragment') {
      buildPlain(container, shape.children);
    } else {
      buildPlain(container.addElement(shape.name), shape.children);
    }
  }
}

function buildBuffered(container: OutputContainer, shapes: Shape[], pending: BufferedNode[]): void {
  for (const shape of shapes) {
    if (shape.kind === 'text') {
      container.addCharacters(shape.text);
    } else if (shape.kind === 'fragment') {
      const fragment = container.addBuffered(container.createBufferedFragment());
      pending.push(fragment);
      buildBuffered(fragment, shape.children, pending);
    } else if (shape.buffered) {
      const element = container.addBuffered(container.createBufferedElement(shape.name));
      pending.push(element);
      buildBuffered(element, shape.children, pending);
    } else {
      buildBuffered(container.addElement(shape.name), shape.children, pending);
    }
  }
}

function shuffle<T>(items: T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function plainLines(shapes: Shape[]): string[] {
  const sink = new TraceSink();
  const doc = createOutputDocument(sink, { version: null });
  buildPlain(doc.addElement('root'), shapes);
  doc.closeRoot();
  return sink.getLines();
}

describe('OutputContainer - random trees', () => {
  it('should write released buffered trees in document order', () => {
    for (let seed = 1; seed <= 200; seed++) {
      const random = seededRandom(seed);
      const shapes = randomShapes(random, 4, { next: 0 });
      const expected = plainLines(shapes);

      const sink = new TraceSink();
      const doc = createOutputDocument(sink, { version: null });
      const pending: BufferedNode[] = [];
      buildBuffered(doc.addElement('root'), shapes, pending);

      for (const node of shuffle(pending, random)) {
        node.release();
        expect(expected.slice(0, sink.getLines().length), `seed ${seed}`).toEqual(sink.getLines());
      }
      doc.closeRoot();

      expect(sink.getLines(), `seed ${seed}`).toEqual(expected);
    }
  });

  it('should write partly released buffered trees in document order when closed', () => {
    for (let seed = 1; seed <= 200; seed++) {
      const random = seededRandom(seed * 7919);
      const shapes = randomShapes(random, 4, { next: 0 });
      const expected = plainLines(shapes);

      const sink = new TraceSink();
      const doc = createOutputDocument(sink, { version: null });
      const pending: BufferedNode[] = [];
      buildBuffered(doc.addElement('root'), shapes, pending);

      for (const node of shuffle(pending, random)) {
        if (random() < 0.5) {
          node.release();
        }
      }
      doc.closeRoot();

      expect(sink.getLines(), `seed ${seed}`).toEqual(expected);
    }
  });
});
