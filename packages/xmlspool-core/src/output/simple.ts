/**
 * Simple output nodes
 *
 * Content that can never block (text, CDATA, comments, entity references,
 * processing instructions, queued attributes and namespace declarations)
 * only becomes a node when it has to wait behind something buffered.
 * All kinds share one node class; the content itself is a closed union.
 */

import type { OutputContext } from '../output-context';
import type { OutputNamespace } from '../namespace';
import { Outputtable } from './outputtable';

/**
 * Simple content kinds
 */
export enum ContentKind {
  Characters = 'characters',
  CData = 'cdata',
  Comment = 'comment',
  EntityRef = 'entity-ref',
  ProcessingInstruction = 'processing-instruction',
  Attribute = 'attribute',
  Namespace = 'namespace',
}

export type SimpleContent =
  | { kind: ContentKind.Characters; text: string }
  | { kind: ContentKind.CData; text: string }
  | { kind: ContentKind.Comment; text: string }
  | { kind: ContentKind.EntityRef; name: string }
  | { kind: ContentKind.ProcessingInstruction; target: string; data: string }
  | { kind: ContentKind.Attribute; namespace: OutputNamespace; localName: string; value: string }
  | { kind: ContentKind.Namespace; namespace: OutputNamespace };

export class SimpleOutput extends Outputtable {
  constructor(readonly content: SimpleContent) {
    super();
  }

  get kind(): ContentKind {
    return this.content.kind;
  }

  doOutput(context: OutputContext, _canClose: boolean): boolean {
    context.writeContent(this.content);
    return true;
  }

  forceOutput(context: OutputContext): void {
    context.writeContent(this.content);
  }
}
