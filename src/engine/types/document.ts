/**
 * Document model - structural view of a parsed Markdown document
 */

export type BlockKind =
  | 'heading'
  | 'paragraph'
  | 'list-item'
  | 'code-fence'
  | 'table-row'
  | 'html'
  | 'thematic-break'
  | 'blank';

export interface Block {
  readonly kind: BlockKind;
  /** Heading depth (1-6) or list nesting depth (0 = top level); 0 elsewhere */
  readonly level: number;
  /** Source text of the block, markup included */
  readonly rawText: string;
  /** Atomic blocks are never split and may exceed the chunk budget on their own */
  readonly atomic: boolean;
}

/**
 * `gaps` has one more entry than `blocks`: gaps[0] precedes the first block,
 * gaps[i] sits between blocks i-1 and i, and the last gap follows the last block.
 */
export interface ParsedDocument {
  readonly blocks: readonly Block[];
  readonly gaps: readonly string[];
}

const ATOMIC_KINDS: ReadonlySet<BlockKind> = new Set<BlockKind>(['code-fence', 'table-row']);

export function isAtomicKind(kind: BlockKind): boolean {
  return ATOMIC_KINDS.has(kind);
}

export function createBlock(kind: BlockKind, rawText: string, level = 0): Block {
  return Object.freeze({ kind, level, rawText, atomic: isAtomicKind(kind) });
}

/**
 * Rebuild the source text from blocks and gaps
 */
export function renderDocument(document: ParsedDocument): string {
  let text = document.gaps[0] ?? '';
  document.blocks.forEach((block, i) => {
    text += block.rawText + (document.gaps[i + 1] ?? '');
  });
  return text;
}

export function blockKinds(document: ParsedDocument): BlockKind[] {
  return document.blocks.map((b) => b.kind);
}
