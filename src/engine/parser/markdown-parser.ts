/**
 * Markdown Parser - turns raw Markdown into the block sequence the chunker works on
 *
 * Built on remark (mdast) with GFM tables. Each block keeps its exact source slice,
 * and the text between blocks is kept as gaps, so the document can be rebuilt byte for byte.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { List, ListItem, Node, RootContent, Table } from 'mdast';
import { ParseError } from '../errors.js';
import { createBlock, type Block, type BlockKind, type ParsedDocument } from '../types/document.js';

interface Span {
  block: Block;
  start: number;
  end: number;
}

const processor = unified().use(remarkParse).use(remarkGfm);

const OPENING_FENCE = /^ {0,3}(`{3,}|~{3,})/;
const CLOSING_FENCE = /^[ \t]*(`{3,}|~{3,})[ \t]*$/;

export function parseMarkdown(markdown: string): ParsedDocument {
  const tree = processor.parse(markdown);
  const spans: Span[] = [];

  for (const node of tree.children) {
    collectSpans(node, markdown, spans);
  }

  const blocks = spans.map((s) => s.block);
  const gaps: string[] = [];
  let cursor = 0;
  for (const span of spans) {
    gaps.push(markdown.slice(cursor, span.start));
    cursor = span.end;
  }
  gaps.push(markdown.slice(cursor));

  return { blocks, gaps };
}

function collectSpans(node: RootContent, source: string, spans: Span[]): void {
  switch (node.type) {
    case 'heading':
      pushSpan(spans, source, node, 'heading', node.depth);
      return;
    case 'code': {
      const span = pushSpan(spans, source, node, 'code-fence');
      assertFenceClosed(span.block.rawText, lineOf(node));
      return;
    }
    case 'html':
      pushSpan(spans, source, node, 'html');
      return;
    case 'thematicBreak':
      pushSpan(spans, source, node, 'thematic-break');
      return;
    case 'list':
      collectList(node, source, spans, 0);
      return;
    case 'table':
      collectTable(node, source, spans);
      return;
    default:
      // paragraph, blockquote, definitions and other flow content
      pushSpan(spans, source, node, 'paragraph');
  }
}

function collectList(list: List, source: string, spans: Span[], depth: number): void {
  for (const item of list.children) {
    collectListItem(item, source, spans, depth);
  }
}

/**
 * A list item becomes one block for its own content; nested lists are flattened
 * into blocks one level deeper, and any content after a nested list becomes a
 * paragraph at that deeper level.
 */
function collectListItem(item: ListItem, source: string, spans: Span[], depth: number): void {
  const [itemStart, itemEnd] = offsetsOf(item);
  let segmentStart: number | null = itemStart;
  let segmentEnd: number | null = null;
  let emittedItem = false;

  const flush = () => {
    if (segmentStart !== null && segmentEnd !== null) {
      const kind: BlockKind = emittedItem ? 'paragraph' : 'list-item';
      const level = emittedItem ? depth + 1 : depth;
      spans.push({
        block: createBlock(kind, source.slice(segmentStart, segmentEnd), level),
        start: segmentStart,
        end: segmentEnd,
      });
      emittedItem = true;
    }
    segmentStart = null;
    segmentEnd = null;
  };

  for (const child of item.children) {
    if (child.type === 'list') {
      flush();
      // the marker of an item whose first child is a list stays in the gap
      emittedItem = true;
      collectList(child, source, spans, depth + 1);
      continue;
    }
    const [start, end] = offsetsOf(child);
    if (child.type === 'code') {
      assertFenceClosed(source.slice(start, end), lineOf(child));
    }
    segmentStart ??= start;
    segmentEnd = end;
  }

  if (item.children.length === 0) {
    segmentEnd = itemEnd;
  }
  flush();
}

function collectTable(table: Table, source: string, spans: Span[]): void {
  const columns = table.align?.length ?? 0;
  for (const row of table.children) {
    const span = pushSpan(spans, source, row, 'table-row');
    const cells = countCells(span.block.rawText);
    if (columns > 0 && cells > columns) {
      throw new ParseError(
        `Malformed table: row has ${cells} cells but the table declares ${columns} columns`,
        lineOf(row)
      );
    }
  }
}

function pushSpan(spans: Span[], source: string, node: Node, kind: BlockKind, level = 0): Span {
  const [start, end] = offsetsOf(node);
  const span: Span = { block: createBlock(kind, source.slice(start, end), level), start, end };
  spans.push(span);
  return span;
}

function offsetsOf(node: Node): [number, number] {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  if (start === undefined || end === undefined) {
    throw new ParseError(`Node "${node.type}" has no source position`);
  }
  return [start, end];
}

function lineOf(node: Node): number | undefined {
  return node.position?.start.line;
}

/**
 * Indented code needs no closing fence; fenced code must end with a fence of the
 * same character that is at least as long as the opening one.
 */
function assertFenceClosed(raw: string, line: number | undefined): void {
  const lines = raw.split('\n');
  const opening = OPENING_FENCE.exec(lines[0] ?? '');
  if (!opening) return;

  while (lines.length > 1 && lines[lines.length - 1]?.trim() === '') {
    lines.pop();
  }
  const fence = opening[1] ?? '';
  const closing = lines.length > 1 ? CLOSING_FENCE.exec((lines[lines.length - 1] ?? '').trimEnd()) : null;
  const closer = closing?.[1];

  if (!closer || closer[0] !== fence[0] || closer.length < fence.length) {
    throw new ParseError('Unterminated code fence', line);
  }
}

/**
 * Count GFM table cells in a raw row, ignoring escaped pipes and the optional
 * leading and trailing pipe.
 */
export function countCells(row: string): number {
  let text = row.trim();
  if (text.startsWith('|')) text = text.slice(1);
  if (text.endsWith('|') && !text.endsWith('\\|')) text = text.slice(0, -1);
  return text.split(/(?<!\\)\|/).length;
}

export { blockKinds } from '../types/document.js';
