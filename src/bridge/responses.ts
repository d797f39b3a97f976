/**
 * Response parsing
 *
 * A response is free text around exactly one labeled fenced code block that
 * holds the full replacement source.
 */

import { MalformedResponse } from '../errors.js';

const FENCE = /^(`{3,})[ \t]*([^\s`]*)[^\n]*$/;

export interface CodeBlock {
  label: string;
  body: string;
}

/**
 * Split markdown into its fenced blocks. An unterminated fence swallows the
 * rest of the document and is not reported.
 */
export function extractCodeBlocks(markdown: string): CodeBlock[] {
  const lines = markdown.replace(/\r\n/g, '\n').split('\n');
  const blocks: CodeBlock[] = [];
  let open: { fence: string; label: string; body: string[] } | null = null;

  for (const line of lines) {
    if (open) {
      const trimmed = line.trim();
      if (trimmed.startsWith(open.fence) && /^`+$/.test(trimmed)) {
        blocks.push({ label: open.label, body: open.body.join('\n') });
        open = null;
      } else {
        open.body.push(line);
      }
      continue;
    }
    const match = line.match(FENCE);
    if (match) {
      open = { fence: match[1], label: match[2], body: [] };
    }
  }

  return blocks;
}

/**
 * Return the source held by the response's single labeled block.
 */
export function parseResponse(requestId: number, markdown: string): string {
  const labeled = extractCodeBlocks(markdown).filter((block) => block.label.length > 0);
  if (labeled.length === 0) {
    throw new MalformedResponse(requestId, 'no labeled code block');
  }
  if (labeled.length > 1) {
    throw new MalformedResponse(requestId, `expected one labeled code block, found ${labeled.length}`);
  }
  const source = labeled[0].body;
  if (source.trim().length === 0) {
    throw new MalformedResponse(requestId, 'code block is empty');
  }
  return source.endsWith('\n') ? source : source + '\n';
}

/**
 * A fence longer than any backtick run in `source`, so the block cannot be
 * closed early by the source's own content.
 */
export function fenceFor(source: string): string {
  const longest = (source.match(/`+/g) ?? []).reduce((max, run) => Math.max(max, run.length), 0);
  return '`'.repeat(Math.max(3, longest + 1));
}

/**
 * Wrap a generated source in the response shape parseResponse accepts.
 */
export function formatResponse(source: string, language: string, note?: string): string {
  const body = source.replace(/\n$/, '');
  const prefix = note ? `${note.trim()}\n\n` : '';
  const fence = fenceFor(body);
  return `${prefix}${fence}${language}\n${body}\n${fence}\n`;
}
