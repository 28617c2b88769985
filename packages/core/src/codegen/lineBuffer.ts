/**
 * LineBuffer helpers shared by the driver and the language providers
 */

import type { Documentation, LineBuffer } from '@styx/types';

export const INDENT = '    ';

export function indent(lines: LineBuffer, level = 1, unit = INDENT): LineBuffer {
  if (level === 0) return lines;
  const prefix = unit.repeat(level);
  return lines.map(line => (line.length > 0 ? prefix + line : line));
}

export function comment(lines: LineBuffer, marker: string): LineBuffer {
  return lines.map(line => (line.length > 0 ? `${marker} ${line}` : marker));
}

export function collapse(lines: LineBuffer): string {
  return lines.join('\n');
}

export function expand(text: string): LineBuffer {
  return text.split('\n');
}

/**
 * `blanks` empty lines before `lines`, unless `lines` is empty.
 */
export function blankBefore(lines: LineBuffer, blanks = 1): LineBuffer {
  return lines.length > 0 ? [...Array<string>(blanks).fill(''), ...lines] : lines;
}

export function blankAfter(lines: LineBuffer, blanks = 1): LineBuffer {
  return lines.length > 0 ? [...lines, ...Array<string>(blanks).fill('')] : lines;
}

export function enquote(text: string, quote = '"'): string {
  return `${quote}${text}${quote}`;
}

export function ensureEndsWith(text: string, suffix: string): string {
  return text.endsWith(suffix) ? text : text + suffix;
}

/**
 * Greedy word wrap. Existing line breaks are kept.
 */
export function linebreakParagraph(text: string, width = 80, firstLineWidth = width): LineBuffer {
  const lines: LineBuffer = [];
  for (const paragraph of text.split('\n')) {
    let current = '';
    let limit = lines.length === 0 ? firstLineWidth : width;
    for (const word of paragraph.split(' ')) {
      if (current.length > 0 && current.length + 1 + word.length > limit) {
        lines.push(current);
        current = word;
        limit = width;
      } else {
        current = current.length > 0 ? `${current} ${word}` : word;
      }
    }
    lines.push(current);
  }
  return lines;
}

/**
 * Human-readable docstring text: title, description, then URLs.
 */
export function docsToDocstring(docs: Documentation): string | undefined {
  const parts: string[] = [];
  if (docs.title) parts.push(docs.title);
  if (docs.description) parts.push(docs.description);
  if (docs.authors.length > 0) parts.push(`Author: ${docs.authors.join(', ')}`);
  if (docs.urls.length > 0) parts.push(`URL: ${docs.urls.join(', ')}`);
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}
