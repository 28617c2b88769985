/**
 * Documentation helpers
 */

import type { Documentation } from '@styx/types';

export function emptyDocs(): Documentation {
  return { authors: [], literature: [], urls: [] };
}

export function createDocs(partial: Partial<Documentation> = {}): Documentation {
  return {
    title: partial.title,
    description: partial.description,
    authors: [...(partial.authors ?? [])],
    literature: [...(partial.literature ?? [])],
    urls: [...(partial.urls ?? [])],
  };
}

function joinText(a: string | undefined, b: string | undefined, separator: string): string | undefined {
  if (a === undefined) return b;
  if (b === undefined || a === b) return a;
  return `${a}${separator}${b}`;
}

/**
 * Merge the docs of an inlined struct with those of its only child.
 * Equal texts are kept once; differing titles join with ": ",
 * differing descriptions with a blank line. Lists concatenate.
 */
export function mergeDocs(outer: Documentation, inner: Documentation): Documentation {
  return {
    title: joinText(outer.title, inner.title, ': '),
    description: joinText(outer.description, inner.description, '\n\n'),
    authors: [...outer.authors, ...inner.authors],
    literature: [...outer.literature, ...inner.literature],
    urls: [...outer.urls, ...inner.urls],
  };
}
