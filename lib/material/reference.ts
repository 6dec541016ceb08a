// lib/material/reference.ts

/** Bibliographic record of a dataset, cited in the order stored on a Material. */
export type Reference = {
  key: string;
  type: 'article' | 'dataset' | 'book' | 'misc';
  authors: string[];
  title: string;
  journal?: string;
  volume?: string;
  pages?: string;
  year: number;
  doi?: string;
  url?: string;
};

function formatAuthors(authors: string[]): string {
  if (authors.length <= 2) return authors.join(' and ');
  return `${authors.slice(0, -1).join(', ')}, and ${authors[authors.length - 1]}`;
}

/** One-line citation: `Authors: Title. Journal Volume, Pages (Year). doi:…` */
export function formatReference(ref: Reference): string {
  let out = `${formatAuthors(ref.authors)}: ${ref.title}.`;
  if (ref.journal) {
    out += ` ${ref.journal}`;
    if (ref.volume) out += ` ${ref.volume}`;
    if (ref.pages) out += `, ${ref.pages}`;
  }
  out += ` (${ref.year}).`;
  if (ref.doi) out += ` doi:${ref.doi}`;
  else if (ref.url) out += ` ${ref.url}`;
  return out;
}
