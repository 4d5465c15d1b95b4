import type { RenderedTree } from '../types/extraction.js';

/**
 * Absolute URLs of PDF documents linked from a page, deduplicated, in
 * document order. Fragments are dropped.
 */
export function findPdfLinks(tree: Pick<RenderedTree, 'links' | 'url'>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();

  for (const link of tree.links) {
    if (!link.href) continue;

    let resolved: URL;
    try {
      resolved = tree.url ? new URL(link.href, tree.url) : new URL(link.href);
    } catch {
      // Relative links in an HTML document without a base URL cannot be fetched.
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    if (!resolved.pathname.toLowerCase().endsWith('.pdf')) continue;

    resolved.hash = '';
    const key = resolved.toString();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(key);
  }

  return out;
}
