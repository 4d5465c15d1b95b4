import type { ScriptPage } from '../render/types.js';
import type { AxeFinding } from '../types/axe.js';
import type { PageSnapshot, RenderedTree } from '../types/extraction.js';

import { buildInvocation, collectPageSnapshot, type SnapshotArgs } from './pageScript.js';

const DEFAULT_MAX_TEXT_LENGTH = 300;
const DEFAULT_MAX_CONTRAST_SAMPLES = 1_000;

/**
 * Run the snapshot script in a page (browser or jsdom).
 */
export async function snapshotPage(
  page: Pick<ScriptPage, 'evaluate'>,
  options: Partial<SnapshotArgs> & { collectContrast: boolean },
): Promise<PageSnapshot> {
  const args: SnapshotArgs = {
    maxTextLength: options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH,
    maxContrastSamples: options.maxContrastSamples ?? DEFAULT_MAX_CONTRAST_SAMPLES,
    collectContrast: options.collectContrast,
  };
  return page.evaluate<PageSnapshot>(buildInvocation(collectPageSnapshot, args));
}

/**
 * Attach render metadata to a snapshot.
 *
 * `contrast` becomes `null` when it was not collected, which is what makes
 * contrast checks skip instead of passing silently.
 */
export function toRenderedTree(
  snapshot: PageSnapshot,
  meta: {
    url: string | null;
    settled: boolean;
    contrastCollected: boolean;
    axe?: AxeFinding[] | null;
  },
): RenderedTree {
  const tree: RenderedTree = {
    ...snapshot,
    url: meta.url,
    settled: meta.settled,
    contrast: meta.contrastCollected ? snapshot.contrast : null,
  };
  if (meta.axe !== undefined) tree.axe = meta.axe;
  return tree;
}
