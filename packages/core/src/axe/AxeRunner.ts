import axe from 'axe-core';
import type { AxeResults, RunOptions } from 'axe-core';

import { buildInvocation } from '../extraction/pageScript.js';
import type { ScriptPage } from '../render/types.js';
import type { AxeFinding, AxeRunConfig } from '../types/axe.js';

import { normalizeAxeResults } from './normalize.js';

const DEFAULT_STANDARDS: NonNullable<AxeRunConfig['standards']> = ['wcag2a', 'wcag2aa', 'wcag22aa'];

export interface AxeRunOnPageOptions extends AxeRunConfig {
  /**
   * Stub canvas contexts before running; jsdom throws on `getContext` unless
   * the native `canvas` package is installed.
   */
  disableCanvas?: boolean;
}

/**
 * Thin wrapper around axe-core that injects it into any `ScriptPage`
 * (browser page or jsdom window) and normalizes the output.
 */
export class AxeRunner {
  async runOnPage(page: ScriptPage, options: AxeRunOnPageOptions = {}): Promise<AxeFinding[]> {
    if (options.disableCanvas) {
      await page.addScript(
        'if (typeof HTMLCanvasElement !== "undefined") { HTMLCanvasElement.prototype.getContext = function () { return null; }; }',
      );
    }
    await page.addScript(axe.source);

    const results = await page.evaluate<AxeResults>(
      buildInvocation(runAxeInPage, buildAxeRunOptions(options)),
    );
    return normalizeAxeResults(results);
  }
}

/**
 * In-page entry point; shipped as source, so it must stay self-contained.
 */
async function runAxeInPage(options: RunOptions): Promise<unknown> {
  const api: unknown = Reflect.get(globalThis, 'axe');
  if (typeof api !== 'object' || api === null || !('run' in api) || typeof api.run !== 'function') {
    throw new Error('axe-core is not available in the page');
  }
  return api.run(document, options);
}

function buildAxeRunOptions(config: AxeRunConfig): RunOptions {
  const options: RunOptions = {
    runOnly: { type: 'tag', values: config.standards ?? DEFAULT_STANDARDS },
    resultTypes: ['violations'],
  };
  if (config.rules) options.rules = config.rules;
  return options;
}
