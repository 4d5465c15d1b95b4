import { JSDOM } from 'jsdom';

import type { ScriptPage } from '../render/types.js';

/**
 * A jsdom window exposed through the same script interface as a browser page.
 */
export interface JsdomPage extends ScriptPage {
  close(): void;
}

/**
 * Parse an HTML string into a scriptable jsdom window.
 *
 * Page scripts never run (`outside-only`); only our own snapshot and axe
 * sources are evaluated.
 */
export function createJsdomPage(html: string): JsdomPage {
  const dom = new JSDOM(html, { runScripts: 'outside-only', pretendToBeVisual: true });
  const { window } = dom;

  return {
    async evaluate<TResult>(expression: string): Promise<TResult> {
      const raw: unknown = await window.eval(
        `Promise.resolve(${expression}).then((value) => JSON.stringify(value))`,
      );
      if (typeof raw !== 'string') {
        throw new Error('Evaluated script did not return a JSON-serializable value');
      }
      return JSON.parse(raw);
    },
    async addScript(source: string): Promise<void> {
      window.eval(source);
    },
    close(): void {
      window.close();
    },
  };
}
