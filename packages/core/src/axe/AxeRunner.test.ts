import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { createJsdomPage } from '../extraction/jsdomPage.js';
import type { AxeRunConfig } from '../types/axe.js';

import { AxeRunner } from './AxeRunner.js';
import { impactToSeverity, normalizeAxeResults } from './normalize.js';

const here = dirname(fileURLToPath(import.meta.url));
const fixturePath = join(here, '__fixtures__', 'violations.html');

async function runOnFixture(config: AxeRunConfig = {}) {
  const page = createJsdomPage(readFileSync(fixturePath, 'utf8'));
  try {
    return await new AxeRunner().runOnPage(page, { ...config, disableCanvas: true });
  } finally {
    page.close();
  }
}

describe('AxeRunner (jsdom)', () => {
  it('detects common accessibility violations', async () => {
    const findings = await runOnFixture();

    const ids = new Set(findings.map((f) => f.id));
    expect(ids.has('image-alt')).toBe(true);
    expect(ids.has('link-name')).toBe(true);
    expect(ids.has('label')).toBe(true);
  });

  it('honours per-rule configuration', async () => {
    const findings = await runOnFixture({ rules: { 'image-alt': { enabled: false } } });

    expect(findings.some((f) => f.id === 'image-alt')).toBe(false);
  });
});

describe('normalizeAxeResults', () => {
  it('maps impacts and keeps one finding per rule and element', () => {
    const findings = normalizeAxeResults({
      violations: [
        {
          id: 'image-alt',
          impact: 'critical',
          help: 'Images must have alternate text',
          helpUrl: '',
          description: '',
          tags: ['cat.text-alternatives', 'wcag2a', 'wcag111'],
          nodes: [
            { target: ['img'], html: '<img>', impact: 'serious', any: [], all: [], none: [] },
            { target: ['img'], html: '<img>', impact: 'serious', any: [], all: [], none: [] },
            { target: ['#hero'], html: '<img>', any: [], all: [], none: [] },
          ],
        },
      ],
    });

    expect(findings).toEqual([
      { id: 'image-alt', severity: 'serious', help: 'Images must have alternate text', selector: 'img', tags: ['wcag111'] },
      { id: 'image-alt', severity: 'critical', help: 'Images must have alternate text', selector: '#hero', tags: ['wcag111'] },
    ]);
  });

  it('treats unknown impacts as moderate', () => {
    expect(impactToSeverity(undefined)).toBe('moderate');
    expect(impactToSeverity('minor')).toBe('minor');
  });
});
