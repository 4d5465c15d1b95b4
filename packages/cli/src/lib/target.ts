import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidTargetError, type AuditTarget } from '@accessaudit/core';

const URL_LIKE = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turn a command-line argument into an audit target: anything with a scheme is
 * a web page, otherwise a `.pdf` or `.html` file relative to `cwd`.
 */
export async function readTarget(input: string, cwd: string): Promise<AuditTarget> {
  if (URL_LIKE.test(input)) return { kind: 'web', url: input };

  const file = path.resolve(cwd, input);
  const filename = path.basename(file);
  const ext = path.extname(file).toLowerCase();
  if (ext !== '.pdf' && ext !== '.html' && ext !== '.htm') {
    throw new InvalidTargetError(`Expected a URL, a .pdf or an .html file: ${input}`);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(file);
  } catch (error) {
    throw new InvalidTargetError(`Cannot read ${input}`, { cause: error });
  }

  return ext === '.pdf'
    ? { kind: 'pdf', bytes: new Uint8Array(bytes), filename }
    : { kind: 'html', html: bytes.toString('utf8'), filename };
}
