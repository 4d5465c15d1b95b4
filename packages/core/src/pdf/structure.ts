import { PDFArray, PDFDict, PDFName, PDFNumber, PDFRef, type PDFDocument, type PDFObject } from 'pdf-lib';

import { get, getDict, integer, name, text } from './document.js';

/**
 * A structure element of the tag tree.
 */
export interface StructElement {
  /** Type as written in the file (`/S`). */
  type: string;

  /** Standard type after following the RoleMap. */
  role: string;

  /** Position in the tree, e.g. `Document[1]/Sect[2]/Figure[1]`. */
  path: string;

  /** 0-based page index, when the element or an ancestor names one. */
  pageIndex: number | null;

  alt: string | null;
  actualText: string | null;
}

/**
 * A marked-content reference, in structure (logical reading) order.
 */
export interface MarkedContentRef {
  pageIndex: number;
  mcid: number;
}

export interface StructureTree {
  elements: StructElement[];
  markedContent: MarkedContentRef[];
}

const MAX_ELEMENTS = 100_000;
const MAX_ROLE_HOPS = 16;

/**
 * Read the tag tree rooted at `/StructTreeRoot`, or `null` when the document
 * is untagged.
 */
export function readStructureTree(doc: PDFDocument): StructureTree | null {
  const root = getDict(doc.catalog, 'StructTreeRoot');
  if (!root) return null;

  const pageIndexByRef = new Map<string, number>();
  doc.getPages().forEach((page, index) => pageIndexByRef.set(page.ref.toString(), index));

  const roleMap = getDict(root, 'RoleMap');
  const tree: StructureTree = { elements: [], markedContent: [] };
  const visited = new Set<string>();

  const resolveRole = (type: string): string => {
    let role = type;
    const seen = new Set<string>([role]);
    for (let hop = 0; roleMap && hop < MAX_ROLE_HOPS; hop += 1) {
      const mapped = name(get(roleMap, role));
      if (mapped === null || seen.has(mapped)) break;
      seen.add(mapped);
      role = mapped;
    }
    return role;
  };

  const pageOf = (dict: PDFDict, inherited: number | null): number | null => {
    const pg = dict.get(PDFName.of('Pg'));
    if (pg instanceof PDFRef) return pageIndexByRef.get(pg.toString()) ?? inherited;
    return inherited;
  };

  const visitKids = (kids: PDFObject | undefined, parentPath: string, page: number | null, lookup: PDFDict): void => {
    const items: PDFObject[] = [];
    const list = kids instanceof PDFRef ? lookup.context.lookup(kids) : kids;
    if (list instanceof PDFArray) {
      for (let i = 0; i < list.size(); i += 1) {
        const item = list.get(i);
        if (item) items.push(item);
      }
    } else if (kids) {
      items.push(kids);
    }

    const counters = new Map<string, number>();
    for (const raw of items) {
      if (tree.elements.length >= MAX_ELEMENTS) return;

      if (raw instanceof PDFRef) {
        const key = raw.toString();
        if (visited.has(key)) continue;
        visited.add(key);
      }
      const kid = raw instanceof PDFRef ? lookup.context.lookup(raw) : raw;

      if (kid instanceof PDFNumber) {
        const mcid = integer(kid);
        if (mcid !== null && page !== null) tree.markedContent.push({ pageIndex: page, mcid });
        continue;
      }
      if (!(kid instanceof PDFDict)) continue;

      const kind = name(get(kid, 'Type'));
      if (kind === 'MCR') {
        const mcid = integer(get(kid, 'MCID'));
        const mcrPage = pageOf(kid, page);
        if (mcid !== null && mcrPage !== null) tree.markedContent.push({ pageIndex: mcrPage, mcid });
        continue;
      }
      if (kind === 'OBJR') continue;

      const type = name(get(kid, 'S'));
      if (type === null) continue;

      const index = (counters.get(type) ?? 0) + 1;
      counters.set(type, index);
      const path = `${parentPath ? `${parentPath}/` : ''}${type}[${index}]`;
      const elementPage = pageOf(kid, page);

      tree.elements.push({
        type,
        role: resolveRole(type),
        path,
        pageIndex: elementPage,
        alt: text(get(kid, 'Alt')),
        actualText: text(get(kid, 'ActualText')),
      });

      // Unresolved, so references to kids go through the cycle check.
      visitKids(kid.get(PDFName.of('K')), path, elementPage, kid);
    }
  };

  visitKids(root.get(PDFName.of('K')), '', null, root);
  return tree;
}
