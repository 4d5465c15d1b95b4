import {
  decodePDFRawStream,
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRawStream,
  PDFRef,
  PDFStream,
  PDFString,
  type PDFObject,
  type PDFPage,
} from 'pdf-lib';

import { UnreadablePdfError } from '../errors.js';

import { IDENTITY, toMatrix, type ColorSpaceKind, type ContentResources, type XObject } from './content.js';
import { parseContentStream, type ContentOperation } from './lexer.js';

/**
 * Parse PDF bytes. Encrypted documents load too; their strings and streams
 * stay unreadable.
 */
export async function loadPdf(bytes: Uint8Array, filename: string): Promise<PDFDocument> {
  try {
    const doc = await PDFDocument.load(bytes, {
      ignoreEncryption: true,
      updateMetadata: false,
      throwOnInvalidObject: false,
    });
    // Walking the page tree surfaces a broken catalog here rather than mid-audit.
    doc.getPages();
    return doc;
  } catch (error) {
    throw new UnreadablePdfError(filename, { cause: error });
  }
}

export function name(value: PDFObject | undefined): string | null {
  if (!(value instanceof PDFName)) return null;
  return value
    .asString()
    .replace(/^\//, '')
    .replace(/#([0-9a-fA-F]{2})/g, (_, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)));
}

export function text(value: PDFObject | undefined): string | null {
  if (value instanceof PDFString || value instanceof PDFHexString) return value.decodeText();
  return null;
}

export function integer(value: PDFObject | undefined): number | null {
  if (!(value instanceof PDFNumber)) return null;
  const n = value.asNumber();
  return Number.isInteger(n) ? n : null;
}

/**
 * Resolve `key` on `dict`, following an indirect reference.
 */
export function get(dict: PDFDict, key: string): PDFObject | undefined {
  const value = dict.get(PDFName.of(key));
  return value instanceof PDFRef ? dict.context.lookup(value) : value;
}

export function getDict(dict: PDFDict, key: string): PDFDict | null {
  const value = get(dict, key);
  return value instanceof PDFDict ? value : null;
}

/**
 * Decoded bytes of a stream. Throws for filters pdf-lib cannot decode.
 */
export function streamBytes(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) return decodePDFRawStream(stream).decode();
  return stream.getContents();
}

/**
 * The concatenated content streams of a page, tokenized.
 */
export function pageOperations(page: PDFPage): ContentOperation[] {
  const contents = page.node.Contents();
  if (!contents) return [];

  const streams: PDFStream[] = [];
  if (contents instanceof PDFStream) {
    streams.push(contents);
  } else {
    for (let i = 0; i < contents.size(); i += 1) {
      const part = contents.lookup(i);
      if (part instanceof PDFStream) streams.push(part);
    }
  }

  // Streams of one page may split tokens between them; join with whitespace.
  const parts = streams.map(streamBytes);
  const joined = new Uint8Array(parts.reduce((n, p) => n + p.byteLength + 1, 0));
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    joined[offset + part.byteLength] = 0x0a;
    offset += part.byteLength + 1;
  }
  return parseContentStream(joined);
}

/**
 * `ContentResources` over a pdf-lib resource dictionary.
 */
export function pdfResources(dict: PDFDict | undefined): ContentResources {
  const xObjects = dict ? getDict(dict, 'XObject') : null;
  const properties = dict ? getDict(dict, 'Properties') : null;
  const colorSpaces = dict ? getDict(dict, 'ColorSpace') : null;

  return {
    xObject(key: string): XObject | null {
      if (!xObjects) return null;
      const ref = xObjects.get(PDFName.of(key));
      const stream = ref instanceof PDFRef ? xObjects.context.lookup(ref) : ref;
      if (!(stream instanceof PDFStream)) return null;

      const subtype = name(get(stream.dict, 'Subtype'));
      if (subtype === 'Image') return { kind: 'image' };
      if (subtype !== 'Form') return null;

      const matrix = get(stream.dict, 'Matrix');
      return {
        kind: 'form',
        key: ref instanceof PDFRef ? ref.toString() : key,
        matrix: matrix instanceof PDFArray ? toMatrix(numbers(matrix)) : IDENTITY,
        operations: parseContentStream(streamBytes(stream)),
        resources: pdfResources(getDict(stream.dict, 'Resources') ?? dict),
      };
    },

    markedContentId(key: string): number | null {
      const list = properties ? getDict(properties, key) : null;
      return list ? integer(get(list, 'MCID')) : null;
    },

    colorSpace(key: string): ColorSpaceKind | null {
      if (!colorSpaces) return null;
      return colorSpaceKind(get(colorSpaces, key));
    },
  };
}

function colorSpaceKind(value: PDFObject | undefined): ColorSpaceKind | null {
  const direct = name(value);
  if (direct === 'DeviceGray' || direct === 'CalGray') return 'gray';
  if (direct === 'DeviceRGB' || direct === 'CalRGB') return 'rgb';
  if (direct === 'DeviceCMYK') return 'cmyk';
  if (!(value instanceof PDFArray)) return null;

  const family = name(value.lookup(0));
  if (family === 'CalGray') return 'gray';
  if (family === 'CalRGB') return 'rgb';
  if (family !== 'ICCBased') return null;

  const profile = value.lookup(1);
  if (!(profile instanceof PDFStream)) return null;
  const components = integer(get(profile.dict, 'N'));
  if (components === 1) return 'gray';
  if (components === 3) return 'rgb';
  if (components === 4) return 'cmyk';
  return colorSpaceKind(get(profile.dict, 'Alternate'));
}

function numbers(array: PDFArray): number[] {
  const out: number[] = [];
  for (let i = 0; i < array.size(); i += 1) {
    const value = array.lookup(i);
    out.push(value instanceof PDFNumber ? value.asNumber() : Number.NaN);
  }
  return out;
}

/**
 * A font referenced from page or form resources.
 */
export interface FontInfo {
  name: string;
  subtype: string | null;
  embedded: boolean;

  /** 1-based page the font was first seen on. */
  firstPage: number;
}

/**
 * Every font reachable from the pages' resources (including form XObjects),
 * deduplicated by name. A font counts as embedded when any copy is.
 */
export function collectFonts(pages: PDFPage[]): FontInfo[] {
  const fonts = new Map<string, FontInfo>();
  const seen = new Set<PDFDict>();

  const visitResources = (resources: PDFDict | null, pageNumber: number, depth: number): void => {
    if (!resources || seen.has(resources) || depth > 8) return;
    seen.add(resources);

    const fontDict = getDict(resources, 'Font');
    for (const [, value] of fontDict?.entries() ?? []) {
      const font = value instanceof PDFRef ? resources.context.lookup(value) : value;
      if (!(font instanceof PDFDict)) continue;
      const info = describeFont(font, pageNumber);
      const known = fonts.get(info.name);
      if (!known) fonts.set(info.name, info);
      else if (info.embedded) known.embedded = true;
    }

    const xObjects = getDict(resources, 'XObject');
    for (const [, value] of xObjects?.entries() ?? []) {
      const stream = value instanceof PDFRef ? resources.context.lookup(value) : value;
      if (stream instanceof PDFStream && name(get(stream.dict, 'Subtype')) === 'Form') {
        visitResources(getDict(stream.dict, 'Resources'), pageNumber, depth + 1);
      }
    }
  };

  pages.forEach((page, index) => visitResources(pageResources(page), index + 1, 0));
  return [...fonts.values()];
}

/**
 * The page's resource dictionary, inherited from the page tree when the page
 * has none. `null` when the entry is missing or not a dictionary.
 */
function pageResources(page: PDFPage): PDFDict | null {
  let node: PDFDict | null = page.node;
  for (let depth = 0; node && depth < 32; depth += 1) {
    const resources = get(node, 'Resources');
    if (resources !== undefined) return resources instanceof PDFDict ? resources : null;
    node = getDict(node, 'Parent');
  }
  return null;
}

function describeFont(font: PDFDict, pageNumber: number): FontInfo {
  const subtype = name(get(font, 'Subtype'));
  const baseFont = name(get(font, 'BaseFont')) ?? name(get(font, 'Name')) ?? '(unnamed font)';

  let descriptorOwner: PDFDict = font;
  if (subtype === 'Type0') {
    const descendants = get(font, 'DescendantFonts');
    const first = descendants instanceof PDFArray ? descendants.lookup(0) : undefined;
    if (first instanceof PDFDict) descriptorOwner = first;
  }
  const descriptor = getDict(descriptorOwner, 'FontDescriptor');
  const embedded =
    descriptor !== null && ['FontFile', 'FontFile2', 'FontFile3'].some((key) => get(descriptor, key) instanceof PDFStream);

  return { name: baseFont, subtype, embedded, firstPage: pageNumber };
}

/**
 * Title from the document info dictionary, falling back to XMP `dc:title`.
 */
export function documentTitle(doc: PDFDocument): string | null {
  const infoDict = doc.context.lookup(doc.context.trailerInfo.Info);
  const info = infoDict instanceof PDFDict ? text(get(infoDict, 'Title'))?.trim() : undefined;
  if (info) return info;

  const metadata = get(doc.catalog, 'Metadata');
  if (!(metadata instanceof PDFStream)) return null;
  let xmp: string;
  try {
    xmp = new TextDecoder().decode(streamBytes(metadata));
  } catch {
    return null;
  }
  const match = /<dc:title>[\s\S]*?<rdf:li[^>]*>([^<]*)<\/rdf:li>/.exec(xmp);
  const title = match?.[1]?.trim();
  return title ? title : null;
}

export function documentLanguage(doc: PDFDocument): string | null {
  const lang = text(get(doc.catalog, 'Lang'))?.trim();
  return lang ? lang : null;
}
