import { fromDeviceCmyk, fromDeviceGray, fromDeviceRgb, type RGBA } from '../utils/color.js';

import type { ContentOperand, ContentOperation } from './lexer.js';

/** Affine matrix `[a b c d e f]` in PDF row-vector convention. */
export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

export type ColorSpaceKind = 'gray' | 'rgb' | 'cmyk';

export type XObject =
  | { kind: 'image' }
  | {
      kind: 'form';
      /** Identity of the form stream, for cycle detection. */
      key: string;
      matrix: Matrix;
      operations: ContentOperation[];
      resources: ContentResources;
    };

/**
 * Named resources a content stream refers to. Implementations may throw when a
 * referenced form cannot be decoded; the whole page is then unreadable.
 */
export interface ContentResources {
  xObject(name: string): XObject | null;

  /** MCID of a named property list used by `BDC`. */
  markedContentId(name: string): number | null;

  /** Device equivalent of a named color space, when it has one. */
  colorSpace(name: string): ColorSpaceKind | null;
}

/**
 * One text-showing operation, positioned in default user space.
 */
export interface TextRun {
  /** Innermost enclosing marked-content id. */
  mcid: number | null;

  /** Inside an `/Artifact` marked-content sequence. */
  artifact: boolean;

  x: number;
  y: number;

  /** Effective glyph height in points. */
  fontSize: number;

  /** Painted color; `null` when it is not a device color. */
  color: RGBA | null;

  /** False for render modes that paint nothing (OCR text layers). */
  visible: boolean;
}

export interface PageContent {
  textRuns: TextRun[];

  /** Image XObjects and inline images painted, including inside forms. */
  imageCount: number;
}

interface GraphicsState {
  ctm: Matrix;
  fillSpace: ColorSpaceKind | null;
  strokeSpace: ColorSpaceKind | null;
  fill: RGBA | null;
  stroke: RGBA | null;
  fontSize: number;
  leading: number;
  renderMode: number;
}

interface MarkedContent {
  mcid: number | null;
  artifact: boolean;
}

const MAX_FORM_DEPTH = 8;
const BLACK = fromDeviceGray(0);

/**
 * Walk the operations of a page and collect where text is shown, in which
 * color and under which marked-content id, plus how many images are painted.
 */
export function interpretContent(operations: ContentOperation[], resources: ContentResources): PageContent {
  const out: PageContent = { textRuns: [], imageCount: 0 };
  new Interpreter(out).run(operations, resources, initialState(IDENTITY), new Set(), 0);
  return out;
}

function initialState(ctm: Matrix): GraphicsState {
  return {
    ctm,
    fillSpace: 'gray',
    strokeSpace: 'gray',
    fill: BLACK,
    stroke: BLACK,
    fontSize: 0,
    leading: 0,
    renderMode: 0,
  };
}

class Interpreter {
  private readonly marked: MarkedContent[] = [];
  private textMatrix: Matrix = IDENTITY;
  private lineMatrix: Matrix = IDENTITY;

  constructor(private readonly out: PageContent) {}

  run(
    operations: ContentOperation[],
    resources: ContentResources,
    start: GraphicsState,
    forms: Set<string>,
    depth: number,
  ): void {
    let gs: GraphicsState = { ...start };
    const stack: GraphicsState[] = [];

    for (const { operator, operands } of operations) {
      const nums = operands.map((o) => (o.kind === 'number' ? o.value : Number.NaN));

      switch (operator) {
        case 'q':
          stack.push({ ...gs });
          break;
        case 'Q':
          gs = stack.pop() ?? gs;
          break;
        case 'cm':
          if (nums.length === 6) gs.ctm = multiply(toMatrix(nums), gs.ctm);
          break;

        case 'g':
          gs.fillSpace = 'gray';
          gs.fill = colorFrom('gray', nums);
          break;
        case 'G':
          gs.strokeSpace = 'gray';
          gs.stroke = colorFrom('gray', nums);
          break;
        case 'rg':
          gs.fillSpace = 'rgb';
          gs.fill = colorFrom('rgb', nums);
          break;
        case 'RG':
          gs.strokeSpace = 'rgb';
          gs.stroke = colorFrom('rgb', nums);
          break;
        case 'k':
          gs.fillSpace = 'cmyk';
          gs.fill = colorFrom('cmyk', nums);
          break;
        case 'K':
          gs.strokeSpace = 'cmyk';
          gs.stroke = colorFrom('cmyk', nums);
          break;
        case 'cs':
          gs.fillSpace = colorSpaceOf(operands[0], resources);
          gs.fill = gs.fillSpace ? initialColor(gs.fillSpace) : null;
          break;
        case 'CS':
          gs.strokeSpace = colorSpaceOf(operands[0], resources);
          gs.stroke = gs.strokeSpace ? initialColor(gs.strokeSpace) : null;
          break;
        case 'sc':
        case 'scn':
          gs.fill = gs.fillSpace ? colorFrom(gs.fillSpace, nums) : null;
          break;
        case 'SC':
        case 'SCN':
          gs.stroke = gs.strokeSpace ? colorFrom(gs.strokeSpace, nums) : null;
          break;

        case 'BT':
          this.textMatrix = IDENTITY;
          this.lineMatrix = IDENTITY;
          break;
        case 'Tf':
          if (Number.isFinite(nums[1])) gs.fontSize = nums[1] ?? 0;
          break;
        case 'TL':
          if (Number.isFinite(nums[0])) gs.leading = nums[0] ?? 0;
          break;
        case 'Tr':
          if (Number.isFinite(nums[0])) gs.renderMode = nums[0] ?? 0;
          break;
        case 'Tm':
          if (nums.length === 6) {
            this.lineMatrix = toMatrix(nums);
            this.textMatrix = this.lineMatrix;
          }
          break;
        case 'Td':
          this.moveLine(nums[0] ?? 0, nums[1] ?? 0);
          break;
        case 'TD':
          gs.leading = -(nums[1] ?? 0);
          this.moveLine(nums[0] ?? 0, nums[1] ?? 0);
          break;
        case 'T*':
          this.moveLine(0, -gs.leading);
          break;
        case 'Tj':
          this.showText(gs, operands[0]);
          break;
        case "'":
          this.moveLine(0, -gs.leading);
          this.showText(gs, operands[0]);
          break;
        case '"':
          this.moveLine(0, -gs.leading);
          this.showText(gs, operands[2]);
          break;
        case 'TJ':
          this.showText(gs, operands[0]);
          break;

        case 'BMC':
          this.marked.push({ mcid: null, artifact: nameOf(operands[0]) === 'Artifact' });
          break;
        case 'BDC':
          this.marked.push({
            mcid: markedContentId(operands[1], resources),
            artifact: nameOf(operands[0]) === 'Artifact',
          });
          break;
        case 'EMC':
          this.marked.pop();
          break;

        case 'BI':
          this.out.imageCount += 1;
          break;
        case 'Do':
          this.paintXObject(operands[0], resources, gs, forms, depth);
          break;

        default:
          break;
      }
    }
  }

  private paintXObject(
    operand: ContentOperand | undefined,
    resources: ContentResources,
    gs: GraphicsState,
    forms: Set<string>,
    depth: number,
  ): void {
    const name = nameOf(operand);
    const xObject = name === null ? null : resources.xObject(name);
    if (!xObject) return;

    if (xObject.kind === 'image') {
      this.out.imageCount += 1;
      return;
    }
    if (depth >= MAX_FORM_DEPTH || forms.has(xObject.key)) return;

    const savedText = this.textMatrix;
    const savedLine = this.lineMatrix;
    forms.add(xObject.key);
    this.run(
      xObject.operations,
      xObject.resources,
      { ...gs, ctm: multiply(xObject.matrix, gs.ctm) },
      forms,
      depth + 1,
    );
    forms.delete(xObject.key);
    this.textMatrix = savedText;
    this.lineMatrix = savedLine;
  }

  private moveLine(tx: number, ty: number): void {
    this.lineMatrix = multiply([1, 0, 0, 1, tx, ty], this.lineMatrix);
    this.textMatrix = this.lineMatrix;
  }

  private showText(gs: GraphicsState, operand: ContentOperand | undefined): void {
    if (!operand || !hasGlyphs(operand)) return;

    const [, , c, d, x, y] = multiply(this.textMatrix, gs.ctm);
    const mode = gs.renderMode;
    const current = this.currentMarkedContent();

    this.out.textRuns.push({
      mcid: current.mcid,
      artifact: current.artifact,
      x,
      y,
      fontSize: Math.abs(gs.fontSize) * Math.hypot(c, d),
      color: mode === 1 || mode === 5 ? gs.stroke : gs.fill,
      visible: mode !== 3 && mode !== 7,
    });
  }

  private currentMarkedContent(): MarkedContent {
    let mcid: number | null = null;
    let artifact = false;
    for (let i = this.marked.length - 1; i >= 0; i -= 1) {
      const entry = this.marked[i];
      if (!entry) continue;
      artifact ||= entry.artifact;
      if (mcid === null) mcid = entry.mcid;
    }
    return { mcid, artifact };
  }
}

/**
 * `m1 × m2`: apply `m1`, then `m2`.
 */
export function multiply(m1: Matrix, m2: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a1 * a2 + b1 * c2,
    a1 * b2 + b1 * d2,
    c1 * a2 + d1 * c2,
    c1 * b2 + d1 * d2,
    e1 * a2 + f1 * c2 + e2,
    e1 * b2 + f1 * d2 + f2,
  ];
}

export function toMatrix(values: readonly number[]): Matrix {
  const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = values.map((v) => (Number.isFinite(v) ? v : 0));
  return [a, b, c, d, e, f];
}

function hasGlyphs(operand: ContentOperand): boolean {
  if (operand.kind === 'string') return operand.value.length > 0;
  if (operand.kind === 'array') return operand.items.some((item) => item.kind === 'string' && item.value.length > 0);
  return false;
}

function nameOf(operand: ContentOperand | undefined): string | null {
  return operand?.kind === 'name' ? operand.value : null;
}

function markedContentId(operand: ContentOperand | undefined, resources: ContentResources): number | null {
  if (operand?.kind === 'name') return resources.markedContentId(operand.value);
  if (operand?.kind !== 'dict') return null;
  const mcid = operand.entries.get('MCID');
  return mcid?.kind === 'number' && Number.isInteger(mcid.value) ? mcid.value : null;
}

function colorSpaceOf(operand: ContentOperand | undefined, resources: ContentResources): ColorSpaceKind | null {
  const name = nameOf(operand);
  if (name === 'DeviceGray' || name === 'G') return 'gray';
  if (name === 'DeviceRGB' || name === 'RGB') return 'rgb';
  if (name === 'DeviceCMYK' || name === 'CMYK') return 'cmyk';
  return name === null ? null : resources.colorSpace(name);
}

function initialColor(space: ColorSpaceKind): RGBA {
  return space === 'cmyk' ? fromDeviceCmyk(0, 0, 0, 1) : BLACK;
}

function colorFrom(space: ColorSpaceKind, nums: readonly number[]): RGBA | null {
  if (nums.some((n) => !Number.isFinite(n))) return null;
  const [a = 0, b = 0, c = 0, d = 0] = nums;
  if (space === 'gray' && nums.length === 1) return fromDeviceGray(a);
  if (space === 'rgb' && nums.length === 3) return fromDeviceRgb(a, b, c);
  if (space === 'cmyk' && nums.length === 4) return fromDeviceCmyk(a, b, c, d);
  return null;
}
