/**
 * RGBA color in the sRGB color space.
 *
 * Used as the normalized representation for CSS colors collected from rendered
 * pages and for device colors read out of PDF content streams.
 */
export interface RGBA {
  /** Red channel in the range 0..255. */
  r: number;

  /** Green channel in the range 0..255. */
  g: number;

  /** Blue channel in the range 0..255. */
  b: number;

  /** Alpha channel in the range 0..1. */
  a: number;
}

export const WHITE: RGBA = { r: 255, g: 255, b: 255, a: 1 };

const NAMED_COLORS: Record<string, string> = {
  black: '#000000',
  white: '#ffffff',
  gray: '#808080',
  grey: '#808080',
  silver: '#c0c0c0',
  red: '#ff0000',
  green: '#008000',
  blue: '#0000ff',
  yellow: '#ffff00',
  orange: '#ffa500',
  transparent: 'rgba(0,0,0,0)',
};

function clampByte(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.max(0, Math.min(255, Math.round(n)));
}

function clamp01(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.max(0, Math.min(1, n));
}

function parseHex(input: string): RGBA | null {
  const match = input.trim().toLowerCase().match(/^#([0-9a-f]{3,8})$/);
  const hex = match?.[1];
  if (!hex) return null;

  // #rgb and #rgba expand each digit; #rrggbb and #rrggbbaa read pairs.
  const short = hex.length === 3 || hex.length === 4;
  if (!short && hex.length !== 6 && hex.length !== 8) return null;

  const width = short ? 1 : 2;
  const channel = (index: number): number => {
    const digits = hex.slice(index * width, index * width + width);
    return Number.parseInt(short ? digits + digits : digits, 16);
  };

  const hasAlpha = hex.length === 4 || hex.length === 8;
  return {
    r: channel(0),
    g: channel(1),
    b: channel(2),
    a: hasAlpha ? clamp01(channel(3) / 255) : 1,
  };
}

function parseRgb(input: string): RGBA | null {
  const m = input
    .trim()
    .match(/^rgba?\(\s*([0-9.]+)\s*[,\s]\s*([0-9.]+)\s*[,\s]\s*([0-9.]+)\s*(?:[,/]\s*([0-9.]+%?)\s*)?\)$/i);
  if (!m) return null;
  return {
    r: clampByte(Number(m[1])),
    g: clampByte(Number(m[2])),
    b: clampByte(Number(m[3])),
    a: parseAlpha(m[4]),
  };
}

function parseAlpha(raw: string | undefined): number {
  if (raw === undefined) return 1;
  if (raw.endsWith('%')) return clamp01(Number(raw.slice(0, -1)) / 100);
  return clamp01(Number(raw));
}

function hslToRgb(h: number, s: number, l: number): { r: number; g: number; b: number } {
  const hh = ((h % 360) + 360) % 360;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((hh / 60) % 2) - 1));
  const m = l - c / 2;

  const sector = Math.floor(hh / 60);
  const table: Array<[number, number, number]> = [
    [c, x, 0],
    [x, c, 0],
    [0, c, x],
    [0, x, c],
    [x, 0, c],
    [c, 0, x],
  ];
  const [rp, gp, bp] = table[sector] ?? [c, 0, x];

  return {
    r: clampByte((rp + m) * 255),
    g: clampByte((gp + m) * 255),
    b: clampByte((bp + m) * 255),
  };
}

function parseHsl(input: string): RGBA | null {
  const m = input
    .trim()
    .match(/^hsla?\(\s*([0-9.]+)\s*,\s*([0-9.]+)%\s*,\s*([0-9.]+)%\s*(?:,\s*([0-9.]+%?)\s*)?\)$/i);
  if (!m) return null;
  const { r, g, b } = hslToRgb(Number(m[1]), clamp01(Number(m[2]) / 100), clamp01(Number(m[3]) / 100));
  return { r, g, b, a: parseAlpha(m[4]) };
}

/**
 * Parse a CSS color value into RGBA.
 *
 * Supports hex (#rgb, #rgba, #rrggbb, #rrggbbaa), rgb()/rgba() in comma or
 * space syntax, hsl()/hsla() and a handful of named colors.
 */
export function parseColor(value: string): RGBA | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const named = NAMED_COLORS[trimmed.toLowerCase()];
  if (named) return parseColor(named);

  return parseHex(trimmed) ?? parseRgb(trimmed) ?? parseHsl(trimmed);
}

/**
 * Alpha blend `fg` on top of `bg`.
 */
function alphaBlend(fg: RGBA, bg: RGBA): RGBA {
  const a = fg.a + bg.a * (1 - fg.a);
  if (a === 0) return { r: 0, g: 0, b: 0, a: 0 };

  const r = (fg.r * fg.a + bg.r * bg.a * (1 - fg.a)) / a;
  const g = (fg.g * fg.a + bg.g * bg.a * (1 - fg.a)) / a;
  const b = (fg.b * fg.a + bg.b * bg.a * (1 - fg.a)) / a;

  return { r: clampByte(r), g: clampByte(g), b: clampByte(b), a: clamp01(a) };
}

function channelToLinear(v: number): number {
  const s = v / 255;
  return s <= 0.03928 ? s / 12.92 : ((s + 0.055) / 1.055) ** 2.4;
}

function relativeLuminance(color: RGBA): number {
  return (
    0.2126 * channelToLinear(color.r) +
    0.7152 * channelToLinear(color.g) +
    0.0722 * channelToLinear(color.b)
  );
}

/**
 * Contrast ratio between two colors using WCAG relative luminance.
 *
 * Semi-transparent colors are composited: the background over white, the
 * foreground over the background.
 */
export function calculateContrastRatio(fg: RGBA, bg: RGBA): number {
  const bgOpaque = bg.a < 1 ? alphaBlend(bg, WHITE) : bg;
  const fgOpaque = fg.a < 1 ? alphaBlend(fg, bgOpaque) : fg;

  const l1 = relativeLuminance(fgOpaque);
  const l2 = relativeLuminance(bgOpaque);
  return (Math.max(l1, l2) + 0.05) / (Math.min(l1, l2) + 0.05);
}

/**
 * WCAG 1.4.3 large text: at least 24px, or 18.66px (14pt) when bold.
 */
export function isLargeText(fontSizePx: number, fontWeight: number): boolean {
  return fontSizePx >= 24 || (fontSizePx >= 18.66 && fontWeight >= 700);
}

/**
 * Minimum AA contrast ratio for text of the given size.
 */
export function requiredContrastRatio(fontSizePx: number, fontWeight: number): number {
  return isLargeText(fontSizePx, fontWeight) ? 3 : 4.5;
}

/**
 * Convert a PDF DeviceGray component (0..1) to RGBA.
 */
export function fromDeviceGray(gray: number): RGBA {
  const v = clampByte(clamp01(gray) * 255);
  return { r: v, g: v, b: v, a: 1 };
}

/**
 * Convert PDF DeviceRGB components (0..1) to RGBA.
 */
export function fromDeviceRgb(r: number, g: number, b: number): RGBA {
  return {
    r: clampByte(clamp01(r) * 255),
    g: clampByte(clamp01(g) * 255),
    b: clampByte(clamp01(b) * 255),
    a: 1,
  };
}

/**
 * Convert PDF DeviceCMYK components (0..1) to RGBA (naive, no ICC profile).
 */
export function fromDeviceCmyk(c: number, m: number, y: number, k: number): RGBA {
  const black = 1 - clamp01(k);
  return {
    r: clampByte(255 * (1 - clamp01(c)) * black),
    g: clampByte(255 * (1 - clamp01(m)) * black),
    b: clampByte(255 * (1 - clamp01(y)) * black),
    a: 1,
  };
}

/**
 * Round a ratio to two decimals for messages.
 */
export function formatRatio(ratio: number): string {
  return `${Math.round(ratio * 100) / 100}:1`;
}

/**
 * `#rrggbb` form of a color, ignoring alpha.
 */
export function toHex(color: RGBA): string {
  return `#${[color.r, color.g, color.b].map((c) => clampByte(c).toString(16).padStart(2, '0')).join('')}`;
}
