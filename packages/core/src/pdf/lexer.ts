/**
 * Operand of a content stream operator.
 */
export type ContentOperand =
  | { kind: 'number'; value: number }
  | { kind: 'name'; value: string }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: ContentOperand[] }
  | { kind: 'dict'; entries: Map<string, ContentOperand> }
  | { kind: 'keyword'; value: 'true' | 'false' | 'null' };

export interface ContentOperation {
  operator: string;
  operands: ContentOperand[];
}

type Token =
  | { type: 'operand'; operand: ContentOperand }
  | { type: 'operator'; value: string }
  | { type: 'close-array' }
  | { type: 'close-dict' };

const WHITESPACE = new Set(['\0', '\t', '\n', '\f', '\r', ' ']);
const DELIMITERS = new Set(['(', ')', '<', '>', '[', ']', '{', '}', '/', '%']);
const NUMBER = /[+-]?(?:\d+\.?\d*|\.\d+)/y;

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  '(': '(',
  ')': ')',
  '\\': '\\',
};

/**
 * Split a decoded content stream into operations.
 *
 * Lenient like a viewer: unterminated constructs end at the end of the stream
 * and stray delimiters are ignored. Inline images come out as a single `BI`
 * operation carrying their dictionary; the image data itself is skipped.
 */
export function parseContentStream(bytes: Uint8Array): ContentOperation[] {
  return new ContentLexer(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')).parse();
}

class ContentLexer {
  private pos = 0;

  constructor(private readonly src: string) {}

  parse(): ContentOperation[] {
    const operations: ContentOperation[] = [];
    let operands: ContentOperand[] = [];

    for (let token = this.readToken(); token; token = this.readToken()) {
      if (token.type === 'operand') {
        operands.push(token.operand);
        continue;
      }
      if (token.type !== 'operator') continue;

      if (token.value === 'BI') {
        operations.push({ operator: 'BI', operands: this.readInlineImage() });
      } else {
        operations.push({ operator: token.value, operands });
      }
      operands = [];
    }

    return operations;
  }

  private readToken(): Token | null {
    for (;;) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.src.length) return null;

      const ch = this.src.charAt(this.pos);
      const next = this.src.charAt(this.pos + 1);

      if (ch === '(') return operand({ kind: 'string', value: this.readLiteralString() });
      if (ch === '<' && next === '<') {
        this.pos += 2;
        return operand(this.readDict());
      }
      if (ch === '<') return operand({ kind: 'string', value: this.readHexString() });
      if (ch === '>' && next === '>') {
        this.pos += 2;
        return { type: 'close-dict' };
      }
      if (ch === '[') {
        this.pos += 1;
        return operand(this.readArray());
      }
      if (ch === ']') {
        this.pos += 1;
        return { type: 'close-array' };
      }
      if (ch === '/') return operand({ kind: 'name', value: this.readName() });
      if (DELIMITERS.has(ch)) {
        this.pos += 1;
        continue;
      }

      NUMBER.lastIndex = this.pos;
      const number = NUMBER.exec(this.src);
      if (number && this.isTokenEnd(this.pos + number[0].length)) {
        this.pos += number[0].length;
        return operand({ kind: 'number', value: Number(number[0]) });
      }

      const word = this.readRegular();
      if (word === 'true' || word === 'false' || word === 'null') {
        return operand({ kind: 'keyword', value: word });
      }
      return { type: 'operator', value: word };
    }
  }

  private readArray(): ContentOperand {
    const items: ContentOperand[] = [];
    for (let token = this.readToken(); token && token.type !== 'close-array'; token = this.readToken()) {
      if (token.type === 'operand') items.push(token.operand);
    }
    return { kind: 'array', items };
  }

  private readDict(): ContentOperand {
    const entries = new Map<string, ContentOperand>();
    let key: string | null = null;
    for (let token = this.readToken(); token && token.type !== 'close-dict'; token = this.readToken()) {
      if (token.type !== 'operand') continue;
      if (key === null) {
        if (token.operand.kind === 'name') key = token.operand.value;
        continue;
      }
      entries.set(key, token.operand);
      key = null;
    }
    return { kind: 'dict', entries };
  }

  private readLiteralString(): string {
    this.pos += 1;
    let depth = 1;
    let out = '';

    while (this.pos < this.src.length) {
      const ch = this.src.charAt(this.pos);
      this.pos += 1;

      if (ch === '\\') {
        const escaped = this.src.charAt(this.pos);
        this.pos += 1;
        const mapped = ESCAPES[escaped];
        if (mapped !== undefined) {
          out += mapped;
        } else if (/[0-7]/.test(escaped)) {
          let octal = escaped;
          while (octal.length < 3 && /[0-7]/.test(this.src.charAt(this.pos))) {
            octal += this.src.charAt(this.pos);
            this.pos += 1;
          }
          out += String.fromCharCode(Number.parseInt(octal, 8) & 0xff);
        } else if (escaped === '\r') {
          if (this.src.charAt(this.pos) === '\n') this.pos += 1;
        } else if (escaped !== '\n') {
          out += escaped;
        }
        continue;
      }

      if (ch === '(') depth += 1;
      if (ch === ')') {
        depth -= 1;
        if (depth === 0) break;
      }
      out += ch;
    }

    return out;
  }

  private readHexString(): string {
    this.pos += 1;
    const end = this.src.indexOf('>', this.pos);
    const stop = end === -1 ? this.src.length : end;
    const digits = this.src.slice(this.pos, stop).replace(/[^0-9a-fA-F]/g, '');
    this.pos = stop + 1;

    let out = '';
    for (let i = 0; i < digits.length; i += 2) {
      out += String.fromCharCode(Number.parseInt(digits.slice(i, i + 2).padEnd(2, '0'), 16));
    }
    return out;
  }

  private readName(): string {
    this.pos += 1;
    return this.readRegular().replace(/#([0-9a-fA-F]{2})/g, (_, hex: string) =>
      String.fromCharCode(Number.parseInt(hex, 16)),
    );
  }

  private readRegular(): string {
    const start = this.pos;
    while (this.pos < this.src.length && !this.isTokenEnd(this.pos)) this.pos += 1;
    return this.src.slice(start, this.pos);
  }

  private readInlineImage(): ContentOperand[] {
    const operands: ContentOperand[] = [];
    for (let token = this.readToken(); token; token = this.readToken()) {
      if (token.type === 'operator' && token.value === 'ID') break;
      if (token.type === 'operand') operands.push(token.operand);
    }

    // One whitespace byte separates `ID` from the binary data.
    this.pos += 1;
    let search = this.pos;
    for (;;) {
      const index = this.src.indexOf('EI', search);
      if (index === -1) {
        this.pos = this.src.length;
        break;
      }
      const before = this.src.charAt(index - 1);
      if (WHITESPACE.has(before) && this.isTokenEnd(index + 2)) {
        this.pos = index + 2;
        break;
      }
      search = index + 2;
    }

    return operands;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.src.length) {
      const ch = this.src.charAt(this.pos);
      if (WHITESPACE.has(ch)) {
        this.pos += 1;
      } else if (ch === '%') {
        while (this.pos < this.src.length && !'\r\n'.includes(this.src.charAt(this.pos))) this.pos += 1;
      } else {
        return;
      }
    }
  }

  private isTokenEnd(index: number): boolean {
    if (index >= this.src.length) return true;
    const ch = this.src.charAt(index);
    return WHITESPACE.has(ch) || DELIMITERS.has(ch);
  }
}

function operand(value: ContentOperand): Token {
  return { type: 'operand', operand: value };
}
