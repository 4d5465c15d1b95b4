import type {
  ContrastSample,
  ElementSnapshot,
  FormFieldNode,
  HeadingNode,
  ImageNode,
  LinkNode,
  PageSnapshot,
} from '../types/extraction.js';

export interface SnapshotArgs {
  /** Truncate text fields to this many characters. */
  maxTextLength: number;

  /** Collect computed foreground/background colors of text elements. */
  collectContrast: boolean;

  /** Upper bound on contrast samples per page. */
  maxContrastSamples: number;
}

/**
 * Serialize the accessibility-relevant parts of the current document.
 *
 * Runs inside the page (browser or jsdom window): it is shipped as source, so
 * it must stay self-contained and may only touch DOM globals.
 */
export function collectPageSnapshot(args: SnapshotArgs): PageSnapshot {
  const cssEscape = (value: string): string => value.replace(/[^a-zA-Z0-9_-]/g, (ch) => `\\${ch}`);

  const buildSelector = (el: Element): string => {
    const parts: string[] = [];
    let current: Element | null = el;
    while (current) {
      const id = current.getAttribute('id');
      if (id && id.trim()) {
        parts.unshift(`#${cssEscape(id.trim())}`);
        break;
      }
      const tag = current.tagName.toLowerCase();
      const parentEl: Element | null = current.parentElement;
      if (!parentEl) {
        parts.unshift(tag);
        break;
      }
      const siblings = Array.from(parentEl.children).filter((s) => s.tagName.toLowerCase() === tag);
      const index = siblings.indexOf(current);
      parts.unshift(siblings.length > 1 && index >= 0 ? `${tag}:nth-of-type(${index + 1})` : tag);
      current = parentEl;
    }
    return parts.join(' > ');
  };

  const normalizeText = (t: string): string => t.replace(/\s+/g, ' ').trim();

  const truncate = (t: string): string =>
    t.length <= args.maxTextLength ? t : `${t.slice(0, Math.max(0, args.maxTextLength - 1))}…`;

  const implicitRole = (el: Element): string | null => {
    const tag = el.tagName.toLowerCase();
    if (/^h[1-6]$/.test(tag)) return 'heading';
    if (tag === 'a') return el.hasAttribute('href') ? 'link' : null;
    if (tag === 'img') return el.getAttribute('alt') === '' ? 'presentation' : 'img';
    if (tag === 'input') {
      const type = (el.getAttribute('type') ?? 'text').toLowerCase();
      if (type === 'checkbox' || type === 'radio') return type;
      if (type === 'button' || type === 'submit' || type === 'reset' || type === 'image') return 'button';
      if (type === 'range') return 'slider';
      if (type === 'search') return 'searchbox';
      return type === 'hidden' ? null : 'textbox';
    }
    const table: Record<string, string> = {
      button: 'button',
      select: el.hasAttribute('multiple') ? 'listbox' : 'combobox',
      textarea: 'textbox',
      nav: 'navigation',
      main: 'main',
      header: 'banner',
      footer: 'contentinfo',
      aside: 'complementary',
      form: 'form',
      ul: 'list',
      ol: 'list',
      li: 'listitem',
      table: 'table',
    };
    return table[tag] ?? null;
  };

  const roleOf = (el: Element): string | null => {
    const explicit = normalizeText(el.getAttribute('role') ?? '').split(' ')[0];
    return explicit ? explicit.toLowerCase() : implicitRole(el);
  };

  const toSnapshot = (el: Element): ElementSnapshot => ({
    selector: buildSelector(el),
    tagName: el.tagName.toLowerCase(),
    role: roleOf(el),
    textContent: truncate(normalizeText(el.textContent ?? '')),
  });

  const textOfIds = (ids: string | null): string | null => {
    if (!ids) return null;
    const text = ids
      .split(/\s+/)
      .map((id) => (id ? document.getElementById(id)?.textContent ?? '' : ''))
      .join(' ');
    const normalized = normalizeText(text);
    return normalized || null;
  };

  // Visible text plus alt text of contained images, skipping aria-hidden subtrees.
  const nameFromContent = (node: Node): string => {
    let out = '';
    node.childNodes.forEach((child) => {
      if (child.nodeType === 3) {
        out += ` ${child.textContent ?? ''}`;
        return;
      }
      if (!(child instanceof Element)) return;
      const el = child;
      if (el.getAttribute('aria-hidden') === 'true') return;
      if (el.tagName.toLowerCase() === 'img') {
        out += ` ${el.getAttribute('alt') ?? ''}`;
        return;
      }
      out += ` ${nameFromContent(el)}`;
    });
    return out;
  };

  const accessibleName = (el: Element): string =>
    textOfIds(el.getAttribute('aria-labelledby')) ||
    normalizeText(el.getAttribute('aria-label') ?? '') ||
    normalizeText(nameFromContent(el)) ||
    normalizeText(el.getAttribute('title') ?? '');

  const images: ImageNode[] = Array.from(document.querySelectorAll('img')).map((el) => ({
    ...toSnapshot(el),
    src: el.getAttribute('src') ?? '',
    alt: el.getAttribute('alt'),
  }));

  const links: LinkNode[] = Array.from(document.querySelectorAll('a[href]')).map((el) => ({
    ...toSnapshot(el),
    href: el.getAttribute('href'),
    accessibleName: truncate(accessibleName(el)),
  }));

  const labels = Array.from(document.getElementsByTagName('label'));

  const formFields: FormFieldNode[] = Array.from(
    document.querySelectorAll('input, select, textarea'),
  ).map((field) => {
    const tag = field.tagName.toLowerCase();
    const id = field.getAttribute('id');
    const forText = id
      ? normalizeText(
          labels
            .filter((label) => label.getAttribute('for') === id)
            .map((label) => label.textContent ?? '')
            .join(' '),
        )
      : '';
    const wrapping = field.closest('label');
    return {
      ...toSnapshot(field),
      name: field.getAttribute('name'),
      type: tag === 'input' ? (field.getAttribute('type') ?? 'text').toLowerCase() : tag,
      labelText: forText || null,
      wrappedInLabel: wrapping !== null && normalizeText(wrapping.textContent ?? '') !== '',
      ariaLabel: field.getAttribute('aria-label'),
      ariaLabelledByText: textOfIds(field.getAttribute('aria-labelledby')),
      title: field.getAttribute('title'),
    };
  });

  const headings: HeadingNode[] = Array.from(
    document.querySelectorAll('h1, h2, h3, h4, h5, h6, [role="heading"]'),
  ).map((el) => {
    const tagLevel = /^h([1-6])$/.exec(el.tagName.toLowerCase());
    const ariaLevel = Number.parseInt(el.getAttribute('aria-level') ?? '', 10);
    const level = Number.isFinite(ariaLevel) ? ariaLevel : tagLevel ? Number(tagLevel[1] ?? 2) : 2;
    return { ...toSnapshot(el), level };
  });

  const contrast: ContrastSample[] = [];
  if (args.collectContrast && document.body) {
    const isTransparent = (color: string): boolean =>
      color === 'transparent' || /rgba\([^)]*,\s*0(\.0+)?\s*\)$/.test(color) || /\/\s*0\s*\)$/.test(color);

    const skipTags = new Set(['script', 'style', 'noscript', 'template', 'svg', 'title']);

    for (const el of Array.from(document.body.querySelectorAll('*'))) {
      if (contrast.length >= args.maxContrastSamples) break;
      if (skipTags.has(el.tagName.toLowerCase())) continue;

      const ownText = Array.from(el.childNodes)
        .filter((n) => n.nodeType === 3)
        .map((n) => n.textContent ?? '')
        .join(' ');
      if (!normalizeText(ownText)) continue;
      if (el.getClientRects().length === 0) continue;

      const style = getComputedStyle(el);
      if (style.visibility === 'hidden' || Number.parseFloat(style.opacity) === 0) continue;

      let backgroundColor = 'rgb(255, 255, 255)';
      let hasBackgroundImage = false;
      for (let node: Element | null = el; node; node = node.parentElement) {
        const nodeStyle = getComputedStyle(node);
        if (nodeStyle.backgroundImage && nodeStyle.backgroundImage !== 'none') {
          hasBackgroundImage = true;
          break;
        }
        if (!isTransparent(nodeStyle.backgroundColor)) {
          backgroundColor = nodeStyle.backgroundColor;
          break;
        }
      }

      const weight = style.fontWeight === 'bold' ? 700 : Number.parseInt(style.fontWeight, 10);
      contrast.push({
        selector: buildSelector(el),
        text: truncate(normalizeText(ownText)),
        color: style.color,
        backgroundColor,
        hasBackgroundImage,
        fontSizePx: Number.parseFloat(style.fontSize) || 16,
        fontWeight: Number.isFinite(weight) ? weight : 400,
      });
    }
  }

  const root = document.documentElement;
  const lang = root.getAttribute('lang') ?? root.getAttribute('xml:lang');

  return {
    pageTitle: normalizeText(document.title ?? ''),
    pageLanguage: lang === null ? null : lang.trim(),
    images,
    links,
    formFields,
    headings,
    contrast,
  };
}

/**
 * Source of an expression that runs `fn(arg)` in another realm and yields its
 * JSON-serializable result.
 */
export function buildInvocation<TArg>(fn: (arg: TArg) => unknown, arg: TArg): string {
  return `(${fn.toString()})(${JSON.stringify(arg)})`;
}
