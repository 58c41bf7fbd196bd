// Asset URL rewriter for HTML fragments.
// Finds <img src>, <link href>, <script src>, background url() in style attributes,
// url() in <style> blocks and <img>/<source> srcset lists, and swaps in the CDN URL
// for each eligible reference.
// This is a textual scan, not an HTML parse: only the URL token is ever replaced,
// and tags it cannot match (unterminated, unquoted values) are left as they are.

import { ImageUrlRewriter } from './image_rewriter';
import type { UrlRewriter } from './url_rewriter';

type TagAttribute = { tag: string; attr: string };

// Order matters: each pass sees the output of the previous one.
export const TAG_ATTRIBUTES: readonly TagAttribute[] = [
  { tag: 'img', attr: 'src' },
  { tag: 'link', attr: 'href' },
  { tag: 'script', attr: 'src' },
];

const tagPattern = ({ tag, attr }: TagAttribute) =>
  new RegExp(`<${tag}\\b[^>]*?\\s${attr}\\s*=\\s*(["'])([^"']+)\\1[^>]*>`, 'gi');

const STYLE_ATTRIBUTE = /(\sstyle\s*=\s*)(["'])([\s\S]*?)\2/gi;
const BACKGROUND_DECLARATION = /(background(?:-image)?\s*:)([^;]*)/gi;
const CSS_URL = /url\(\s*(['"]?)([^'")\s]+)\1\s*\)/gi;
const STYLE_BLOCK = /(<style\b[^>]*>)([\s\S]*?)(<\/style\s*>)/gi;
const SRCSET_ATTRIBUTE = /(<(?:img|source)\b[^>]*?\ssrcset\s*=\s*)(["'])([^"']*)\2/gi;

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Replaces `from` wherever it is a whole quoted value, e.g. `"from"` or `'from'`.
 */
export function replaceQuotedToken(html: string, from: string, to: string): string {
  const pattern = new RegExp(`(["'])${escapeRegExp(from)}\\1`, 'g');
  return html.replace(pattern, (_match, quote: string) => `${quote}${to}${quote}`);
}

export class HtmlUrlRewriter {
  private readonly rewriter: UrlRewriter;
  private readonly images: ImageUrlRewriter;

  constructor(rewriter: UrlRewriter) {
    this.rewriter = rewriter;
    this.images = new ImageUrlRewriter(rewriter);
  }

  rewriteContent(html: string): string {
    if (!html || !this.rewriter.active) return html;
    let out = html;
    for (const target of TAG_ATTRIBUTES) {
      out = this.rewriteTagAttribute(out, target);
    }
    out = this.rewriteStyleAttributes(out);
    out = this.rewriteStyleBlocks(out);
    out = this.rewriteSrcsets(out);
    return out;
  }

  /**
   * Rewrites every url() token in a stylesheet body.
   */
  rewriteCss(css: string): string {
    return css.replace(CSS_URL, (match: string, quote: string, url: string) => {
      const next = this.rewriter.rewrite(url);
      if (next === url) return match;
      return `url(${quote}${next}${quote})`;
    });
  }

  private rewriteTagAttribute(html: string, target: TagAttribute): string {
    const seen = new Set<string>();
    for (const m of html.matchAll(tagPattern(target))) {
      seen.add(m[2]);
    }
    let out = html;
    for (const url of seen) {
      const next = this.rewriter.rewrite(url);
      if (next !== url) out = replaceQuotedToken(out, url, next);
    }
    return out;
  }

  private rewriteStyleAttributes(html: string): string {
    return html.replace(
      STYLE_ATTRIBUTE,
      (match: string, prefix: string, quote: string, value: string) => {
        const next = value.replace(
          BACKGROUND_DECLARATION,
          (_decl: string, property: string, rest: string) => `${property}${this.rewriteCss(rest)}`,
        );
        return next === value ? match : `${prefix}${quote}${next}${quote}`;
      },
    );
  }

  private rewriteSrcsets(html: string): string {
    return html.replace(
      SRCSET_ATTRIBUTE,
      (match: string, prefix: string, quote: string, value: string) => {
        const next = this.images.rewriteSrcsetAttribute(value);
        return next === value ? match : `${prefix}${quote}${next}${quote}`;
      },
    );
  }

  // Each block is rewritten on its own so one block's URLs never touch another's.
  private rewriteStyleBlocks(html: string): string {
    return html.replace(
      STYLE_BLOCK,
      (match: string, open: string, css: string, close: string) => {
        const next = this.rewriteCss(css);
        return next === css ? match : `${open}${next}${close}`;
      },
    );
  }
}
