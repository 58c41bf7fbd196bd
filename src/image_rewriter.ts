import type { UrlRewriter } from './url_rewriter';

export interface ImageSource {
  url: string;
  width: number;
  height: number;
  isIntermediate?: boolean;
}

export interface SrcsetCandidate {
  url?: string;
  descriptor: 'w' | 'x';
  value: number;
}

export type MaybeImageSource = ImageSource | false | null | undefined;

export class ImageUrlRewriter {
  private readonly rewriter: UrlRewriter;

  constructor(rewriter: UrlRewriter) {
    this.rewriter = rewriter;
  }

  rewriteImageSrc(image: MaybeImageSource): MaybeImageSource {
    if (!this.rewriter.active || !image || !image.url) return image;
    return { ...image, url: this.rewriter.rewrite(image.url) };
  }

  // Rewrites in place; the same array comes back.
  rewriteImageSrcset(candidates: SrcsetCandidate[]): SrcsetCandidate[] {
    if (!this.rewriter.active || !Array.isArray(candidates)) return candidates;
    for (const candidate of candidates) {
      if (candidate.url) candidate.url = this.rewriter.rewrite(candidate.url);
    }
    return candidates;
  }

  /**
   * Rewrites the URLs of a `srcset` attribute value, keeping each descriptor.
   */
  rewriteSrcsetAttribute(srcset: string): string {
    if (!this.rewriter.active || !srcset) return srcset;
    let changed = false;
    const entries = srcset.split(',').map((entry) => {
      const trimmed = entry.trim();
      if (!trimmed) return entry;
      const [url, ...descriptor] = trimmed.split(/\s+/);
      const next = this.rewriter.rewrite(url);
      if (next !== url) changed = true;
      return [next, ...descriptor].join(' ');
    });
    return changed ? entries.join(', ') : srcset;
  }
}
