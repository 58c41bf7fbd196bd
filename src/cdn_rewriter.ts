import { renderConfigScript } from './client_script';
import type { Helper } from './helper';
import { HtmlUrlRewriter } from './html_rewriter';
import {
  ImageUrlRewriter,
  type MaybeImageSource,
  type SrcsetCandidate,
} from './image_rewriter';
import { snapshotFromHelper, type ConfigurationSnapshot } from './snapshot';
import { UrlRewriter } from './url_rewriter';

export interface CdnRewriterOptions {
  isAdmin?: () => boolean;
}

/**
 * Entry points the host calls while rendering a page. Build one per request:
 * the URL cache lives as long as this object does.
 */
export class CdnRewriter {
  readonly config: ConfigurationSnapshot;
  private readonly helper: Helper;
  private readonly isAdmin: () => boolean;
  private readonly urls: UrlRewriter;
  private readonly html: HtmlUrlRewriter;
  private readonly images: ImageUrlRewriter;

  constructor(helper: Helper, options: CdnRewriterOptions = {}) {
    this.helper = helper;
    this.config = snapshotFromHelper(helper);
    this.isAdmin = options.isAdmin ?? (() => false);
    this.urls = new UrlRewriter(this.config, {
      isAdmin: this.isAdmin,
      resolveRemotePath: (url) => helper.getRemotePathForUrl(url),
      log: (message, level) => helper.log(message, level),
    });
    this.html = new HtmlUrlRewriter(this.urls);
    this.images = new ImageUrlRewriter(this.urls);
  }

  rewriteUrl(url: string): string {
    if (this.isAdmin()) return url;
    return this.urls.rewrite(url);
  }

  rewriteContentUrls(html: string): string {
    if (this.isAdmin()) return html;
    try {
      return this.html.rewriteContent(html);
    } catch (err) {
      // Content goes out unmodified on failure.
      this.helper.log(
        `Content rewrite failed: ${err instanceof Error ? err.message : String(err)}`,
        'error',
      );
      return html;
    }
  }

  rewriteImageSrc(image: MaybeImageSource): MaybeImageSource {
    if (this.isAdmin()) return image;
    return this.images.rewriteImageSrc(image);
  }

  rewriteImageSrcset(candidates: SrcsetCandidate[]): SrcsetCandidate[] {
    if (this.isAdmin()) return candidates;
    return this.images.rewriteImageSrcset(candidates);
  }

  rewriteSrcsetAttribute(srcset: string): string {
    if (this.isAdmin()) return srcset;
    return this.images.rewriteSrcsetAttribute(srcset);
  }

  emitConfigScript(): string {
    if (this.isAdmin()) return '';
    return renderConfigScript(this.config);
  }

  get cacheSize(): number {
    return this.urls.cacheSize;
  }

  reset(): void {
    this.urls.reset();
  }
}
