import type { CdnRewriter } from './cdn_rewriter';
import type { MaybeImageSource, SrcsetCandidate } from './image_rewriter';

export interface FilterValues {
  style_loader_src: string;
  script_loader_src: string;
  the_content: string;
  attachment_url: string;
  attachment_image_src: MaybeImageSource;
  image_srcset: SrcsetCandidate[];
}

export type FilterEvent = keyof FilterValues;

export const FILTER_EVENTS: readonly FilterEvent[] = [
  'style_loader_src',
  'script_loader_src',
  'the_content',
  'attachment_url',
  'attachment_image_src',
  'image_srcset',
];

export type Filter<K extends FilterEvent> = (value: FilterValues[K]) => FilterValues[K];
export type ActionEvent = 'head';
export type Action = (emit: (markup: string) => void) => void;

type Registration<H> = { priority: number; order: number; handler: H };
type FilterTable = { [K in FilterEvent]: Registration<Filter<K>>[] };

export const DEFAULT_PRIORITY = 10;
// Runs after other filters on the same event.
export const REWRITE_PRIORITY = 9999;
export const HEAD_SCRIPT_PRIORITY = 5;

const byPriority = <H>(a: Registration<H>, b: Registration<H>) =>
  a.priority - b.priority || a.order - b.order;

/**
 * Filter/action table resolved into direct calls. Lower priority runs first;
 * equal priorities run in registration order.
 */
export class HookRegistry {
  private order = 0;
  private readonly filters: FilterTable = {
    style_loader_src: [],
    script_loader_src: [],
    the_content: [],
    attachment_url: [],
    attachment_image_src: [],
    image_srcset: [],
  };
  private readonly actions: Record<ActionEvent, Registration<Action>[]> = { head: [] };

  addFilter<K extends FilterEvent>(event: K, handler: Filter<K>, priority = DEFAULT_PRIORITY): this {
    const list: Registration<Filter<K>>[] = this.filters[event];
    list.push({ priority, order: this.order++, handler });
    list.sort(byPriority);
    return this;
  }

  addAction(event: ActionEvent, handler: Action, priority = DEFAULT_PRIORITY): this {
    const list = this.actions[event];
    list.push({ priority, order: this.order++, handler });
    list.sort(byPriority);
    return this;
  }

  applyFilters<K extends FilterEvent>(event: K, value: FilterValues[K]): FilterValues[K] {
    const list: Registration<Filter<K>>[] = this.filters[event];
    return list.reduce((acc, { handler }) => handler(acc), value);
  }

  // Runs the action and returns whatever markup its handlers emitted.
  doAction(event: ActionEvent): string {
    const out: string[] = [];
    for (const { handler } of this.actions[event]) {
      handler((markup) => {
        if (markup) out.push(markup);
      });
    }
    return out.join('\n');
  }

  registrations(): Array<{ event: FilterEvent | ActionEvent; priority: number }> {
    const rows: Array<{ event: FilterEvent | ActionEvent; priority: number; order: number }> = [];
    for (const event of FILTER_EVENTS) {
      for (const r of this.filters[event]) rows.push({ event, priority: r.priority, order: r.order });
    }
    for (const r of this.actions.head) rows.push({ event: 'head', priority: r.priority, order: r.order });
    return rows.sort((a, b) => a.order - b.order).map(({ event, priority }) => ({ event, priority }));
  }
}

/**
 * Front-end wiring of the rewriter, mirroring where a CMS would call it.
 */
export function registerCdnHooks(registry: HookRegistry, rewriter: CdnRewriter): HookRegistry {
  return registry
    .addAction('head', (emit) => emit(rewriter.emitConfigScript()), HEAD_SCRIPT_PRIORITY)
    .addFilter('style_loader_src', (url) => rewriter.rewriteUrl(url), REWRITE_PRIORITY)
    .addFilter('script_loader_src', (url) => rewriter.rewriteUrl(url), REWRITE_PRIORITY)
    .addFilter('the_content', (html) => rewriter.rewriteContentUrls(html), REWRITE_PRIORITY)
    .addFilter('attachment_url', (url) => rewriter.rewriteUrl(url), REWRITE_PRIORITY)
    .addFilter('attachment_image_src', (image) => rewriter.rewriteImageSrc(image), REWRITE_PRIORITY)
    .addFilter('image_srcset', (sources) => rewriter.rewriteImageSrcset(sources), REWRITE_PRIORITY);
}
