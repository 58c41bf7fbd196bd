import { Hono } from 'hono';
import { z } from 'zod';
import { CdnRewriter } from './cdn_rewriter';
import { toClientConfig } from './client_script';
import type { Settings } from './config';
import { ADMIN_PATH_MARKERS, MAX_BATCH_URLS } from './constants';
import { containsAdminMarker } from './eligibility';
import { CdnHelper } from './helper';
import { HookRegistry, registerCdnHooks } from './hooks';
import { createLogger, type Logger } from './logger';
import { trimTrailingSlash } from './path_mapper';
import {
  appendCors,
  filterRequestHeaders,
  filterResponseHeaders,
  injectIntoHead,
  isHtmlContentType,
  preflightResponse,
  textResponse,
} from './utils';

export type Fetcher = (input: string, init?: RequestInit) => Promise<Response>;

export interface AppOptions {
  settings: Settings;
  originUrl: string;
  siteUrl?: string;
  logger?: Logger;
  fetcher?: Fetcher;
  allowOrigin?: string;
}

type Variables = {
  rewriter: CdnRewriter;
  hooks: HookRegistry;
};

const batchSchema = z.object({
  urls: z
    .array(z.string())
    .min(1, 'urls array required')
    .max(MAX_BATCH_URLS, `Too many urls (max ${MAX_BATCH_URLS})`),
});

function jsonResponse(data: unknown, status: number, allowOrigin: string): Response {
  const h = new Headers({ 'Content-Type': 'application/json' });
  appendCors(h, allowOrigin);
  return new Response(JSON.stringify(data), { status, headers: h });
}

export function createApp(options: AppOptions) {
  const logger =
    options.logger ??
    createLogger('cdn-rewriter', { level: options.settings.debugMode ? 'debug' : 'info' });
  const siteUrl = options.siteUrl ?? options.originUrl;
  const helper = new CdnHelper(options.settings, siteUrl, logger);
  const fetcher: Fetcher = options.fetcher ?? ((input, init) => fetch(input, init));
  const allowOrigin = options.allowOrigin ?? '*';
  const origin = trimTrailingSlash(options.originUrl);

  const app = new Hono<{ Variables: Variables }>();

  // One rewriter (and URL cache) per request.
  app.use('*', async (c, next) => {
    const admin = containsAdminMarker(c.req.path, ADMIN_PATH_MARKERS);
    const rewriter = new CdnRewriter(helper, { isAdmin: () => admin });
    const hooks = new HookRegistry();
    if (rewriter.config.enabled && !admin) registerCdnHooks(hooks, rewriter);
    c.set('rewriter', rewriter);
    c.set('hooks', hooks);
    await next();
  });

  app.onError((err, c) => {
    logger.error('Unhandled error', { path: c.req.path, error: err.message });
    return textResponse('Internal Server Error', 500);
  });

  app.options('/rewrite', () => preflightResponse(allowOrigin));

  app.post('/rewrite', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch {
      return jsonResponse({ error: 'Invalid JSON body' }, 400, allowOrigin);
    }
    const parsed = batchSchema.safeParse(body);
    if (!parsed.success) {
      return jsonResponse({ error: parsed.error.issues[0]?.message ?? 'Invalid body' }, 400, allowOrigin);
    }
    const rewriter = c.get('rewriter');
    const results = parsed.data.urls.map((url) => {
      const rewritten = rewriter.rewriteUrl(url);
      return { url, rewritten, changed: rewritten !== url };
    });
    return jsonResponse({ count: results.length, results }, 200, allowOrigin);
  });

  app.get('/__cdn/config', (c) => {
    const { config } = c.get('rewriter');
    const active = config.enabled && config.cdnBaseUrl !== '';
    return jsonResponse({ enabled: active, ...toClientConfig(config) }, 200, allowOrigin);
  });

  app.all('*', async (c) => {
    const url = new URL(c.req.url);
    const target = `${origin}${url.pathname}${url.search}`;
    const method = c.req.method;
    const hasBody = method !== 'GET' && method !== 'HEAD';

    let resp: Response;
    try {
      resp = await fetcher(target, {
        method,
        headers: filterRequestHeaders(c.req.raw.headers),
        body: hasBody ? await c.req.arrayBuffer() : undefined,
        redirect: 'manual',
      });
    } catch (err) {
      logger.warn('Upstream fetch failed', {
        target,
        error: err instanceof Error ? err.message : String(err),
      });
      return textResponse('Bad Gateway', 502);
    }

    const headers = filterResponseHeaders(resp.headers);
    if (method === 'HEAD' || !isHtmlContentType(resp.headers.get('content-type'))) {
      return new Response(resp.body, { status: resp.status, statusText: resp.statusText, headers });
    }

    const hooks = c.get('hooks');
    const html = hooks.applyFilters('the_content', await resp.text());
    const page = injectIntoHead(html, hooks.doAction('head'));
    return new Response(page, { status: resp.status, statusText: resp.statusText, headers });
  });

  return app;
}
