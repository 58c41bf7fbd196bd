export const hopByHopHeaders = new Set([
  'connection',
  'proxy-connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'trailer',
  'te',
]);

export const disallowedRequestHeaders = new Set(['host', 'content-length']);

// fetch() hands back a decoded body, so the upstream's framing headers no longer apply.
export const droppedResponseHeaders = new Set(['content-encoding', 'content-length']);

export function filterRequestHeaders(input: Headers): Headers {
  const out = new Headers();
  input.forEach((value, key) => {
    const k = key.toLowerCase();
    if (hopByHopHeaders.has(k)) return;
    if (disallowedRequestHeaders.has(k)) return;
    out.set(key, value);
  });
  return out;
}

export function filterResponseHeaders(input: Headers): Headers {
  const out = new Headers();
  input.forEach((value, key) => {
    const k = key.toLowerCase();
    if (hopByHopHeaders.has(k)) return;
    if (droppedResponseHeaders.has(k)) return;
    out.append(key, value);
  });
  return out;
}

export function appendCors(headers: Headers, allowOrigin: string) {
  headers.set('Access-Control-Allow-Origin', allowOrigin || '*');
  headers.set('Access-Control-Expose-Headers', 'Content-Type, Content-Length');
}

export function preflightResponse(allowOrigin: string): Response {
  return new Response(null, {
    status: 204,
    headers: {
      'Access-Control-Allow-Origin': allowOrigin || '*',
      'Access-Control-Allow-Methods': 'POST,OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type',
      'Access-Control-Max-Age': '86400',
    },
  });
}

export function textResponse(body: string, status: number, allowOrigin?: string): Response {
  const h = new Headers({ 'Content-Type': 'text/plain; charset=utf-8' });
  if (allowOrigin !== undefined) appendCors(h, allowOrigin);
  return new Response(body, { status, headers: h });
}

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime === 'text/html' || mime === 'application/xhtml+xml';
}

/**
 * Inserts markup right after the opening <head> tag. Documents without one
 * are returned untouched.
 */
export function injectIntoHead(html: string, markup: string): string {
  if (!markup) return html;
  const m = /<head\b[^>]*>/i.exec(html);
  if (!m) return html;
  const at = m.index + m[0].length;
  return `${html.slice(0, at)}\n${markup}${html.slice(at)}`;
}
