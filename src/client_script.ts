import type { ConfigurationSnapshot } from './snapshot';

export const CLIENT_CONFIG_GLOBAL = 'cdnRewriteConfig';

export interface ClientConfig {
  baseUrl: string;
  cdnBaseUrl: string;
  fileTypes: string[];
  excludedPaths: string[];
  adminPaths: string[];
}

export function toClientConfig(config: ConfigurationSnapshot): ClientConfig {
  return {
    baseUrl: config.siteUrl,
    cdnBaseUrl: config.cdnBaseUrl,
    fileTypes: [...config.acceptedExtensions],
    excludedPaths: config.excludedPathRules.map((rule) => rule.source),
    adminPaths: [...config.adminPathMarkers],
  };
}

// JSON that cannot terminate the surrounding <script> or break on U+2028/9.
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

// Browser-side copy of shouldRewrite/mapToCdnUrl. Keep the two in step.
const CLIENT_RUNTIME = `(function () {
  var config = window.${CLIENT_CONFIG_GLOBAL};
  if (!config || !config.cdnBaseUrl) return;
  var site;
  try { site = new URL(config.baseUrl); } catch (e) { return; }
  var cdnBase = config.cdnBaseUrl.replace(/\\/+$/, '');
  var sitePath = site.pathname.replace(/\\/+$/, '');

  function isExcluded(path) {
    for (var i = 0; i < config.excludedPaths.length; i++) {
      var rule = config.excludedPaths[i];
      if (rule.slice(-1) === '*') {
        if (path.indexOf(rule.slice(0, -1)) === 0) return true;
      } else if (path === rule) {
        return true;
      }
    }
    return false;
  }

  function extensionOf(path) {
    var segment = path.slice(path.lastIndexOf('/') + 1);
    var dot = segment.lastIndexOf('.');
    if (dot < 0 || dot === segment.length - 1) return '';
    return segment.slice(dot + 1).toLowerCase();
  }

  function shouldRewriteUrl(url) {
    if (!url || url.indexOf('data:') === 0) return false;
    for (var i = 0; i < config.adminPaths.length; i++) {
      if (url.indexOf(config.adminPaths[i]) !== -1) return false;
    }
    var resolved;
    try { resolved = new URL(url, config.baseUrl); } catch (e) { return false; }
    if (resolved.origin !== site.origin) return false;
    if (isExcluded(resolved.pathname)) return false;
    var ext = extensionOf(resolved.pathname);
    return ext !== '' && config.fileTypes.indexOf(ext) !== -1;
  }

  function removeDotSegments(path) {
    var segments = path.split('/').slice(1);
    var out = [];
    for (var i = 0; i < segments.length; i++) {
      var segment = segments[i];
      var last = i === segments.length - 1;
      if (/^(?:\\.|%2e){2}$/i.test(segment)) {
        out.pop();
        if (last) out.push('');
      } else if (/^(?:\\.|%2e)$/i.test(segment)) {
        if (last) out.push('');
      } else {
        out.push(segment);
      }
    }
    return '/' + out.join('/');
  }

  function remotePath(url) {
    var cut = url.search(/[?#]/);
    var reference = cut < 0 ? url : url.slice(0, cut);
    var suffix = cut < 0 ? '' : url.slice(cut);
    var path = reference.replace(/^(?:[a-z][a-z\\d+.-]*:)?\\/\\/[^\\/?#]*/i, '');
    if (path === reference && path.charAt(0) !== '/') {
      path = site.pathname.slice(0, site.pathname.lastIndexOf('/') + 1) + path;
    }
    path = removeDotSegments(path || '/');
    if (sitePath && (path === sitePath || path.indexOf(sitePath + '/') === 0)) {
      path = path.slice(sitePath.length);
    }
    return path.replace(/^\\/+/, '') + suffix;
  }

  function rewriteUrl(url) {
    return shouldRewriteUrl(url) ? cdnBase + '/' + remotePath(url) : url;
  }

  var originalCreateElement = document.createElement;
  document.createElement = function (tagName) {
    var element = originalCreateElement.apply(document, arguments);
    var tag = String(tagName).toLowerCase();
    if (tag === 'script' || tag === 'link') {
      var originalSetAttribute = element.setAttribute;
      element.setAttribute = function (name, value) {
        if ((name === 'src' || name === 'href') && value) value = rewriteUrl(String(value));
        return originalSetAttribute.call(this, name, value);
      };
    }
    return element;
  };

  function rewriteNode(node) {
    if (!node || !node.tagName) return;
    var tag = node.tagName.toLowerCase();
    var attr = tag === 'link' ? 'href' : tag === 'script' || tag === 'img' ? 'src' : null;
    if (!attr) return;
    var current = node.getAttribute(attr);
    if (!current) return;
    var next = rewriteUrl(current);
    if (next !== current) node.setAttribute(attr, next);
  }

  if (window.MutationObserver) {
    new MutationObserver(function (mutations) {
      for (var i = 0; i < mutations.length; i++) {
        if (mutations[i].type !== 'childList') continue;
        var added = mutations[i].addedNodes;
        for (var j = 0; j < added.length; j++) rewriteNode(added[j]);
      }
    }).observe(document, { childList: true, subtree: true });
  }
})();`;

/**
 * Markup for the document head: the public config plus a small runtime that
 * rewrites assets added after the server-rendered HTML. Empty when inactive.
 */
export function renderConfigScript(config: ConfigurationSnapshot): string {
  if (!config.enabled || !config.cdnBaseUrl) return '';
  const payload = serializeForScript(toClientConfig(config));
  return [
    '<script type="text/javascript">',
    `window.${CLIENT_CONFIG_GLOBAL} = ${payload};`,
    CLIENT_RUNTIME,
    '</script>',
  ].join('\n');
}
