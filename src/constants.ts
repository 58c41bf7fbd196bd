export const DEFAULT_FILE_TYPES = 'js,css,png,jpg,jpeg,gif,svg,woff,woff2,ttf,eot';
export const DEFAULT_EXCLUDED_PATHS = '/wp-admin/*, /wp-login.php';
export const DEFAULT_GITHUB_BRANCH = 'main';

// Any URL containing one of these is never rewritten, whatever the rules say.
export const ADMIN_PATH_MARKERS: readonly string[] = ['/wp-admin', '/wp-login'];

export const JSDELIVR_GH_BASE = 'https://cdn.jsdelivr.net/gh';

export const DEFAULT_PORT = 8787;
export const MAX_BATCH_URLS = 64;
