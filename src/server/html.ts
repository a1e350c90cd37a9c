import { APP_VERSION } from '../version.js';

export function esc(s: unknown) {
  return String(s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function h1(title: string) {
  return `<h1>${esc(title)} <small style="font-size:.55em;opacity:.65;">v${esc(APP_VERSION)}</small></h1>`;
}

export function human(ms: number) {
  if (ms < 1000) return ms + ' ms';
  const sec = ms / 1000;
  if (sec < 60) return sec.toFixed(sec < 10 ? 2 : 1) + ' s';
  const m = Math.floor(sec / 60);
  const s = Math.floor(sec % 60);
  const remMs = Math.floor(ms % 1000);
  if (sec < 3600) return m + 'm ' + s + 's' + (remMs ? ' ' + remMs + 'ms' : '');
  const h = Math.floor(m / 60);
  const mm = m % 60;
  return h + 'h ' + mm + 'm ' + s + 's';
}

export function pageShell(title: string, body: string, extraHead = '') {
  return `<!DOCTYPE html><html><head><meta charset="UTF-8"/><title>${esc(title)}</title>${extraHead}<style>body{font-family:system-ui,Arial,sans-serif;background:#0f1115;color:#eee;margin:1.2rem;}table{border-collapse:collapse;width:100%;margin-top:1rem;}th,td{border:1px solid #333;padding:4px 6px;font-size:.7rem;text-align:left;}th{background:#1d2229;}tbody tr:nth-child(even){background:#181c22;}a{color:#6cc6ff;text-decoration:none;}a:hover{text-decoration:underline;}.ok{color:#6cc644;}.fail{color:#ff5555;}.progress{color:#f0ad4e;}code{background:#181c22;padding:2px 4px;border-radius:4px;}button{background:#1d2229;color:#eee;border:1px solid #333;padding:6px 10px;border-radius:4px;cursor:pointer;}</style></head><body>${body}</body></html>`;
}

/** JSON when asked for by `?format=json` or an Accept header that doesn't also take HTML. */
export function wantsJson(url: URL, accept: string) {
  const format = (url.searchParams.get('format') || '').toLowerCase();
  if (format) return format === 'json';
  return accept.includes('application/json') && !accept.includes('text/html');
}
