import { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import { isDocumentKind } from '../../domain/types.js';
import logger from '../../util/logger.js';
import type { StatusContext } from '../context.js';
import type { AttemptQuery, AttemptRow } from '../history.js';
import { esc, h1, pageShell, wantsJson } from '../html.js';

export function parseAttemptQuery(url: URL): AttemptQuery {
  const limit = Math.max(1, Math.min(500, Number(url.searchParams.get('limit') || '100') || 100));
  const kind = url.searchParams.get('kind') || '';
  const documentId = url.searchParams.get('documentId') || undefined;
  const sinceStr = url.searchParams.get('since') || undefined;
  let since: Date | undefined = undefined;
  if (sinceStr) {
    const t = Date.parse(sinceStr);
    if (!Number.isNaN(t)) since = new Date(t);
  }
  return { limit, kind: isDocumentKind(kind) ? kind : undefined, documentId, since };
}

export async function handleAttempts(_req: IncomingMessage, res: ServerResponse, url: URL, accept: string, ctx: StatusContext) {
  const query = parseAttemptQuery(url);
  let docs: AttemptRow[];
  try {
    docs = await ctx.history.listAttempts(query);
  } catch (err) {
    logger.warn({ err }, 'Failed to load sync attempts');
    res.statusCode = StatusCodes.INTERNAL_SERVER_ERROR;
    return res.end('Error');
  }

  if (wantsJson(url, accept)) {
    res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'application/json');
    return res.end(JSON.stringify(docs));
  }

  const rows = docs.map((d) => {
    const when = d.ts ? new Date(d.ts).toISOString() : '';
    const detail = d.outcome === 'failed' ? esc(d.message) : d.blobUrl ? `<a href="${esc(d.blobUrl)}">${d.reusedBlob ? 'reused' : 'new'} PDF</a>` : '';
    return `<tr><td>${when}</td><td>${esc(d.kind)}</td><td><code>${esc(d.documentId)}</code></td><td class="${d.outcome === 'failed' ? 'fail' : 'ok'}">${esc(d.outcome)}</td><td>${d.ms ?? ''}</td><td>${detail}</td></tr>`;
  }).join('');

  const html = pageShell('Sync Attempts', `
    ${h1('Recent Sync Attempts')}
    <div><a href="/">&larr; Dashboard</a> | <a href="/attempts?format=json">JSON</a></div>
    <form method="GET" action="/attempts" style="margin:.5rem 0; display:flex; gap:.5rem; flex-wrap:wrap;">
      <label>Kind <input type="text" name="kind" value="${esc(query.kind)}" /></label>
      <label>Document <input type="text" name="documentId" value="${esc(query.documentId)}" /></label>
      <label>Since <input type="text" name="since" placeholder="YYYY-MM-DD" value="${query.since ? query.since.toISOString().slice(0, 10) : ''}" /></label>
      <label>Limit <input type="number" min="1" max="500" name="limit" value="${query.limit}" /></label>
      <button type="submit">Apply</button>
    </form>
    <table>
      <thead><tr><th>When</th><th>Kind</th><th>Document</th><th>Outcome</th><th>ms</th><th>Detail</th></tr></thead>
      <tbody>${rows}</tbody>
    </table>
  `);
  res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'text/html; charset=utf-8');
  return res.end(html);
}
