import { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import { EntitySweepSummary, getLastSummary } from '../../sync/summary.js';
import logger from '../../util/logger.js';
import { getCounters } from '../counters.js';
import type { StatusContext } from '../context.js';
import { esc, h1, human, pageShell, wantsJson } from '../html.js';

const ENTITY_HEADER = '<tr><th>Entity</th><th>Pending</th><th>Uploaded</th><th>Unchanged</th><th>Ineligible</th><th>In progress</th><th>Failed</th><th>Duration</th></tr>';

export function entityRows(entities: EntitySweepSummary[]) {
  return entities
    .map((e) => `<tr><td>${esc(e.entity)}</td><td>${e.pending}</td><td>${e.uploaded}</td><td>${e.skipped}</td><td>${e.ineligible}</td><td>${e.inProgress}</td><td>${e.failed}</td><td title="${e.ms} ms">${human(e.ms)}</td></tr>`)
    .join('');
}

export function handleSyncSummary(_req: IncomingMessage, res: ServerResponse, url: URL, accept: string) {
  const data = { ...getLastSummary(), counters: getCounters() };
  if (wantsJson(url, accept)) {
    res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'application/json');
    return res.end(JSON.stringify(data));
  }
  const { lastSummary, inProgress } = data;
  res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'text/html; charset=utf-8');
  if (!lastSummary) {
    return res.end(pageShell('Sweep Summary', `${h1('Sweep Summary')}<p>No completed sweep yet. ${inProgress ? '<span class="progress">In progress...</span>' : ''}</p><p><a href="/">&larr; Dashboard</a></p>`));
  }
  const status = lastSummary.success ? '<span class="ok">SUCCESS</span>' : '<span class="fail">FAIL</span>';
  return res.end(pageShell('Latest Sweep Summary', `${h1('Latest Sweep Summary')}<div>Status: ${status}</div><div>Start: <code>${esc(lastSummary.start)}</code> | End: <code>${esc(lastSummary.end)}</code> | Duration: <code>${human(lastSummary.durationMs)}</code>${inProgress ? ' | <em>In Progress</em>' : ''}</div>${lastSummary.error ? `<div class="fail">Error: ${esc(lastSummary.error)}</div>` : ''}<div style="margin-top:.5rem"><a href="/">&larr; Dashboard</a> | <a href="/sync-summary?format=json">Raw JSON</a> | <a href="/summaries">All Summaries</a></div><table><thead>${ENTITY_HEADER}</thead><tbody>${entityRows(lastSummary.entities)}</tbody></table>`));
}

export async function handleSummaries(_req: IncomingMessage, res: ServerResponse, url: URL, accept: string, ctx: StatusContext) {
  const limit = Math.max(1, Math.min(200, parseInt(url.searchParams.get('limit') || '25', 10) || 25));
  try {
    const docs = await ctx.history.listSummaries(limit);
    if (wantsJson(url, accept)) {
      res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'application/json');
      return res.end(JSON.stringify(docs));
    }
    const rows = docs
      .map((d) => `<tr><td>${esc(d.start)}</td><td>${esc(d.end)}</td><td>${human(d.durationMs || 0)}</td><td>${d.success ? '✔' : '✖'}</td><td>${d.error ? esc(d.error.substring(0, 60)) : ''}</td><td>${(d.entities || []).reduce((n, e) => n + e.uploaded, 0)}</td><td>${(d.entities || []).reduce((n, e) => n + e.failed, 0)}</td></tr>`)
      .join('');
    res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'text/html; charset=utf-8');
    return res.end(pageShell('Sweep Summaries', `${h1('Sweep Summaries')}<div><a href="/">&larr; Dashboard</a> | <a href="/summaries?format=json">Raw JSON</a></div><table><thead><tr><th>Start</th><th>End</th><th>Duration</th><th>Success</th><th>Error</th><th>Uploaded</th><th>Failed</th></tr></thead><tbody>${rows}</tbody></table>`));
  } catch (err) {
    logger.warn({ err }, 'Failed to load sweep summaries');
    res.statusCode = StatusCodes.INTERNAL_SERVER_ERROR;
    return res.end('Error');
  }
}
