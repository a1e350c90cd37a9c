import { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import { getLogBuffer, logEvents, LogRecord } from '../../util/logger.js';
import { esc, h1, pageShell, wantsJson } from '../html.js';

export function handleLogs(_req: IncomingMessage, res: ServerResponse, url: URL, accept: string) {
  const limit = Number(url.searchParams.get('limit') || '200') || 200;
  const list = getLogBuffer(limit);
  if (wantsJson(url, accept)) {
    res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'application/json');
    return res.end(JSON.stringify(list));
  }
  const rows = list
    .map((r) => `<tr><td>${new Date(r.ts).toISOString()}</td><td>${esc(r.level)}</td><td>${esc(r.msg)}</td><td><code>${r.data === undefined ? '' : esc(JSON.stringify(r.data))}</code></td></tr>`)
    .join('');
  const html = pageShell('Logs', `${h1('Logs')}<div><a href="/">&larr; Dashboard</a> | <a href="/logs?format=json">JSON</a></div><table><thead><tr><th>Time</th><th>Level</th><th>Message</th><th>Data</th></tr></thead><tbody>${rows}</tbody></table>`);
  res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'text/html; charset=utf-8');
  return res.end(html);
}

export function handleLogsStream(_req: IncomingMessage, res: ServerResponse) {
  res.writeHead(StatusCodes.OK, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive'
  });
  const listener = (rec: LogRecord) => {
    res.write(`data: ${JSON.stringify(rec)}\n\n`);
  };
  logEvents.on('log', listener);
  // Initial comment keeps some proxies from buffering
  res.write(': ping\n\n');
  res.on('close', () => { logEvents.off('log', listener); });
}
