import http, { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import logger from '../util/logger.js';
import type { StatusContext } from './context.js';
import { handleAttempts } from './controllers/attemptsController.js';
import { handleDashboard } from './controllers/dashboardController.js';
import { handleLogs, handleLogsStream } from './controllers/logsController.js';
import { handleSummaries, handleSyncSummary } from './controllers/summariesController.js';
import { handleReconcile, handleTriggerSweep } from './controllers/triggerController.js';

export function checkBasicAuth(header: string | undefined, user: string, pass: string): boolean {
  if (!header || !header.startsWith('Basic ')) return false;
  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString();
  const sep = decoded.indexOf(':');
  if (sep < 0) return false;
  return decoded.slice(0, sep) === user && decoded.slice(sep + 1) === pass;
}

async function route(req: IncomingMessage, res: ServerResponse, ctx: StatusContext) {
  const url = new URL(req.url || '/', 'http://x');
  const path = url.pathname;
  const accept = req.headers.accept || '';

  // Health endpoint (no auth) for container orchestration
  if (path === '/health') {
    res.statusCode = StatusCodes.OK; return res.end('ok');
  }
  const { authUser, authPass } = ctx.status;
  if (authUser && authPass && !checkBasicAuth(req.headers.authorization, authUser, authPass)) {
    res.statusCode = StatusCodes.UNAUTHORIZED;
    res.setHeader('WWW-Authenticate', 'Basic realm="Portal Sync"');
    return res.end('Authentication required');
  }

  if (path === '/' || path === '/index.html') return handleDashboard(req, res);
  if (path === '/sync-summary') return handleSyncSummary(req, res, url, accept);
  if (path === '/summaries') return handleSummaries(req, res, url, accept, ctx);
  if (path === '/attempts') return handleAttempts(req, res, url, accept, ctx);
  if (path === '/logs') return handleLogs(req, res, url, accept);
  if (path === '/logs/stream') return handleLogsStream(req, res);
  if (path === '/trigger-sweep') return handleTriggerSweep(req, res, ctx);
  if (path.startsWith('/reconcile/')) return handleReconcile(req, res, ctx, path);

  res.statusCode = StatusCodes.NOT_FOUND; res.end('Not found');
}

export function createStatusHandler(ctx: StatusContext) {
  return (req: IncomingMessage, res: ServerResponse) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug({ method: req.method, url: req.url, status: res.statusCode, ms: Date.now() - startedAt }, 'route');
    });
    route(req, res, ctx).catch((err) => {
      logger.error({ err, url: req.url }, 'Status route failed');
      if (!res.headersSent) res.statusCode = StatusCodes.INTERNAL_SERVER_ERROR;
      res.end();
    });
  };
}

export function startStatusServer(ctx: StatusContext) {
  const server = http.createServer(createStatusHandler(ctx));
  server.listen(ctx.status.port, () => logger.info({ port: ctx.status.port }, 'Status server listening'));
  return server;
}
