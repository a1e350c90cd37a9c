import { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import { isDocumentKind } from '../../domain/types.js';
import logger from '../../util/logger.js';
import { noteOutcome } from '../counters.js';
import type { StatusContext } from '../context.js';

export function isLocalOrLan(addr: string): boolean {
  if (!addr) return false;
  const a = addr.toLowerCase();
  if (a === '::1' || a === '127.0.0.1' || a === '::ffff:127.0.0.1') return true;
  // Normalize IPv4-mapped IPv6
  const v4 = a.startsWith('::ffff:') ? a.slice(7) : a;
  const ipv4Parts = v4.split('.').map((n) => Number(n));
  if (ipv4Parts.length === 4 && ipv4Parts.every((n) => Number.isInteger(n) && n >= 0 && n <= 255)) {
    const [p0, p1] = ipv4Parts;
    if (p0 === 127) return true;
    if (p0 === 10) return true; // 10.0.0.0/8
    if (p0 === 172 && p1 >= 16 && p1 <= 31) return true; // 172.16.0.0/12
    if (p0 === 192 && p1 === 168) return true; // 192.168.0.0/16
    if (p0 === 169 && p1 === 254) return true; // link-local
    return false;
  }
  if (a.startsWith('fe80:')) return true; // link-local
  if (a.startsWith('fc') || a.startsWith('fd')) return true; // ULA fc00::/7
  return false;
}

export function clientAddress(req: IncomingMessage, trustProxy: boolean): string {
  let remote = req.socket.remoteAddress || '';
  if (trustProxy) {
    const header = req.headers['x-forwarded-for'];
    const xff = (Array.isArray(header) ? header[0] : header)?.split(',')[0]?.trim();
    if (xff) remote = xff;
  }
  return remote;
}

function sendText(res: ServerResponse, status: number, text: string) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end(text);
}

// Local/LAN callers only, unless ALLOW_REMOTE_TRIGGER is set
function guard(req: IncomingMessage, res: ServerResponse, ctx: StatusContext): boolean {
  const allowed = ctx.status.allowRemoteTrigger || isLocalOrLan(clientAddress(req, ctx.status.trustProxy));
  if (!allowed) {
    sendText(res, StatusCodes.FORBIDDEN, 'Forbidden');
    return false;
  }
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    sendText(res, StatusCodes.METHOD_NOT_ALLOWED, 'Method Not Allowed');
    return false;
  }
  return true;
}

export function handleTriggerSweep(req: IncomingMessage, res: ServerResponse, ctx: StatusContext) {
  if (!guard(req, res, ctx)) return;
  if (ctx.isSweepRunning()) return sendText(res, StatusCodes.CONFLICT, 'Sweep already in progress');
  ctx.sweep().catch((err) => logger.error({ err }, 'Manual sweep failed'));
  sendText(res, StatusCodes.ACCEPTED, 'Sweep triggered');
}

/** `/reconcile/<kind>/<id>` with kind one of invoice, estimate, contract. */
export function parseReconcilePath(pathname: string) {
  const parts = pathname.split('/').filter(Boolean);
  if (parts.length !== 3 || parts[0] !== 'reconcile') return null;
  const [, kind, rawId] = parts;
  let id: string;
  try {
    id = decodeURIComponent(rawId).trim();
  } catch {
    return null; // malformed escape
  }
  if (!isDocumentKind(kind) || !id) return null;
  return { kind, id };
}

export async function handleReconcile(req: IncomingMessage, res: ServerResponse, ctx: StatusContext, pathname: string) {
  if (!guard(req, res, ctx)) return;
  const target = parseReconcilePath(pathname);
  if (!target) return sendText(res, StatusCodes.BAD_REQUEST, 'Expected /reconcile/<invoice|estimate|contract>/<id>');
  const outcome = await ctx.reconciler.reconcile(target.kind, target.id);
  noteOutcome(outcome.status);
  res.statusCode = StatusCodes.OK;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify({ kind: target.kind, id: target.id, outcome }));
}
