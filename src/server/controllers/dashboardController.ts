import { IncomingMessage, ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import { getLastSummary } from '../../sync/summary.js';
import { getCounters } from '../counters.js';
import { esc, h1, human, pageShell } from '../html.js';
import { entityRows } from './summariesController.js';

const TRIGGER_SCRIPT = `<script>
  (function(){
    var btn = document.getElementById('triggerBtn');
    var out = document.getElementById('triggerResult');
    btn.addEventListener('click', async function(){
      btn.disabled = true; out.textContent = '';
      try { var r = await fetch('/trigger-sweep', { method: 'POST' }); out.className = r.ok ? 'ok' : 'fail'; out.textContent = (r.ok ? 'OK ' : 'FAIL ') + await r.text(); }
      catch (e) { out.className = 'fail'; out.textContent = 'Error ' + e.message; }
      finally { btn.disabled = false; setTimeout(function(){ location.reload(); }, 3000); }
    });
  })();
</script>`;

export function renderDashboard(): string {
  const { lastSummary, inProgress, startedAt } = getLastSummary();
  const counters = getCounters();
  let status: string;
  if (!lastSummary) status = '<span class="progress">No completed sweep yet.</span>';
  else {
    status = `Last sweep: ${lastSummary.success ? '<span class="ok">SUCCESS</span>' : '<span class="fail">FAIL</span>'} | Start: <code>${esc(lastSummary.start)}</code> | Duration: <code>${human(lastSummary.durationMs)}</code>`;
    if (lastSummary.error) status += `<br/><small class="fail">${esc(lastSummary.error)}</small>`;
  }
  if (inProgress) status += ` | <span class="progress">Sweep running since ${esc(new Date(startedAt).toISOString())}</span>`;
  const o = counters.outcomes;
  const body = `
    ${h1('Portal Sync')}
    <div style="display:flex;gap:.6rem;flex-wrap:wrap;margin-bottom:.5rem;">
      <button type="button" id="triggerBtn">Trigger Sweep</button>
      <span id="triggerResult" style="align-self:center;font-size:.75rem;"></span>
    </div>
    <div>${status}</div>
    <div style="margin-top:.4rem;font-size:.75rem;">Sweeps: ${counters.totalSweeps} (failed ${counters.failedSweeps}) | Last duration: ${human(counters.lastDurationMs)} | Uploaded ${o.uploaded} | Unchanged ${o.skipped_unchanged} | Ineligible ${o.ineligible} | In progress ${o.in_progress} | Failed ${o.failed}</div>
    ${lastSummary ? `<table><thead><tr><th>Entity</th><th>Pending</th><th>Uploaded</th><th>Unchanged</th><th>Ineligible</th><th>In progress</th><th>Failed</th><th>Duration</th></tr></thead><tbody>${entityRows(lastSummary.entities)}</tbody></table>` : ''}
    <p style="margin-top:1rem;font-size:.75rem;">Shortcuts: <a href="/sync-summary">/sync-summary</a> · <a href="/summaries">/summaries</a> · <a href="/attempts">/attempts</a> · <a href="/logs">/logs</a></p>
    ${TRIGGER_SCRIPT}`;
  return pageShell('Portal Sync Dashboard', body, '<meta http-equiv="refresh" content="30"/>');
}

export function handleDashboard(_req: IncomingMessage, res: ServerResponse) {
  res.statusCode = StatusCodes.OK; res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.end(renderDashboard());
}
