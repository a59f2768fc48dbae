import type { EngineStats } from '../core/stats.js';
import { statusWithElapsed } from '../core/stats.js';
import { JOB_STATUSES, type Job, type JobStatus } from '../core/types.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function html(title: string, body: string): string {
  return `
  <!DOCTYPE html>
  <html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <meta http-equiv="refresh" content="10" />
    <title>${escapeHtml(title)}</title>
    <style>
      :root {
        --bg: #0d0d10;
        --card: #1b1b1f;
        --text: #e8e8e8;
        --border: #2a2a2d;
        --accent: #007bff;
        --success: #4caf50;
        --fail: #f44336;
        --warn: #ff9800;
        --gray: #6c757d;
      }
      * { box-sizing: border-box; }
      body { margin: 0; font-family: 'Segoe UI', Roboto, sans-serif; background: var(--bg); color: var(--text); }
      header {
        background: #18181b;
        padding: 15px 25px;
        display: flex;
        justify-content: space-between;
        align-items: center;
        border-bottom: 1px solid var(--border);
      }
      header h1 { margin: 0; font-size: 1.5rem; color: var(--accent); }
      header small { color: #888; }
      main { padding: 20px 30px; }
      h2 { margin-top: 40px; color: var(--accent); border-left: 4px solid var(--accent); padding-left: 10px; }
      table {
        width: 100%;
        border-collapse: collapse;
        background: var(--card);
        border-radius: 8px;
        overflow: hidden;
        margin-top: 10px;
      }
      th, td { padding: 10px 12px; border-bottom: 1px solid var(--border); font-size: 0.9rem; }
      th { text-align: left; background: #202024; color: #ccc; }
      tr:hover { background: #2a2a2d; }
      button {
        background-color: var(--accent);
        color: white;
        border: none;
        padding: 6px 10px;
        border-radius: 4px;
        cursor: pointer;
        font-size: 0.8rem;
      }
      .badge {
        display: inline-block;
        padding: 3px 8px;
        border-radius: 5px;
        font-size: 0.75rem;
        font-weight: 600;
        text-transform: uppercase;
      }
      .badge.queued { background: var(--warn); color: #000; }
      .badge.running { background: var(--accent); }
      .badge.completed { background: var(--success); color: #000; }
      .badge.failed { background: var(--fail); }
      .badge.timeout { background: var(--fail); }
      .badge.cancelled { background: var(--gray); }
      .stats-bar {
        display: flex;
        justify-content: space-around;
        background: var(--card);
        border: 1px solid var(--border);
        padding: 15px;
        border-radius: 8px;
        margin-top: 20px;
      }
      .stat { text-align: center; font-size: 0.95rem; }
      .stat span { display: block; font-size: 1.4rem; margin-top: 5px; }
      .stat.queued span { color: var(--warn); }
      .stat.running span { color: var(--accent); }
      .stat.completed span { color: var(--success); }
      .stat.failed span, .stat.timeout span { color: var(--fail); }
      .stat.cancelled span { color: var(--gray); }
    </style>
  </head>
  <body>
    <header>
      <h1>harvestq</h1>
      <small>${escapeHtml(title)}</small>
    </header>
    <main>${body}</main>
    <script>
      async function cancelJob(id) {
        const res = await fetch('/jobs/' + id, { method: 'DELETE' });
        if (!res.ok) alert('Cancel failed: HTTP ' + res.status);
        location.reload();
      }
    </script>
  </body>
  </html>`;
}

export interface DashboardData {
  stats: EngineStats;
  jobs: Partial<Record<JobStatus, Job[]>>;
  /** Show cancel buttons; off when the API needs a key the page cannot send. */
  allowCancel: boolean;
  now: number;
}

function jobRow(job: Job, allowCancel: boolean, now: number): string {
  const error = job.error ? `<span class="badge failed">${escapeHtml(job.error.slice(0, 60))}</span>` : '';
  const action =
    allowCancel && (job.status === 'queued' || job.status === 'running')
      ? `<button onclick="cancelJob('${escapeHtml(job.id)}')">Cancel</button>`
      : '';
  return `<tr>
        <td>${escapeHtml(job.id)}</td>
        <td>${escapeHtml(job.task_name)}</td>
        <td>${escapeHtml(statusWithElapsed(job, now))}</td>
        <td>${job.priority}</td>
        <td>${job.retry_count}/${job.max_retries}</td>
        <td>${escapeHtml(job.worker_id ?? '')}</td>
        <td>${escapeHtml(job.created_at)}</td>
        <td>${error}</td>
        <td>${action}</td>
      </tr>`;
}

export function renderDashboard({ stats, jobs, allowCancel, now }: DashboardData): string {
  const counts = stats.jobs.by_status;
  let body = `
  <div class="stats-bar">
    ${JOB_STATUSES.map(
      (s) => `
      <div class="stat ${s}">
        ${s.toUpperCase()}
        <span>${counts[s]}</span>
      </div>`,
    ).join('')}
    <div class="stat">
      WORKERS
      <span>${stats.workers.healthy_workers}/${stats.workers.max_workers}</span>
    </div>
  </div>`;

  for (const status of JOB_STATUSES) {
    const rows = jobs[status] ?? [];
    body += `<h2>${status.toUpperCase()} <span class="badge ${status}">${counts[status]}</span></h2>`;
    if (rows.length === 0) {
      body += `<p><i>No jobs</i></p>`;
      continue;
    }
    body += `<table><tr><th>ID</th><th>Task</th><th>Status</th><th>Priority</th><th>Retries</th><th>Worker</th><th>Created</th><th>Last Error</th><th></th></tr>`;
    for (const job of rows) body += jobRow(job, allowCancel, now);
    body += `</table>`;
  }

  return html(`v${stats.service.version}, up ${stats.service.uptime_seconds}s`, body);
}
