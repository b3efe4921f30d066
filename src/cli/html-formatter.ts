/**
 * Standalone HTML run report: summary cards and one sortable table per
 * domain, with the styles and script inlined.
 */

import type { DomainSummary, RunSummary, SummaryEntry } from "../engine/types.js";

const OUTPUT_SNIPPET = 100;

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Get status badge class
 */
function getStatusClass(status: string): string {
  switch (status) {
    case "success":
      return "status-success";
    case "failure":
      return "status-failure";
    case "timeout":
      return "status-timeout";
    default:
      return "status-other";
  }
}

function snippet(text: string): string {
  return text.length > OUTPUT_SNIPPET ? `${text.slice(0, OUTPUT_SNIPPET)}...` : text;
}

/**
 * Generate result rows for one domain
 */
function generateRows(entries: SummaryEntry[]): string {
  return entries
    .map(
      (entry) => `
    <tr class="result-row${entry.score > 0 ? " high-score" : ""}" data-status="${entry.status}">
      <td><code>${escapeHtml(entry.url)}</code></td>
      <td><code>${escapeHtml(entry.payload)}</code></td>
      <td><span class="badge ${getStatusClass(entry.status)}">${entry.status}</span></td>
      <td>${entry.output ? `<pre class="output"><code>${escapeHtml(snippet(entry.output))}</code></pre>` : "-"}</td>
      <td>${escapeHtml(entry.error) || "-"}</td>
      <td>${escapeHtml(entry.rceParameters.join(", ")) || "-"}</td>
      <td class="score">${entry.score}</td>
    </tr>
  `
    )
    .join("");
}

/**
 * Generate one table per domain
 */
function generateDomains(domains: DomainSummary[]): string {
  if (domains.length === 0) {
    return '<p class="no-results">No results</p>';
  }

  return domains
    .map(
      (domain) => `
    <section class="domain">
      <h2>${escapeHtml(domain.domain)} <small>(best score ${domain.maxScore})</small></h2>
      <table class="results">
        <thead>
          <tr>
            <th onclick="sortTable(this, 0)">URL</th>
            <th onclick="sortTable(this, 1)">Payload</th>
            <th onclick="sortTable(this, 2)">Status</th>
            <th>Output</th>
            <th>Error</th>
            <th>RCE Parameters</th>
            <th onclick="sortTable(this, 6)">Score</th>
          </tr>
        </thead>
        <tbody>
          ${generateRows(domain.entries)}
        </tbody>
      </table>
    </section>
  `
    )
    .join("");
}

/**
 * Generate summary statistics
 */
function generateSummary(summary: RunSummary): string {
  return `
    <div class="summary-grid">
      <div class="summary-card">
        <h3>Tested</h3>
        <div class="stat-value">${summary.total}</div>
      </div>
      <div class="summary-card">
        <h3>Flagged</h3>
        <div class="stat-value${summary.flagged > 0 ? " flagged" : ""}">${summary.flagged}</div>
        <small>score above 0</small>
      </div>
      <div class="summary-card">
        <h3>Failures</h3>
        <div class="stat-value">${summary.byStatus.failure + summary.byStatus["tool-missing"]}</div>
      </div>
      <div class="summary-card">
        <h3>Timeouts</h3>
        <div class="stat-value">${summary.byStatus.timeout}</div>
      </div>
    </div>
  `;
}

/**
 * Format a run summary as standalone HTML
 */
export function formatHtml(summary: RunSummary, version: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>RCE Test Report</title>
  <style>
    :root {
      --color-bg: #0d1117;
      --color-surface: #161b22;
      --color-border: #30363d;
      --color-text: #c9d1d9;
      --color-text-muted: #8b949e;
      --color-critical: #f85149;
      --color-medium: #d29922;
      --color-low: #3fb950;
    }

    * { box-sizing: border-box; margin: 0; padding: 0; }

    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
      background: var(--color-bg);
      color: var(--color-text);
      line-height: 1.6;
      padding: 2rem;
    }

    .container { max-width: 1400px; margin: 0 auto; }

    header {
      display: flex;
      justify-content: space-between;
      align-items: center;
      margin-bottom: 2rem;
      padding-bottom: 1rem;
      border-bottom: 1px solid var(--color-border);
    }

    h1 { font-size: 1.5rem; }
    h2 { font-size: 1.25rem; margin: 1.5rem 0 1rem; }
    h2 small { color: var(--color-text-muted); font-weight: normal; }
    h3 { font-size: 1rem; color: var(--color-text-muted); margin-bottom: 0.5rem; }

    .meta { color: var(--color-text-muted); font-size: 0.875rem; }

    .summary-grid {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
      gap: 1rem;
      margin-bottom: 2rem;
    }

    .summary-card {
      background: var(--color-surface);
      border: 1px solid var(--color-border);
      border-radius: 6px;
      padding: 1rem;
      text-align: center;
    }

    .stat-value { font-size: 2rem; font-weight: bold; }
    .stat-value.flagged { color: var(--color-critical); }

    table {
      width: 100%;
      border-collapse: collapse;
      background: var(--color-surface);
      border-radius: 6px;
      overflow: hidden;
    }

    th, td {
      padding: 0.75rem 1rem;
      text-align: left;
      border-bottom: 1px solid var(--color-border);
      vertical-align: top;
    }

    th {
      background: var(--color-bg);
      font-weight: 600;
      color: var(--color-text-muted);
      font-size: 0.75rem;
      text-transform: uppercase;
      cursor: pointer;
    }

    tr.high-score { background: rgba(248, 81, 73, 0.15); }

    .badge {
      display: inline-block;
      padding: 0.25rem 0.5rem;
      border-radius: 4px;
      font-size: 0.75rem;
      font-weight: 600;
      text-transform: uppercase;
    }

    .status-success { background: var(--color-low); color: black; }
    .status-failure { background: var(--color-critical); color: white; }
    .status-timeout { background: var(--color-medium); color: black; }
    .status-other { background: var(--color-border); color: var(--color-text); }

    .output {
      background: var(--color-bg);
      padding: 0.5rem;
      border-radius: 4px;
      font-size: 0.75rem;
      max-width: 400px;
      white-space: pre-wrap;
      word-break: break-all;
    }

    .score { font-weight: bold; text-align: right; }

    .no-results {
      text-align: center;
      color: var(--color-text-muted);
      padding: 2rem;
    }

    footer {
      margin-top: 2rem;
      padding-top: 1rem;
      border-top: 1px solid var(--color-border);
      text-align: center;
      color: var(--color-text-muted);
      font-size: 0.875rem;
    }
  </style>
</head>
<body>
  <div class="container">
    <header>
      <h1>RCE Test Report</h1>
      <div class="meta">Generated: ${summary.generatedAt}</div>
    </header>

    <section id="summary">
      ${generateSummary(summary)}
    </section>

    ${generateDomains(summary.domains)}

    <footer>
      Generated by qsprobe v${version}
    </footer>
  </div>

  <script>
    function sortTable(header, column) {
      const tbody = header.closest('table').querySelector('tbody');
      const rows = Array.from(tbody.querySelectorAll('tr'));
      const numeric = column === 6;
      const dir = header.dataset.dir === 'asc' ? 'desc' : 'asc';
      header.dataset.dir = dir;
      rows.sort((a, b) => {
        const x = a.children[column].textContent.trim();
        const y = b.children[column].textContent.trim();
        const cmp = numeric ? Number(x) - Number(y) : x.localeCompare(y);
        return dir === 'asc' ? cmp : -cmp;
      });
      rows.forEach((row) => tbody.appendChild(row));
    }
  </script>
</body>
</html>`;
}
