// Self-contained report page, shipped inside a data URI.

import { Encoding } from "effect";
import { REPORT_TITLE } from "../format.ts";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Tapping the text selects all of it; the button copies it. */
export function buildReportPage(report: string): string {
  return `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${REPORT_TITLE}</title>
<style>
body { font-family: system-ui, sans-serif; margin: 1rem; }
pre { white-space: pre-wrap; font-size: 1rem; padding: 0.75rem; border: 1px solid #ccc; border-radius: 6px; -webkit-user-select: all; user-select: all; }
button { font-size: 1rem; padding: 0.5rem 1rem; }
</style>
</head>
<body>
<pre id="report" onclick="getSelection().selectAllChildren(this)">${escapeHtml(report)}</pre>
<button onclick="navigator.clipboard.writeText(document.getElementById('report').innerText).then(() => { this.textContent = 'Copied'; })">Copy</button>
</body>
</html>
`;
}

export function reportDataUri(report: string): string {
  return `data:text/html;base64,${Encoding.encodeBase64(buildReportPage(report))}`;
}
