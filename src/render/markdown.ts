/**
 * Report Documents
 *
 * Turns the generated report body into the Markdown and HTML files that are
 * saved next to the run's images and figures. Mermaid code blocks become
 * `<pre class="mermaid">` elements that mermaid.js renders in the browser.
 *
 * Dependencies:
 * - marked: GFM Markdown to HTML (tables, fenced code)
 */
import { Marked, type Tokens } from 'marked';
import { formatDisplayDate } from '../utils/time.js';

const MERMAID_SCRIPT = `<script type="module">
  import mermaid from 'https://cdn.jsdelivr.net/npm/mermaid@11/dist/mermaid.esm.min.mjs';
  mermaid.initialize({ startOnLoad: true, theme: 'default' });
</script>`;

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", "Hiragino Sans", "Noto Sans JP", sans-serif; line-height: 1.7; color: #222; max-width: 900px; margin: 0 auto; padding: 2rem; }
  h1 { border-bottom: 2px solid #333; padding-bottom: 0.3em; }
  h2 { border-bottom: 1px solid #ccc; padding-bottom: 0.2em; margin-top: 2em; }
  .metadata { color: #666; font-size: 0.9em; margin-bottom: 2em; }
  table { border-collapse: collapse; width: 100%; margin: 1em 0; }
  th, td { border: 1px solid #ccc; padding: 0.4em 0.8em; text-align: left; }
  th { background: #f4f4f4; }
  pre { background: #f6f8fa; padding: 1em; overflow-x: auto; border-radius: 4px; }
  pre.mermaid { background: none; text-align: center; }
  img { max-width: 100%; height: auto; }
  blockquote { border-left: 4px solid #ddd; margin: 0; padding-left: 1em; color: #555; }
  @media print { body { max-width: none; padding: 0; } pre.mermaid { page-break-inside: avoid; } }
`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const markdown = new Marked({
  gfm: true,
  renderer: {
    code({ text, lang }: Tokens.Code): string | false {
      if (lang?.trim() === 'mermaid') {
        return `<pre class="mermaid">${escapeHtml(text)}</pre>\n`;
      }
      return false;
    },
  },
});

/** `# title`, the creation time, then the body. */
export function renderMarkdownDocument(title: string, createdAt: Date, body: string): string {
  return `# ${title}\n\nCreated: ${formatDisplayDate(createdAt)}\n\n${body.trim()}\n`;
}

export function renderHtmlBody(body: string): string {
  return markdown.parse(body, { async: false });
}

export function renderHtmlDocument(title: string, createdAt: Date, body: string): string {
  const safeTitle = escapeHtml(title);
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${safeTitle}</title>
<style>${STYLES}</style>
</head>
<body>
<h1>${safeTitle}</h1>
<div class="metadata">Created: ${formatDisplayDate(createdAt)}</div>
${renderHtmlBody(body)}
${MERMAID_SCRIPT}
</body>
</html>
`;
}
