export interface PageInput {
  topic: string;
  categoryLabel: string;
  bodyHtml: string;
  metaDescription: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const PAGE_STYLES = `
    :root { color-scheme: light; }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
      line-height: 1.7;
      color: #1f2933;
      background: #f5f7fa;
    }
    header.site-header {
      background: linear-gradient(135deg, #1e3a8a, #2563eb);
      color: #ffffff;
      padding: 2.5rem 1.5rem 2rem;
      text-align: center;
    }
    header.site-header .category {
      display: inline-block;
      padding: 0.25rem 0.75rem;
      border-radius: 999px;
      background: rgba(255, 255, 255, 0.18);
      font-size: 0.8rem;
      letter-spacing: 0.08em;
      text-transform: uppercase;
    }
    header.site-header .topic { margin: 0.75rem 0 0; font-size: 1.1rem; opacity: 0.9; }
    main {
      max-width: 780px;
      margin: -1.5rem auto 3rem;
      padding: 2.5rem;
      background: #ffffff;
      border-radius: 12px;
      box-shadow: 0 10px 30px rgba(15, 23, 42, 0.08);
    }
    main h1 { font-size: 2.1rem; line-height: 1.25; margin-top: 0; color: #0f172a; }
    main h2 { font-size: 1.5rem; margin-top: 2.2rem; color: #1e3a8a; }
    main h3 { font-size: 1.2rem; margin-top: 1.6rem; }
    main p, main li { font-size: 1.05rem; }
    main ul, main ol { padding-left: 1.4rem; }
    main strong { color: #0f172a; }
    footer.site-footer { text-align: center; font-size: 0.85rem; color: #64748b; padding: 0 1rem 2rem; }
    @media (max-width: 640px) {
      main { margin: 0; border-radius: 0; padding: 1.5rem; }
      main h1 { font-size: 1.7rem; }
    }`;

/**
 * Wraps generated article HTML in a standalone page. Topic, label and meta
 * description are escaped; `bodyHtml` is trusted model output and embedded as is.
 */
export function renderPage({ topic, categoryLabel, bodyHtml, metaDescription }: PageInput): string {
  const safeTopic = escapeHtml(topic);
  const safeLabel = escapeHtml(categoryLabel);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="description" content="${escapeHtml(metaDescription)}">
  <title>${safeTopic} - ${safeLabel}</title>
  <style>${PAGE_STYLES}
  </style>
</head>
<body>
  <header class="site-header">
    <span class="category">${safeLabel}</span>
    <p class="topic">${safeTopic}</p>
  </header>
  <main>
    <article>
${bodyHtml}
    </article>
  </main>
  <footer class="site-footer">
    <p>${safeTopic} &middot; ${safeLabel}</p>
  </footer>
</body>
</html>
`;
}
