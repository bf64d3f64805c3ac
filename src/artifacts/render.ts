/**
 * HTML and JSON rendering for the committed artifact set.
 */

import { getTopSources, type ArticleOutput, type ResearchFindings } from '../types/index.js';
import { ARTICLE_FILE, RESEARCH_FILE } from './paths.js';

const HEAD_CLOSE = '</head>';

export const ARTICLE_STYLESHEET = `
<style>
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    line-height: 1.6;
    color: #333;
    max-width: 800px;
    margin: 0 auto;
    padding: 20px;
    background-color: #f9f9f9;
  }
  h1 {
    color: #2c3e50;
    border-bottom: 3px solid #3498db;
    padding-bottom: 10px;
    margin-bottom: 30px;
  }
  h2 { color: #34495e; margin-top: 30px; margin-bottom: 15px; }
  h3 { color: #7f8c8d; margin-top: 20px; margin-bottom: 10px; }
  .reading-time { color: #7f8c8d; font-style: italic; margin-bottom: 20px; }
  .introduction {
    font-size: 1.1em;
    color: #555;
    background-color: #ecf0f1;
    padding: 15px;
    border-radius: 5px;
    margin-bottom: 30px;
  }
  .conclusion {
    background-color: #e8f8f5;
    padding: 15px;
    border-radius: 5px;
    margin-top: 30px;
    border-left: 4px solid #27ae60;
  }
  .section-content, .subsection-content { margin-bottom: 20px; text-align: justify; }
</style>
`;

const REVIEW_STYLESHEET = `
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background-color: #f0f0f0; }
  .container { max-width: 1200px; margin: 0 auto; }
  .header { background-color: #2c3e50; color: white; padding: 20px; border-radius: 5px; margin-bottom: 20px; }
  .metrics { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 15px; margin-bottom: 20px; }
  .metric { background-color: white; padding: 15px; border-radius: 5px; text-align: center; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
  .metric-value { font-size: 2em; font-weight: bold; color: #3498db; }
  .metric-label { color: #7f8c8d; font-size: 0.9em; }
  .content-preview { background-color: white; padding: 20px; border-radius: 5px; margin-bottom: 20px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
  .actions { display: flex; gap: 10px; margin-top: 20px; }
  .button { padding: 10px 20px; border-radius: 5px; text-decoration: none; display: inline-block; color: white; }
  .button-primary { background-color: #3498db; }
  .button-secondary { background-color: #95a5a6; }
</style>
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderArticleHtml(article: ArticleOutput): string {
  const lines = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${escapeHtml(article.title)}</title>`,
    `  <meta name="description" content="${escapeHtml(article.metaDescription)}">`,
    `  <meta name="keywords" content="${escapeHtml(article.focusKeyword)}">`,
    HEAD_CLOSE,
    '<body>',
    `  <h1>${escapeHtml(article.title)}</h1>`,
    `  <p class="reading-time">${article.readingTimeMinutes} min read</p>`,
    `  <div class="introduction">${escapeHtml(article.introduction)}</div>`,
  ];

  for (const section of article.mainSections) {
    lines.push(`  <h2>${escapeHtml(section.heading)}</h2>`);
    lines.push(`  <div class="section-content">${escapeHtml(section.content)}</div>`);

    for (const subsection of section.subsections ?? []) {
      lines.push(`    <h3>${escapeHtml(subsection.heading)}</h3>`);
      lines.push(`    <div class="subsection-content">${escapeHtml(subsection.content)}</div>`);
    }
  }

  lines.push(`  <div class="conclusion">${escapeHtml(article.conclusion)}</div>`, '</body>', '</html>');
  return lines.join('\n');
}

/**
 * Insert the default stylesheet right before the first `</head>`.
 * Documents without a head are returned unchanged.
 */
export function injectStylesheet(html: string, css: string = ARTICLE_STYLESHEET): string {
  const index = html.indexOf(HEAD_CLOSE);
  if (index < 0) {
    return html;
  }
  return `${html.slice(0, index)}${css}${html.slice(index)}`;
}

export function renderResearchJson(research: ResearchFindings): string {
  return JSON.stringify(research, null, 2);
}

function formatGeneratedAt(date: Date): string {
  return new Intl.DateTimeFormat('en-US', {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    timeZone: 'UTC',
  }).format(date);
}

/**
 * Review landing page linking the article and research export by relative path.
 */
export function renderReviewPage(
  keyword: string,
  article: ArticleOutput,
  research: ResearchFindings,
  generatedAt: Date
): string {
  const introChars = Array.from(article.introduction);
  const intro =
    introChars.length > 200 ? `${introChars.slice(0, 200).join('')}...` : article.introduction;

  const topSources = getTopSources(research, 3)
    .map(
      (source) =>
        `        <li><a href="${escapeHtml(source.url)}">${escapeHtml(source.title)}</a> ` +
        `(Credibility: ${source.credibilityScore.toFixed(2)})</li>`
    )
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Review: ${escapeHtml(keyword)}</title>
${REVIEW_STYLESHEET}</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Content Review: ${escapeHtml(keyword)}</h1>
      <p>Generated on ${formatGeneratedAt(generatedAt)} UTC</p>
    </div>
    <div class="metrics">
      <div class="metric"><div class="metric-value">${article.wordCount}</div><div class="metric-label">Words</div></div>
      <div class="metric"><div class="metric-value">${article.readingTimeMinutes}</div><div class="metric-label">Min Read</div></div>
      <div class="metric"><div class="metric-value">${research.academicSources.length}</div><div class="metric-label">Sources</div></div>
      <div class="metric"><div class="metric-value">${(article.keywordDensity * 100).toFixed(1)}%</div><div class="metric-label">Keyword Density</div></div>
    </div>
    <div class="content-preview">
      <h2>Article Preview</h2>
      <h3>${escapeHtml(article.title)}</h3>
      <p><strong>Meta Description:</strong> ${escapeHtml(article.metaDescription)}</p>
      <p><strong>Introduction:</strong> ${escapeHtml(intro)}</p>
      <div class="actions">
        <a href="${ARTICLE_FILE}" class="button button-primary">View Full Article</a>
        <a href="${RESEARCH_FILE}" class="button button-secondary">View Research Data</a>
      </div>
    </div>
    <div class="content-preview">
      <h2>Top Sources Used</h2>
      <ul>
${topSources}
      </ul>
    </div>
  </div>
</body>
</html>
`;
}
