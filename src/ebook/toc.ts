import type { ComicInfo } from './types.ts';

const FIRST_PAGE = '0001.jpg';

const STYLE = `
        body { font-family: Arial, sans-serif; margin: 40px; }
        h1 { color: #333; }
        ul { list-style-type: none; padding: 0; }
        li { margin: 10px 0; padding: 10px; border: 1px solid #ddd; border-radius: 5px; }
        a { text-decoration: none; color: #007bff; }
        a:hover { text-decoration: underline; }
        .chapter-info { color: #666; font-size: 0.9em; }`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderToc(info: ComicInfo): string {
  const title = escapeHtml(info.title);
  const items = info.chapters.map((chapter) => {
    const href = escapeHtml(`${encodeURIComponent(chapter.dirName)}/${FIRST_PAGE}`);
    return `        <li>
            <a href="${href}">${escapeHtml(chapter.title)}</a>
            <div class="chapter-info">${chapter.imageCount} pages (from page ${chapter.startPage})</div>
        </li>`;
  });

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>${title} - Contents</title>
    <style>${STYLE}
    </style>
</head>
<body>
    <h1>${title}</h1>
    <h2>Contents</h2>
    <ul>
${items.join('\n')}
    </ul>
</body>
</html>
`;
}
