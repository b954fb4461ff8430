/*
 * Pure helpers for the API docs pipeline: Markdown for one source folder,
 * the table of contents of such a page, and its HTML rendering.
 */
import { Marked } from 'marked';

export interface DocSymbol {
  name: string;
  kind: string;
  signature?: string;
  description?: string;
  members?: DocSymbol[];
}

export interface DocFile {
  /** Path relative to `src/`, with forward slashes. */
  path: string;
  summary?: string;
  symbols: DocSymbol[];
}

export interface TocFile {
  file: string;
  anchor: string;
  symbols: { name: string; anchor: string }[];
}

export function slugify(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Description of the first doc comment carrying a `@module` tag, with the
 * comment markers and tag lines removed.
 */
export function moduleSummary(source: string): string | undefined {
  const match = /\/\*\*((?:(?!\*\/)[\s\S])*?@module(?:(?!\*\/)[\s\S])*?)\*\//.exec(source);
  if (!match) return undefined;
  const lines = match[1]
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*\*\s?/, '').trimEnd())
    .filter((line) => !line.trimStart().startsWith('@'));
  const text = lines.join('\n').trim();
  return text || undefined;
}

function renderSymbol(lines: string[], symbol: DocSymbol, heading: string): void {
  lines.push(`${heading} ${symbol.name}`, '');
  if (symbol.signature) lines.push('`' + symbol.signature + '`', '');
  if (symbol.description) lines.push(symbol.description, '');
}

/** The README of one source folder: a section per file, a heading per symbol. */
export function buildDirectoryReadme(title: string, files: readonly DocFile[]): string {
  const lines: string[] = [`# ${title}`, ''];
  for (const file of [...files].sort((a, b) => a.path.localeCompare(b.path))) {
    lines.push(`## ${file.path}`, '');
    if (file.summary) lines.push(file.summary, '');
    for (const symbol of [...file.symbols].sort((a, b) => a.name.localeCompare(b.name))) {
      renderSymbol(lines, symbol, '###');
      for (const member of symbol.members ?? []) renderSymbol(lines, member, '####');
    }
  }
  return lines.join('\n').trim() + '\n';
}

/** File (`## x.ts`) and symbol (`### name`) headings of a folder README. */
export function extractToc(markdown: string): TocFile[] {
  const files: TocFile[] = [];
  let current: TocFile | undefined;
  for (const line of markdown.split(/\r?\n/)) {
    const fileMatch = /^##\s+(.+\.ts)\s*$/.exec(line);
    if (fileMatch) {
      current = { file: fileMatch[1], anchor: slugify(fileMatch[1]), symbols: [] };
      files.push(current);
      continue;
    }
    const symbolMatch = /^###\s+([A-Za-z0-9_]+)\s*$/.exec(line);
    if (symbolMatch && current) {
      current.symbols.push({ name: symbolMatch[1], anchor: slugify(symbolMatch[1]) });
    }
  }
  return files;
}

const markdown = new Marked({
  renderer: {
    heading(text: string, level: number, raw: string): string {
      return `<h${level} id="${slugify(raw.trim())}">${text}</h${level}>\n`;
    },
  },
});

export async function renderMarkdown(source: string): Promise<string> {
  return await markdown.parse(source);
}

function tocHtml(toc: readonly TocFile[]): string {
  if (toc.length === 0) return '';
  const files = toc
    .map((f) => {
      const symbols = f.symbols.length
        ? `<ul>${f.symbols.map((s) => `<li><a href="#${s.anchor}">${s.name}</a></li>`).join('')}</ul>`
        : '';
      return `<div class="toc-file"><a href="#${f.anchor}">${f.file}</a>${symbols}</div>`;
    })
    .join('');
  return `<div class="page-toc"><h2>Files</h2>${files}</div>`;
}

const STYLE = `body{font-family:system-ui,sans-serif;margin:0 auto;padding:0 20px 60px;line-height:1.55;display:grid;grid-template-columns:240px 1fr 260px;grid-gap:32px;}
nav.site,aside.page-index{position:sticky;top:0;align-self:start;max-height:100vh;overflow:auto;padding:24px 0;font-size:.85rem;}
.doc-nav{list-style:none;margin:0;padding:0;}
.doc-nav li.current>a{font-weight:600;}
pre{background:#1e1e1e;color:#eee;padding:12px;border-radius:6px;overflow:auto;}
code{background:#f5f5f5;padding:2px 4px;border-radius:4px;}
pre code{background:transparent;padding:0;}
@media (max-width:900px){body{grid-template-columns:1fr;}aside.page-index{display:none;}}`;

/** A standalone HTML page for one folder README. */
export async function renderPage(title: string, navHtml: string, source: string): Promise<string> {
  const body = await renderMarkdown(source);
  return `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>${title}</title>
<meta name="viewport" content="width=device-width,initial-scale=1">
<style>
${STYLE}
</style></head><body>
<nav class="site"><h1>Docs Index</h1>${navHtml}</nav>
<main>
${body}</main>
<aside class="page-index">${tocHtml(extractToc(source))}</aside>
</body></html>
`;
}
