/*
 * Converts every README.md inside docs/ into an index.html in the same
 * directory.
 * Usage: npm run docs (after generate-docs)
 */
import fg from 'fast-glob';
import path from 'path';
import fs from 'fs-extra';
import { renderPage } from './docs/render';

const DOCS_DIR = path.resolve('docs');

interface PageMeta {
  abs: string;
  relDir: string;
  title: string;
}

function navHtml(pages: readonly PageMeta[], currentDir: string): string {
  const links = [...pages]
    .sort((a, b) => a.relDir.localeCompare(b.relDir))
    .map((p) => {
      const rel = path.posix.relative(currentDir || '.', p.relDir || '.') || '.';
      const current = p.relDir === currentDir ? ' class="current"' : '';
      return `<li${current}><a href="${rel}/index.html">${p.relDir || 'root'}/</a></li>`;
    })
    .join('\n');
  return `<ul class="doc-nav">${links}</ul>`;
}

async function main(): Promise<void> {
  const readmes = await fg(['**/README.md'], { cwd: DOCS_DIR, absolute: true });
  const pages: PageMeta[] = [];
  for (const abs of readmes) {
    const md = await fs.readFile(abs, 'utf8');
    const relDir = path.relative(DOCS_DIR, path.dirname(abs)).replace(/\\/g, '/');
    pages.push({ abs, relDir, title: /^#\s+(.+)$/m.exec(md)?.[1] ?? (relDir || 'Documentation') });
  }

  for (const page of pages) {
    const md = await fs.readFile(page.abs, 'utf8');
    const html = await renderPage(page.title, navHtml(pages, page.relDir), md);
    await fs.writeFile(path.join(path.dirname(page.abs), 'index.html'), html, 'utf8');
  }
  console.log(`[docs] rendered ${pages.length} pages`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
}
