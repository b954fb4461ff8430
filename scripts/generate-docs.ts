/*
 * Generates one README.md per source folder from the JSDoc of exported
 * symbols, into docs/<folder>/README.md.
 * Usage: npm run docs
 */
import { ExportedDeclarations, Node, Project, SourceFile } from 'ts-morph';
import fg from 'fast-glob';
import * as path from 'path';
import fs from 'fs-extra';
import { DocFile, DocSymbol, buildDirectoryReadme, moduleSummary } from './docs/render';

const SRC_DIR = path.resolve('src');
const DOCS_DIR = path.resolve('docs');

function jsDocOf(node: Node): string | undefined {
  const target = Node.isVariableDeclaration(node) ? node.getVariableStatement() : node;
  if (!target || !Node.isJSDocable(target)) return undefined;
  const docs = target.getJsDocs();
  if (docs.some((d) => d.getTags().some((t) => t.getTagName() === 'internal'))) return undefined;
  const description = docs[0]?.getDescription().trim();
  return description || undefined;
}

function signatureOf(node: Node): string | undefined {
  if (Node.isFunctionDeclaration(node) || Node.isMethodDeclaration(node)) {
    const params = node
      .getParameters()
      .map((p) => p.getText())
      .join(', ');
    const returns = node.getReturnTypeNode()?.getText();
    return `(${params})${returns ? `: ${returns}` : ''}`;
  }
  return undefined;
}

function membersOf(node: Node): DocSymbol[] | undefined {
  if (!Node.isClassDeclaration(node)) return undefined;
  const members: DocSymbol[] = [];
  for (const method of node.getMethods()) {
    const description = jsDocOf(method);
    if (!description) continue;
    members.push({
      name: method.getName(),
      kind: method.isStatic() ? 'StaticMethod' : 'Method',
      signature: signatureOf(method),
      description,
    });
  }
  return members.length ? members : undefined;
}

function renderExport(name: string, decl: ExportedDeclarations): DocSymbol {
  return {
    name: name === 'default' && Node.isClassDeclaration(decl) ? (decl.getName() ?? name) : name,
    kind: decl.getKindName(),
    signature: signatureOf(decl),
    description: jsDocOf(decl),
    members: membersOf(decl),
  };
}

function describeFile(sf: SourceFile): DocFile {
  const symbols: DocSymbol[] = [];
  for (const [name, decls] of sf.getExportedDeclarations()) {
    const decl = decls[0];
    // Re-exports are documented where they are declared.
    if (!decl || decl.getSourceFile() !== sf) continue;
    symbols.push(renderExport(name, decl));
  }
  return {
    path: path.relative(SRC_DIR, sf.getFilePath()).replace(/\\/g, '/'),
    summary: moduleSummary(sf.getFullText()),
    symbols,
  };
}

async function writeIfChanged(file: string, content: string): Promise<void> {
  if (await fs.pathExists(file)) {
    const prev = await fs.readFile(file, 'utf8');
    if (prev === content) return;
  }
  await fs.outputFile(file, content, 'utf8');
}

async function main(): Promise<void> {
  const project = new Project({
    tsConfigFilePath: path.resolve('tsconfig.json'),
    skipAddingFilesFromTsConfig: true,
  });
  const filePaths = await fg(['**/*.ts'], { cwd: SRC_DIR, absolute: true, ignore: ['**/*.d.ts'] });
  for (const p of filePaths) project.addSourceFileAtPath(p);

  const byDir = new Map<string, DocFile[]>();
  for (const sf of project.getSourceFiles()) {
    const dir = path.relative(SRC_DIR, path.dirname(sf.getFilePath())).replace(/\\/g, '/');
    const files = byDir.get(dir) ?? [];
    files.push(describeFile(sf));
    byDir.set(dir, files);
  }

  for (const [dir, files] of byDir) {
    const title = dir === '' ? 'src' : `src/${dir}`;
    await writeIfChanged(path.join(DOCS_DIR, title, 'README.md'), buildDirectoryReadme(title, files));
    console.log(`[docs] ${title}: ${files.length} files`);
  }
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
}
