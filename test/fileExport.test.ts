import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { defaultConfig } from '../src/config';
import type { ExplorerConfig } from '../src/config';
import { DirectoryTree } from '../src/directoryTree';
import { FileExport, fenceFor, languageFor } from '../src/fileExport';
import { PathFilter } from '../src/pathFilter';
import { createFixture, removeFixture } from './fixtures';
import type { FixtureTree } from './fixtures';

interface Setup {
  config: ExplorerConfig;
  tree: DirectoryTree;
  fileExport: FileExport;
}

/** Lines of the subsection for `relative`, without its heading. */
function sectionOf(document: string, relative: string): string[] {
  const lines = document.split('\n');
  const start = lines.indexOf(`### \`${relative}\``);
  if (start === -1) throw new Error(`no section for ${relative}`);

  const rest = lines.slice(start + 2);
  const end = rest.findIndex((line) => line.startsWith('### '));
  const section = end === -1 ? rest : rest.slice(0, end - 1);
  return section[section.length - 1] === '' ? section.slice(0, -1) : section;
}

describe('FileExport', () => {
  let root = '';

  afterEach(() => {
    removeFixture(root);
  });

  function setup(fixture: FixtureTree, overrides: Partial<ExplorerConfig> = {}): Setup {
    root = createFixture(fixture);
    const config = { ...defaultConfig(root), ...overrides };
    const filter = new PathFilter(config);
    const tree = new DirectoryTree(config, filter);
    tree.initialize();
    return { config, tree, fileExport: new FileExport(config, filter, tree) };
  }

  function nodeAt(tree: DirectoryTree, ...segments: string[]) {
    const node = tree.getNode(path.join(root, ...segments));
    if (!node) throw new Error(`no node for ${segments.join('/')}`);
    return node;
  }

  it('renders only selected entries and their contents', () => {
    const { tree, fileExport } = setup(
      {
        '.git': { HEAD: 'ref: refs/heads/main' },
        src: { 'a.go': 'fmt.Println(1)\n', 'b.bin': Buffer.from([0x00, 0x01, 0x02]) },
      },
      { excludes: ['.git'] }
    );
    tree.expandNode(path.join(root, 'src'));
    tree.toggle(nodeAt(tree, 'src', 'b.bin'));

    expect(fileExport.build(false)).toBe(
      [
        '# File Tree for `project`',
        '',
        'project',
        '└── ◐ src',
        '    ├── ◉ a.go',
        '',
        '---',
        '',
        '## Selected files',
        '',
        '### `src/a.go`',
        '',
        '```go',
        'fmt.Println(1)',
        '```',
        '',
      ].join('\n')
    );
  });

  it('marks unselected entries when asked to include them', () => {
    const { tree, fileExport } = setup({
      src: { 'a.go': 'package main', 'b.bin': Buffer.from([0x00]) },
    });
    tree.expandNode(path.join(root, 'src'));
    tree.toggle(nodeAt(tree, 'src', 'b.bin'));

    const lines = fileExport.build(true).split('\n');
    expect(lines.slice(2, 6)).toEqual(['project', '└── ◐ src', '    ├── ◉ a.go', '    └── ◯ b.bin']);
    expect(lines).not.toContain('### `src/b.bin`');
  });

  it('walks directories that were never expanded', () => {
    const { fileExport } = setup({ lib: { util: { 'x.ts': 'export const x = 1;' } } });

    const document = fileExport.build(false);
    expect(document.split('\n').slice(3, 6)).toEqual([
      '└── ◉ lib',
      '    └── ◉ util',
      '        └── ◉ x.ts',
    ]);
    expect(sectionOf(document, 'lib/util/x.ts')).toEqual(['```typescript', 'export const x = 1;', '```']);
  });

  it('keeps walking below an unselected directory', () => {
    const { tree, fileExport } = setup({ docs: { 'guide.md': 'guide' }, 'main.py': 'print(1)' });
    tree.toggle(nodeAt(tree, 'docs'));

    const document = fileExport.build(true);
    expect(document.split('\n').slice(3, 6)).toEqual([
      '├── ◯ docs',
      '│   └── ◯ guide.md',
      '└── ◉ main.py',
    ]);
    expect(document).not.toContain('### `docs/guide.md`');
    expect(sectionOf(document, 'main.py')).toEqual(['```python', 'print(1)', '```']);
  });

  it('orders directories before files, case-insensitively', () => {
    const { fileExport } = setup({
      'b.md': 'b',
      'A.md': 'a',
      zdir: { 'f.txt': 'f' },
      Bdir: { 'g.txt': 'g' },
    });

    const document = fileExport.build(false);
    const lines = document.split('\n');
    expect(lines.slice(3, 9)).toEqual([
      '├── ◉ Bdir',
      '│   └── ◉ g.txt',
      '├── ◉ zdir',
      '│   └── ◉ f.txt',
      '├── ◉ A.md',
      '└── ◉ b.md',
    ]);
    expect(lines.filter((line) => line.startsWith('### '))).toEqual([
      '### `Bdir/g.txt`',
      '### `zdir/f.txt`',
      '### `A.md`',
      '### `b.md`',
    ]);
    expect(fileExport.build(false)).toBe(document);
  });

  it('embeds a file at the byte limit in full', () => {
    const { fileExport } = setup({ 'exact.txt': 'y'.repeat(50) }, { maxBytesPerFile: 50 });

    expect(sectionOf(fileExport.build(false), 'exact.txt')).toEqual(['```', 'y'.repeat(50), '```']);
  });

  it('truncates a file over the byte limit and says so', () => {
    const { fileExport } = setup({ 'big.txt': 'x'.repeat(150) }, { maxBytesPerFile: 50 });

    expect(sectionOf(fileExport.build(false), 'big.txt')).toEqual([
      '```',
      'x'.repeat(50),
      '```',
      '_...truncated at 50 bytes_',
    ]);
  });

  it('replaces binary content with a notice unless binary embedding is on', () => {
    const fixture = { 'blob.dat': Buffer.from([0x41, 0x00, 0x42]) };

    const skipped = setup(fixture);
    expect(sectionOf(skipped.fileExport.build(false), 'blob.dat')).toEqual([
      '_Binary file, content not embedded._',
    ]);
    removeFixture(root);

    const embedded = setup(fixture, { embedBinary: true });
    expect(sectionOf(embedded.fileExport.build(false), 'blob.dat')).toEqual(['```', 'A\u0000B', '```']);
  });

  it('decodes invalid UTF-8 with replacement characters', () => {
    const { fileExport } = setup({ 'notes.txt': Buffer.from([0x68, 0x69, 0xff, 0x21]) });

    expect(sectionOf(fileExport.build(false), 'notes.txt')).toEqual(['```', 'hi\uFFFD!', '```']);
  });

  it('uses a longer fence when the content holds one', () => {
    const { fileExport } = setup({ 'doc.md': 'before\n```js\ncode\n```\nafter\n' });

    expect(sectionOf(fileExport.build(false), 'doc.md')).toEqual([
      '````markdown',
      'before',
      '```js',
      'code',
      '```',
      'after',
      '````',
    ]);
  });

  it('reports an unreadable file inline and carries on', () => {
    const { fileExport } = setup({ 'z.txt': 'still here' });
    fs.symlinkSync(path.join(root, 'nowhere'), path.join(root, 'a-link'));

    const document = fileExport.build(false);
    const [notice] = sectionOf(document, 'a-link');
    expect(notice.startsWith('_Error reading file: ENOENT')).toBe(true);
    expect(sectionOf(document, 'z.txt')).toEqual(['```', 'still here', '```']);
  });

  it('leaves out files under a deselected directory that was never expanded', () => {
    const { tree, fileExport } = setup({ src: { 'a.ts': 'a' }, 'keep.ts': 'k' });
    tree.toggle(nodeAt(tree, 'src'));

    const document = fileExport.build(false);
    expect(document.split('\n').slice(3, 4)).toEqual(['└── ◉ keep.ts']);
    expect(document.split('\n').filter((line) => line.startsWith('### '))).toEqual(['### `keep.ts`']);
  });

  it('uses the configured glyphs', () => {
    const { fileExport } = setup(
      { 'a.txt': 'a' },
      { icons: { selected: '[x]', partial: '[~]', unselected: '[ ]' } }
    );

    expect(fileExport.build(false).split('\n')[3]).toBe('└── [x] a.txt');
  });

  it('reports a failed write instead of throwing', () => {
    const { fileExport } = setup({ 'a.txt': 'a' }, { outputFile: path.join('missing', 'out.md') });

    const result = fileExport.generate(false);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toContain('ENOENT');
    expect(fs.existsSync(path.join(root, 'missing'))).toBe(false);
  });

  it('builds and writes in one step', () => {
    const { fileExport } = setup({ 'a.txt': 'a' });
    const expected = fileExport.build(false);

    const result = fileExport.generate(false);

    expect(result).toEqual({ ok: true, outputPath: path.join(root, 'FILETREE.md') });
    expect(fs.readFileSync(path.join(root, 'FILETREE.md'), 'utf8')).toBe(expected);
  });

  it('writes the document inside the root', () => {
    const { config, fileExport } = setup({ 'a.txt': 'a' });

    const document = fileExport.build(false);
    const outputPath = fileExport.write(document);

    expect(outputPath).toBe(path.join(root, config.outputFile));
    expect(fs.readFileSync(outputPath, 'utf8')).toBe(document);
  });
});

describe('languageFor', () => {
  it('maps known extensions regardless of case', () => {
    expect(languageFor('/x/main.GO')).toBe('go');
    expect(languageFor('/x/app.tsx')).toBe('tsx');
  });

  it('returns an empty tag for unknown extensions', () => {
    expect(languageFor('/x/Makefile')).toBe('');
    expect(languageFor('/x/image.png')).toBe('');
  });
});

describe('fenceFor', () => {
  it('uses three backticks by default', () => {
    expect(fenceFor('plain text')).toBe('```');
    expect(fenceFor('inline `code`')).toBe('```');
  });

  it('outgrows the longest backtick run', () => {
    expect(fenceFor('````\nx\n````')).toBe('`````');
  });
});
