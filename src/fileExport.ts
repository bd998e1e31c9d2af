import fs from 'node:fs';
import path from 'node:path';
import { sniffBinary } from './binaryContent';
import type { ExplorerConfig } from './config';
import { EXT_LANG, OutputSymbols, SNIFF_BYTES, SYMBOLS } from './constants';
import { listDirectory, walkFiles } from './directoryListing';
import type { SelectionSource } from './directoryTree';
import { errorMessage } from './errors';
import type { EntryFilter } from './pathFilter';
import { SelectState } from './selectState';

export type ExportResult =
  | { ok: true; outputPath: string }
  | { ok: false; error: string };

type ExportConfig = Pick<
  ExplorerConfig,
  'rootPath' | 'outputFile' | 'maxBytesPerFile' | 'embedBinary' | 'icons'
>;

export function languageFor(filePath: string): string {
  return EXT_LANG[path.extname(filePath).toLowerCase()] ?? '';
}

// At least three backticks, and always longer than any run inside the text.
export function fenceFor(text: string): string {
  const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  return '`'.repeat(Math.max(OutputSymbols.FENCE.length, longestRun + 1));
}

function readHead(filePath: string, limit: number): Buffer {
  const buffer = Buffer.alloc(limit);
  const fd = fs.openSync(filePath, 'r');
  let total = 0;

  try {
    while (total < limit) {
      const read = fs.readSync(fd, buffer, total, limit - total, null);
      if (read === 0) break;
      total += read;
    }
  } finally {
    fs.closeSync(fd);
  }
  return buffer.subarray(0, total);
}

/**
 * Renders the export document: a tree of the root followed by the contents
 * of every selected file. The filesystem is walked afresh, so directories
 * that were never expanded in the browser still contribute.
 */
export class FileExport {
  readonly warnings: string[] = [];
  private config: ExportConfig;
  private filter: EntryFilter;
  private selection: SelectionSource;

  constructor(config: ExportConfig, filter: EntryFilter, selection: SelectionSource) {
    this.config = config;
    this.filter = filter;
    this.selection = selection;
  }

  private get rootName(): string {
    return path.basename(this.config.rootPath) || this.config.rootPath;
  }

  private recordListingError = (dirPath: string, error: unknown): void => {
    this.warnings.push(`Could not list ${dirPath}: ${errorMessage(error)}`);
  };

  private marker(state: SelectState): string {
    const { icons } = this.config;
    if (state === SelectState.Full) return icons.selected;
    if (state === SelectState.Partial) return icons.partial;
    return icons.unselected;
  }

  private treeLines(dirPath: string, prefix: string, includeUnselected: boolean, lines: string[]): void {
    const entries = listDirectory(dirPath, this.filter, this.recordListingError);

    entries.forEach((entry, index) => {
      const isLast = index === entries.length - 1;
      const state = this.selection.selectionAt(entry.path);

      if (includeUnselected || state !== SelectState.None) {
        const branch = isLast ? SYMBOLS.LAST_BRANCH : SYMBOLS.BRANCH;
        lines.push(`${prefix}${branch}${this.marker(state)} ${entry.name}`);
      }
      if (entry.isDirectory) {
        const childPrefix = prefix + (isLast ? SYMBOLS.INDENT_EMPTY : SYMBOLS.INDENT);
        this.treeLines(entry.path, childPrefix, includeUnselected, lines);
      }
    });
  }

  private fileSection(filePath: string): string[] {
    const { maxBytesPerFile, embedBinary } = this.config;
    let content: Buffer;

    try {
      content = readHead(filePath, maxBytesPerFile + 1);
    } catch (error) {
      return [`_Error reading file: ${errorMessage(error)}_`];
    }

    if (!embedBinary && sniffBinary(content.subarray(0, SNIFF_BYTES))) {
      return [OutputSymbols.BINARY_NOTICE];
    }

    const truncated = content.length > maxBytesPerFile;
    const text = content.subarray(0, maxBytesPerFile).toString('utf8').replace(/\n+$/, '');
    const fence = fenceFor(text);
    const section = [`${fence}${languageFor(filePath)}`, text, fence];

    if (truncated) {
      section.push(`_...truncated at ${maxBytesPerFile} bytes_`);
    }
    return section;
  }

  build(includeUnselected: boolean): string {
    const { rootPath } = this.config;
    const lines = [`${OutputSymbols.TITLE}\`${this.rootName}\``, '', this.rootName];

    this.treeLines(rootPath, '', includeUnselected, lines);

    lines.push('', OutputSymbols.SEPARATOR, '', OutputSymbols.CONTENTS_HEADING);

    for (const file of walkFiles(rootPath, this.filter, this.recordListingError)) {
      if (this.selection.selectionAt(file.path) !== SelectState.Full) continue;

      const relative = path.relative(rootPath, file.path).split(path.sep).join('/');
      lines.push('', `${OutputSymbols.FILE_HEADING}\`${relative}\``, '');
      lines.push(...this.fileSection(file.path));
    }

    return `${lines.join('\n')}\n`;
  }

  /** Writes the document into the root directory and returns its path. */
  write(document: string): string {
    const outputPath = path.join(this.config.rootPath, this.config.outputFile);
    fs.writeFileSync(outputPath, document, 'utf8');
    return outputPath;
  }

  /** Builds and writes the document; a failure is returned, not thrown. */
  generate(includeUnselected: boolean): ExportResult {
    try {
      return { ok: true, outputPath: this.write(this.build(includeUnselected)) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}
