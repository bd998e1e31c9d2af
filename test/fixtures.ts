import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface FixtureTree {
  [name: string]: string | Buffer | FixtureTree;
}

function writeTree(dirPath: string, tree: FixtureTree): void {
  for (const [name, value] of Object.entries(tree)) {
    const entryPath = path.join(dirPath, name);
    if (typeof value === 'string' || Buffer.isBuffer(value)) {
      fs.writeFileSync(entryPath, value);
    } else {
      fs.mkdirSync(entryPath);
      writeTree(entryPath, value);
    }
  }
}

/** Creates `<tmp>/<random>/<rootName>` holding `tree` and returns its real path. */
export function createFixture(tree: FixtureTree, rootName = 'project'): string {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), 'filetree-'));
  const root = path.join(base, rootName);
  fs.mkdirSync(root);
  writeTree(root, tree);
  return fs.realpathSync(root);
}

export function removeFixture(root: string): void {
  fs.rmSync(path.dirname(root), { recursive: true, force: true });
}
