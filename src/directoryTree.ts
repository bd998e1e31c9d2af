import path from 'node:path';
import type { ExplorerConfig } from './config';
import { DirectoryTreeNode } from './directoryNode';
import { listDirectory } from './directoryListing';
import { errorMessage } from './errors';
import type { EntryFilter } from './pathFilter';
import { SelectState, combineStates, inheritedState } from './selectState';

export interface SelectionSource {
  selectionAt(entryPath: string): SelectState;
}

/**
 * The browsable tree. A directory's children are listed the first time it is
 * populated and stay cached until refresh(); a directory that came back
 * empty is listed again on the next populate. Every mutation runs to
 * completion synchronously; callers sharing one tree must serialise them.
 */
export class DirectoryTree implements SelectionSource {
  readonly rootPath: string;
  readonly rootNode: DirectoryTreeNode;
  readonly warnings: string[] = [];
  private nodeMap: Map<string, DirectoryTreeNode> = new Map();
  private filter: EntryFilter;

  constructor(config: Pick<ExplorerConfig, 'rootPath'>, filter: EntryFilter) {
    this.rootPath = path.resolve(config.rootPath);
    this.filter = filter;

    const rootName = path.basename(this.rootPath) || this.rootPath;
    this.rootNode = new DirectoryTreeNode(this.rootPath, rootName, null, true);
    this.nodeMap.set(this.rootPath, this.rootNode);
  }

  initialize(): void {
    this.populate(this.rootNode);
    this.rootNode.expanded = true;
  }

  populate(node: DirectoryTreeNode): void {
    if (!node.isDirectory || node.children.length > 0) return;

    const entries = listDirectory(node.path, this.filter, (dirPath, error) => {
      this.warnings.push(`Could not list ${dirPath}: ${errorMessage(error)}`);
    });
    const state = inheritedState(node.selected);

    for (const entry of entries) {
      const childNode = new DirectoryTreeNode(entry.path, entry.name, node, entry.isDirectory, state);
      node.addChild(childNode);
      this.nodeMap.set(entry.path, childNode);
    }
    node.loaded = true;
  }

  expandNode(nodePath: string): void {
    const node = this.nodeMap.get(path.resolve(nodePath));
    if (!node || !node.isDirectory) return;

    const isExpanding = node.toggleExpand();
    if (isExpanding) {
      this.populate(node);
    }
  }

  getNode(nodePath: string): DirectoryTreeNode | undefined {
    return this.nodeMap.get(path.resolve(nodePath));
  }

  setSelected(node: DirectoryTreeNode, selected: boolean): void {
    node.selected = selected ? SelectState.Full : SelectState.None;

    for (const child of node.children) {
      this.setSelected(child, selected);
    }
  }

  /** Recomputes each ancestor of `node` from its children, up to the root. */
  propagateUp(node: DirectoryTreeNode): void {
    let current = node.parent;

    while (current) {
      const combined = combineStates(current.children.map((child) => child.selected));
      if (combined === null) return;

      current.selected = combined;
      current = current.parent;
    }
  }

  toggle(node: DirectoryTreeNode): void {
    this.setSelected(node, node.nextSelection());
    this.propagateUp(node);
  }

  selectAll(): void {
    this.setSelected(this.rootNode, true);
  }

  selectNone(): void {
    this.setSelected(this.rootNode, false);
  }

  /**
   * State of a path whether or not it has a node: its own node if listed,
   * otherwise the nearest listed ancestor. A path that is missing from a
   * partially selected directory appeared after the listing and counts as
   * unselected.
   */
  selectionAt(entryPath: string): SelectState {
    const target = path.resolve(entryPath);
    let current = target;

    for (;;) {
      const node = this.nodeMap.get(current);
      if (node) {
        if (current !== target && node.selected === SelectState.Partial) {
          return SelectState.None;
        }
        return node.selected;
      }

      const parent = path.dirname(current);
      if (current === this.rootPath || parent === current) break;
      current = parent;
    }
    return SelectState.Full;
  }

  effectiveSelection(entryPath: string): boolean {
    return this.selectionAt(entryPath) !== SelectState.None;
  }

  refresh(): void {
    const rootState = inheritedState(this.rootNode.selected);

    this.nodeMap.clear();
    this.rootNode.children = [];
    this.rootNode.loaded = false;
    this.rootNode.selected = rootState;
    this.nodeMap.set(this.rootPath, this.rootNode);

    this.initialize();
  }
}
