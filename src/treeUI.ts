import * as blessed from 'blessed';
import type { ExplorerConfig } from './config';
import { SYMBOLS } from './constants';
import { DirectoryTreeNode } from './directoryNode';
import { DirectoryTree } from './directoryTree';
import { SelectState } from './selectState';

export type TreeIntent = 'generate' | 'quit';

type DisplayConfig = Pick<ExplorerConfig, 'icons' | 'colors'>;

const STATUS_TEXT =
  ' Enter: expand  Space: toggle  a: all  n: none  r: refresh  g: generate  q: quit';

export function formatNodeRow(node: DirectoryTreeNode, level: number, display: DisplayConfig): string {
  const indent = ' '.repeat(2 * level);
  const icon = node.isDirectory ? (node.expanded ? SYMBOLS.EXPANDED : SYMBOLS.COLLAPSED) : '   ';
  const { icons, colors } = display;

  const glyph =
    node.selected === SelectState.Full
      ? icons.selected
      : node.selected === SelectState.Partial
      ? icons.partial
      : icons.unselected;
  const color = node.isSelected() ? colors.selected : colors.unselected;
  const name = node.name.replace(/[{}]/g, (brace) => (brace === '{' ? '{open}' : '{close}'));

  return `${indent}${icon} {${color}-fg}${glyph} ${name}{/${color}-fg}`;
}

export class TreeUI {
  private screen: blessed.Widgets.Screen;
  private tree: blessed.Widgets.ListElement;
  private dirTree: DirectoryTree;
  private display: DisplayConfig;
  private statusBar: blessed.Widgets.BoxElement;
  private treeItems: string[] = [];
  private nodesByRow: Map<number, DirectoryTreeNode> = new Map();
  private finish: (intent: TreeIntent) => void = () => undefined;

  constructor(dirTree: DirectoryTree, display: DisplayConfig) {
    this.dirTree = dirTree;
    this.display = display;

    this.screen = blessed.screen({
      smartCSR: true,
      title: 'filetree-export',
    });

    this.tree = blessed.list({
      label: ` ${dirTree.rootNode.name} `,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%-1',
      keys: true,
      vi: true,
      tags: true,
      border: 'line',
      scrollbar: { ch: '▐' },
      style: {
        border: { fg: display.colors.selected },
        selected: { inverse: true },
      },
    });

    this.statusBar = blessed.box({
      bottom: 0,
      width: '100%',
      height: 1,
      content: STATUS_TEXT,
      style: { inverse: true },
    });

    this.screen.append(this.tree);
    this.screen.append(this.statusBar);

    this.screen.key(['escape', 'q', 'C-c'], () => this.close('quit'));
    this.screen.key(['g'], () => this.close('generate'));

    this.tree.key(['enter', 'l'], () => {
      const node = this.currentNode();

      if (node && node.isDirectory) {
        this.dirTree.expandNode(node.path);
        this.update();
      }
    });

    this.tree.key(['space'], () => {
      const node = this.currentNode();

      if (node) {
        this.dirTree.toggle(node);
        this.update();
      }
    });

    this.tree.key(['a'], () => {
      this.dirTree.selectAll();
      this.update();
    });

    this.tree.key(['n'], () => {
      this.dirTree.selectNone();
      this.update();
    });

    this.tree.key(['r'], () => {
      this.dirTree.refresh();
      this.update();
    });

    this.tree.focus();
  }

  private currentNode(): DirectoryTreeNode | undefined {
    return this.nodesByRow.get(this.tree.selected);
  }

  private update(): void {
    const selectedIndex = this.tree.selected;
    this.renderTree();
    this.tree.select(Math.min(selectedIndex, this.treeItems.length - 1));

    const warnings = this.dirTree.warnings.length;
    this.statusBar.setContent(
      warnings > 0 ? `${STATUS_TEXT}  (${warnings} unreadable)` : STATUS_TEXT
    );
    this.screen.render();
  }

  private renderTree(): void {
    this.treeItems = [];
    this.nodesByRow = new Map();

    this.renderNode(this.dirTree.rootNode, 0);

    this.tree.setItems(this.treeItems);
  }

  private renderNode(node: DirectoryTreeNode, level: number): void {
    const rowIndex = this.treeItems.length;

    this.treeItems.push(formatNodeRow(node, level, this.display));
    this.nodesByRow.set(rowIndex, node);

    if (node.expanded && node.children.length > 0) {
      for (const child of node.children) {
        this.renderNode(child, level + 1);
      }
    }
  }

  private close(intent: TreeIntent): void {
    this.screen.destroy();
    this.finish(intent);
  }

  /** Shows the browser until the operator quits or asks for the document. */
  run(): Promise<TreeIntent> {
    return new Promise((resolve) => {
      this.finish = resolve;
      this.update();
    });
  }
}
