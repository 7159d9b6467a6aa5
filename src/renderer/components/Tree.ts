/**
 * Tree view: an owned node hierarchy and an immutable renderer for it
 */

import { style } from '../ansi';
import { treeGlyphs, TreeGlyphs, TreeStyle } from '../glyphs';
import { OutputSink, renderToString } from '../output';
import { logRender } from '../../utils/logger';

const BRANCH_COLOR = '\x1b[1;34m';
const LEAF_COLOR = '\x1b[0;37m';
const FOLDER_ICON = '📁';
const FILE_ICON = '📄';

export class TreeNode {
  private readonly children: TreeNode[] = [];
  private expanded = true;

  constructor(
    readonly name: string,
    readonly metadata?: string
  ) {}

  /**
   * Create a child owned by this node. Nodes are only made here,
   * so the structure cannot contain cycles or shared children.
   */
  addChild(name: string): TreeNode {
    const child = new TreeNode(name);
    this.children.push(child);
    return child;
  }

  addChildWithMetadata(name: string, metadata: string): TreeNode {
    const child = new TreeNode(name, metadata);
    this.children.push(child);
    return child;
  }

  /**
   * Detach the first child with this name together with its subtree
   */
  removeChild(name: string): boolean {
    const index = this.children.findIndex(child => child.name === name);
    if (index === -1) return false;
    this.children.splice(index, 1);
    return true;
  }

  findChild(name: string): TreeNode | undefined {
    return this.children.find(child => child.name === name);
  }

  getChildren(): readonly TreeNode[] {
    return [...this.children];
  }

  hasChildren(): boolean {
    return this.children.length > 0;
  }

  isExpanded(): boolean {
    return this.expanded;
  }

  collapse(): void {
    this.expanded = false;
  }

  expand(): void {
    this.expanded = true;
  }

  toggleExpansion(): void {
    this.expanded = !this.expanded;
  }

  /**
   * Levels in this subtree, counting this node
   */
  getDepth(): number {
    let maxDepth = 0;
    for (const child of this.children) {
      maxDepth = Math.max(maxDepth, child.getDepth());
    }
    return maxDepth + 1;
  }

  countNodes(): number {
    let count = 1;
    for (const child of this.children) {
      count += child.countNodes();
    }
    return count;
  }
}

export interface TreeRendererOptions {
  readonly showMetadata: boolean;
  readonly showIcons: boolean;
  readonly maxDepth: number | null;
  readonly alphabeticalSort: boolean;
  readonly colorEnabled: boolean;
}

const DEFAULT_OPTIONS: TreeRendererOptions = Object.freeze({
  showMetadata: false,
  showIcons: false,
  maxDepth: null,
  alphabeticalSort: false,
  colorEnabled: false,
});

export class TreeRenderer {
  private readonly options: TreeRendererOptions;

  constructor(
    private readonly style: TreeStyle = 'unicode',
    options: Partial<TreeRendererOptions> = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_OPTIONS, ...options });
  }

  withMetadata(showMetadata: boolean): TreeRenderer {
    return this.with({ showMetadata });
  }

  withIcons(showIcons: boolean): TreeRenderer {
    return this.with({ showIcons });
  }

  withMaxDepth(maxDepth: number): TreeRenderer {
    return this.with({ maxDepth: Math.max(0, Math.floor(maxDepth)) });
  }

  withAlphabeticalSort(alphabeticalSort: boolean): TreeRenderer {
    return this.with({ alphabeticalSort });
  }

  withColors(colorEnabled: boolean): TreeRenderer {
    return this.with({ colorEnabled });
  }

  private with(changes: Partial<TreeRendererOptions>): TreeRenderer {
    return new TreeRenderer(this.style, { ...this.options, ...changes });
  }

  getOptions(): TreeRendererOptions {
    return this.options;
  }

  private get glyphs(): TreeGlyphs {
    return treeGlyphs[this.style];
  }

  private formatNode(node: TreeNode): string {
    const icon = this.options.showIcons ? (node.hasChildren() ? FOLDER_ICON : FILE_ICON) + ' ' : '';
    const name = this.options.colorEnabled
      ? (node.hasChildren() ? BRANCH_COLOR : LEAF_COLOR) + node.name + style.reset
      : node.name;
    const meta = this.options.showMetadata && node.metadata !== undefined ? ` [${node.metadata}]` : '';
    return icon + name + meta;
  }

  render(sink: OutputSink, root: TreeNode): void {
    sink.write(this.formatNode(root) + '\n');

    if (root.isExpanded() && root.hasChildren()) {
      this.renderChildren(sink, root, '', 0);
    }
    logRender('tree', { nodes: root.countNodes(), maxDepth: this.options.maxDepth });
  }

  private renderChildren(sink: OutputSink, node: TreeNode, prefix: string, depth: number): void {
    if (this.options.maxDepth !== null && depth >= this.options.maxDepth) {
      return;
    }

    const chars = this.glyphs;
    const children = [...node.getChildren()];
    if (this.options.alphabeticalSort) {
      children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    children.forEach((child, i) => {
      const isLast = i === children.length - 1;
      sink.write(prefix + (isLast ? chars.lastBranch : chars.branch) + this.formatNode(child) + '\n');

      if (child.isExpanded() && child.hasChildren()) {
        this.renderChildren(sink, child, prefix + (isLast ? chars.space : chars.continuation), depth + 1);
      }
    });
  }

  renderToString(root: TreeNode): string {
    return renderToString(sink => this.render(sink, root));
  }

  printStatistics(sink: OutputSink, root: TreeNode): void {
    sink.write('\nTree Statistics:\n');
    sink.write(`  Total nodes: ${root.countNodes()}\n`);
    sink.write(`  Maximum depth: ${root.getDepth()}\n`);
    sink.write(`  Root children: ${root.getChildren().length}\n`);
  }
}

export function createTree(rootName: string, metadata?: string): TreeNode {
  return new TreeNode(rootName, metadata);
}
