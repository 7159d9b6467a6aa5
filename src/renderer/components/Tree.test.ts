import { describe, it, expect, vi } from 'vitest';
import { createBufferSink } from '../output';
import { TreeNode, TreeRenderer, createTree } from './Tree';

vi.mock('../../utils/logger', () => ({
  logRender: vi.fn(),
}));

function projectTree(): TreeNode {
  const root = createTree('root');
  const src = root.addChild('src');
  src.addChildWithMetadata('main.ts', '1.2KB');
  src.addChild('lib.ts');
  root.addChild('README.md');
  return root;
}

function chain(): TreeNode {
  const root = createTree('root');
  root.addChild('a').addChild('b').addChild('c');
  return root;
}

describe('TreeNode', () => {
  it('should count nodes and depth', () => {
    const root = projectTree();
    expect(root.countNodes()).toBe(5);
    expect(root.getDepth()).toBe(3);
    expect(createTree('leaf').getDepth()).toBe(1);
  });

  it('should find and remove children by name', () => {
    const root = projectTree();
    expect(root.findChild('src')?.getChildren()).toHaveLength(2);
    expect(root.removeChild('src')).toBe(true);
    expect(root.removeChild('src')).toBe(false);
    expect(root.countNodes()).toBe(2);
  });

  it('should toggle expansion', () => {
    const node = new TreeNode('n');
    expect(node.isExpanded()).toBe(true);
    node.toggleExpansion();
    expect(node.isExpanded()).toBe(false);
    node.expand();
    expect(node.isExpanded()).toBe(true);
  });

  it('should not expose its child list for mutation', () => {
    const root = projectTree();
    expect(root.getChildren()).not.toBe(root.getChildren());
    expect(root.getChildren()).toHaveLength(2);
  });
});

describe('TreeRenderer', () => {
  it('should draw branches with continuation prefixes', () => {
    expect(new TreeRenderer().renderToString(projectTree())).toBe(
      'root\n' + '├─src\n' + '│ ├─main.ts\n' + '│ └─lib.ts\n' + '└─README.md\n'
    );
  });

  it('should use the ascii glyph set', () => {
    expect(new TreeRenderer('ascii').renderToString(projectTree())).toBe(
      'root\n' + '|-src\n' + '| |-main.ts\n' + '| `-lib.ts\n' + '`-README.md\n'
    );
  });

  it('should stop at the maximum depth', () => {
    expect(new TreeRenderer().withMaxDepth(2).renderToString(chain())).toBe('root\n└─a\n  └─b\n');
  });

  it('should render only the root at depth zero', () => {
    expect(new TreeRenderer().withMaxDepth(0).renderToString(chain())).toBe('root\n');
  });

  it('should hide children of collapsed nodes', () => {
    const root = projectTree();
    root.findChild('src')?.collapse();
    expect(new TreeRenderer().renderToString(root)).toBe('root\n├─src\n└─README.md\n');
  });

  it('should sort children by name', () => {
    const root = createTree('root');
    root.addChild('b');
    root.addChild('a');
    expect(new TreeRenderer().withAlphabeticalSort(true).renderToString(root)).toBe('root\n├─a\n└─b\n');
    expect(root.getChildren().map(child => child.name)).toEqual(['b', 'a']);
  });

  it('should append metadata when enabled', () => {
    const output = new TreeRenderer().withMetadata(true).renderToString(projectTree());
    expect(output.split('\n')[2]).toBe('│ ├─main.ts [1.2KB]');
  });

  it('should show folder and file icons', () => {
    const root = createTree('root');
    root.addChild('x');
    expect(new TreeRenderer().withIcons(true).renderToString(root)).toBe('📁 root\n└─📄 x\n');
  });

  it('should color branches and leaves', () => {
    const root = createTree('root');
    root.addChild('x');
    expect(new TreeRenderer().withColors(true).renderToString(root)).toBe(
      '\x1b[1;34mroot\x1b[0m\n└─\x1b[0;37mx\x1b[0m\n'
    );
  });

  it('should return new renderers from option setters', () => {
    const base = new TreeRenderer();
    const withIcons = base.withIcons(true);

    expect(withIcons).not.toBe(base);
    expect(base.getOptions().showIcons).toBe(false);
    expect(withIcons.getOptions().showIcons).toBe(true);
    expect(base.withMaxDepth(-3).getOptions().maxDepth).toBe(0);
  });

  it('should print tree statistics', () => {
    const sink = createBufferSink();
    new TreeRenderer().printStatistics(sink, projectTree());
    expect(sink.toString()).toBe('\nTree Statistics:\n  Total nodes: 5\n  Maximum depth: 3\n  Root children: 2\n');
  });
});
