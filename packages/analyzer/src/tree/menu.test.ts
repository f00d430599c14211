import { GroupPayload, NodePayload } from '../model';
import { frame, projectFile } from '../__fixtures__/allocations';
import { AllocationTree } from './arena';
import { MenuKey, PayloadRenderer, renderMenuPage, TreeMenu } from './menu';

const group = (line: number): GroupPayload => ({
  kind: 'group',
  location: { file: projectFile('a.ts'), line },
  count: 1,
  totalBytes: 8,
});

const render: PayloadRenderer = (payload: NodePayload) => {
  switch (payload.kind) {
    case 'group':
      return `g${payload.location.line}`;
    case 'frame':
      return payload.frame.functionName;
    default:
      return payload.kind;
  }
};

/** header > g1 > (a, b), g2, g3, g4; nothing folded. */
const buildTree = (): AllocationTree => {
  const tree = new AllocationTree({
    kind: 'header',
    attributedCount: 4,
    attributedBytes: 32,
    groupCount: 4,
    unattributedCount: 0,
    unattributedBytes: 0,
  });
  const g1 = tree.append(tree.root, group(1));
  tree.append(g1, { kind: 'frame', frame: frame(projectFile('a.ts'), 1, 'a') });
  tree.append(g1, { kind: 'frame', frame: frame(projectFile('a.ts'), 2, 'b') });
  [2, 3, 4].forEach((line) => tree.append(tree.root, group(line)));
  return tree;
};

const key = (name: string, extra: Partial<MenuKey> = {}): MenuKey => ({ name, sequence: name, ...extra });

describe('TreeMenu', () => {
  test('moves the cursor and scrolls the page with it', () => {
    const menu = new TreeMenu(buildTree(), { pageSize: 3 });

    ['down', 'j', 'down'].forEach((name) => menu.handleKey(key(name)));
    expect([menu.cursor, menu.offset]).toEqual([3, 1]);

    menu.handleKey(key('end'));
    expect([menu.cursor, menu.offset]).toEqual([6, 4]);

    menu.handleKey(key('pageup'));
    expect([menu.cursor, menu.offset]).toEqual([3, 3]);

    menu.handleKey(key('home'));
    expect([menu.cursor, menu.offset]).toEqual([0, 0]);

    menu.handleKey(key('up'));
    expect(menu.cursor).toBe(0);

    menu.handleKey(key('pagedown'));
    expect([menu.cursor, menu.offset]).toEqual([3, 1]);
  });

  test('folds and unfolds the entry under the cursor', () => {
    const tree = buildTree();
    const menu = new TreeMenu(tree, { pageSize: 10, cursor: 1 });

    menu.handleKey(key('space'));
    expect(tree.node(1).folded).toBe(true);
    expect(menu.lines()).toHaveLength(5);

    menu.handleKey(key('right'));
    expect(tree.node(1).folded).toBe(false);

    menu.handleKey(key('down'));
    menu.handleKey(key('left'));
    expect(menu.current).toBe(1);

    menu.handleKey(key('left'));
    expect(tree.node(1).folded).toBe(true);

    menu.handleKey(key('left'));
    expect(menu.current).toBe(tree.root);
  });

  test('leaves have nothing to fold', () => {
    const tree = buildTree();
    const menu = new TreeMenu(tree, { pageSize: 10, cursor: 6 });

    menu.handleKey(key('return'));
    expect(tree.node(6).folded).toBe(false);
  });

  test('reports quit and unknown keys', () => {
    const menu = new TreeMenu(buildTree(), { pageSize: 3 });

    expect(menu.handleKey(key('q'))).toBe('quit');
    expect(menu.handleKey(key('escape'))).toBe('quit');
    expect(menu.handleKey(key('c', { ctrl: true }))).toBe('quit');
    expect(menu.handleKey(key('x'))).toBe('ignored');
    expect(menu.handleKey(key('down'))).toBe('handled');
  });

  test('a keypress hook runs before navigation', () => {
    const seen: string[] = [];
    const menu = new TreeMenu(buildTree(), {
      pageSize: 3,
      keypress: (_menu, pressed) => {
        seen.push(pressed.sequence ?? '');
        return pressed.name === 'down' ? 'handled' : 'ignored';
      },
    });

    menu.handleKey(key('down'));
    menu.handleKey(key('j'));

    expect(seen).toEqual(['down', 'j']);
    expect(menu.cursor).toBe(1);
  });

  test('dynamic menus size the page to the visible lines', () => {
    const menu = new TreeMenu(buildTree(), { pageSize: 10, cursor: 1, dynamic: true });
    expect(menu.pageSize).toBe(7);

    menu.handleKey(key('space'));
    expect(menu.pageSize).toBe(5);

    const small = new TreeMenu(buildTree(), { pageSize: 4, dynamic: true });
    expect(small.pageSize).toBe(4);
  });

  test('jumps to a visible node by id', () => {
    const tree = buildTree();
    const menu = new TreeMenu(tree, { pageSize: 10 });

    expect(menu.setCurrent(3)).toBe(true);
    expect(menu.cursor).toBe(3);

    tree.setFolded(1, true);
    expect(menu.setCurrent(3)).toBe(false);
  });
});

describe('renderMenuPage', () => {
  test('marks the cursor and indents by depth', () => {
    const menu = new TreeMenu(buildTree(), { pageSize: 4 });

    expect(renderMenuPage(menu, render)).toEqual(['> - header', '    - g1', '        a', '        b']);
  });

  test('shows folded entries with a plus', () => {
    const tree = buildTree();
    tree.setFolded(1, true);
    const menu = new TreeMenu(tree, { pageSize: 3, cursor: 1 });

    expect(renderMenuPage(menu, render)).toEqual(['  - header', '>   + g1', '      g2']);
  });
});
