import { NodePayload } from '../model';
import { AllocationTree, VisibleLine } from './arena';

/** Shape of a keypress as reported by `readline.emitKeypressEvents`. */
export interface MenuKey {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type KeyOutcome = 'handled' | 'ignored' | 'quit';

export type KeypressHandler = (menu: TreeMenu, key: MenuKey) => KeyOutcome;

export interface TreeMenuOptions {
  pageSize: number;
  /** Upper bound for `pageSize` when the menu resizes itself. Defaults to `pageSize`. */
  maxSize?: number;
  /** Initial cursor line. */
  cursor?: number;
  /** Resize the page to the visible content after every key. */
  dynamic?: boolean;
  /** Runs before the built-in navigation; `ignored` falls through to it. */
  keypress?: KeypressHandler;
}

/**
 * Navigation state of a collapsible tree list: a cursor over the visible
 * lines and a scrolled page window of at most `pageSize` lines.
 */
export class TreeMenu {
  readonly maxSize: number;
  pageSize: number;
  private cursorLine: number;
  private offsetLine = 0;
  private readonly dynamic: boolean;
  private readonly keypress?: KeypressHandler;

  constructor(
    readonly tree: AllocationTree,
    options: TreeMenuOptions,
  ) {
    this.maxSize = Math.max(1, options.maxSize ?? options.pageSize);
    this.pageSize = Math.max(1, Math.min(options.pageSize, this.maxSize));
    this.dynamic = options.dynamic ?? false;
    this.keypress = options.keypress;
    this.cursorLine = 0;
    if (this.dynamic) {
      this.fitPageSize();
    }
    this.setCursor(options.cursor ?? 0);
  }

  get cursor(): number {
    return this.cursorLine;
  }

  get offset(): number {
    return this.offsetLine;
  }

  lines(): VisibleLine[] {
    return this.tree.visibleLines();
  }

  /** Id of the node under the cursor. */
  get current(): number {
    const lines = this.lines();
    return lines[Math.min(this.cursorLine, lines.length - 1)].id;
  }

  setCursor(line: number): void {
    const count = this.tree.countVisibleLines();
    this.cursorLine = Math.max(0, Math.min(line, count - 1));
    this.scrollToCursor(count);
  }

  /** Moves the cursor onto `id`, if it is visible. */
  setCurrent(id: number): boolean {
    const line = this.lines().findIndex((entry) => entry.id === id);
    if (line === -1) {
      return false;
    }
    this.setCursor(line);
    return true;
  }

  fitPageSize(): void {
    this.pageSize = Math.max(1, Math.min(this.maxSize, this.tree.countVisibleLines()));
    this.scrollToCursor(this.tree.countVisibleLines());
  }

  private scrollToCursor(count: number): void {
    const maxOffset = Math.max(0, count - this.pageSize);
    if (this.cursorLine < this.offsetLine) {
      this.offsetLine = this.cursorLine;
    } else if (this.cursorLine >= this.offsetLine + this.pageSize) {
      this.offsetLine = this.cursorLine - this.pageSize + 1;
    }
    this.offsetLine = Math.max(0, Math.min(this.offsetLine, maxOffset));
  }

  private toggleCurrent(): void {
    const id = this.current;
    if (this.tree.node(id).children.length > 0) {
      this.tree.toggleFold(id);
    }
  }

  private collapseOrAscend(): void {
    const node = this.tree.node(this.current);
    if (node.children.length > 0 && !node.folded) {
      this.tree.setFolded(node.id, true);
    } else if (node.parent !== undefined) {
      this.setCurrent(node.parent);
    }
  }

  private expandCurrent(): void {
    const node = this.tree.node(this.current);
    if (node.children.length > 0) {
      this.tree.setFolded(node.id, false);
    }
  }

  private navigate(key: MenuKey): KeyOutcome {
    if ((key.ctrl && key.name === 'c') || key.name === 'q' || key.name === 'escape') {
      return 'quit';
    }

    switch (key.name) {
      case 'up':
      case 'k':
        this.setCursor(this.cursorLine - 1);
        return 'handled';
      case 'down':
      case 'j':
        this.setCursor(this.cursorLine + 1);
        return 'handled';
      case 'pageup':
        this.setCursor(this.cursorLine - this.pageSize);
        return 'handled';
      case 'pagedown':
        this.setCursor(this.cursorLine + this.pageSize);
        return 'handled';
      case 'home':
        this.setCursor(0);
        return 'handled';
      case 'end':
        this.setCursor(this.tree.countVisibleLines() - 1);
        return 'handled';
      case 'space':
      case 'return':
      case 'enter':
        this.toggleCurrent();
        return 'handled';
      case 'left':
        this.collapseOrAscend();
        return 'handled';
      case 'right':
        this.expandCurrent();
        return 'handled';
      default:
        return 'ignored';
    }
  }

  handleKey(key: MenuKey): KeyOutcome {
    let outcome = this.keypress ? this.keypress(this, key) : 'ignored';
    if (outcome === 'ignored') {
      outcome = this.navigate(key);
    }

    if (this.dynamic) {
      this.fitPageSize();
    }
    this.setCursor(this.cursorLine);
    return outcome;
  }
}

export type PayloadRenderer = (payload: NodePayload) => string;

/** Lines of the current page, each with cursor marker, indentation and fold glyph. */
export const renderMenuPage = (menu: TreeMenu, render: PayloadRenderer): string[] => {
  const lines = menu.lines();
  return lines.slice(menu.offset, menu.offset + menu.pageSize).map((line, index) => {
    const node = menu.tree.node(line.id);
    const marker = menu.offset + index === menu.cursor ? '>' : ' ';
    const glyph = node.children.length === 0 ? ' ' : node.folded ? '+' : '-';
    return `${marker} ${'  '.repeat(line.depth)}${glyph} ${render(node.payload)}`;
  });
};
