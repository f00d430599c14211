import assert from 'assert';
import { FramePredicate, SourceLocation } from '../model';
import { assignFrames, AllocationTreeBuild } from '../analysis/aggregator';
import { AnalysisContext } from '../analysis/context';
import { ALL_FRAMES } from '../filters/predicates';
import { AllocationTree } from './arena';
import { KeyOutcome, MenuKey, TreeMenu } from './menu';

export type EditorLauncher = (fullPath: string, line: number) => void;

export interface AllocationMenuOptions {
  context: AnalysisContext;
  /** The session's display filter, re-applied by the `f` command. */
  displayFilter: FramePredicate;
  maxSize: number;
  openEditor: EditorLauncher;
}

/**
 * Source location behind a node: a group's own location, the enclosing
 * group's location for an allocation, the frame's position for a frame.
 * The header has none.
 */
export const resolveNodeLocation = (tree: AllocationTree, id: number): SourceLocation | undefined => {
  const payload = tree.payload(id);
  switch (payload.kind) {
    case 'header':
      return undefined;
    case 'group':
      return payload.location;
    case 'allocation': {
      const parent = tree.parent(id)?.payload;
      assert(parent?.kind === 'group', `Allocation node ${id} is not attached to a source location group.`);
      return parent.location;
    }
    case 'frame':
      return { file: payload.frame.file, line: payload.frame.line };
    default: {
      const unexpected: never = payload;
      assert.fail(`Unexpected tree node payload: ${JSON.stringify(unexpected)}`);
    }
  }
};

const commandFilter = (command: string, options: AllocationMenuOptions): FramePredicate | undefined => {
  switch (command) {
    case 'f':
      return options.displayFilter;
    case 'r':
      return options.context.defaultFilter;
    case 'R':
      return ALL_FRAMES;
    default:
      return undefined;
  }
};

export const createAllocationKeypress = (options: AllocationMenuOptions) =>
  (menu: TreeMenu, key: MenuKey): KeyOutcome => {
    const command = key.sequence ?? '';
    const id = menu.current;
    const { tree } = menu;

    if (command === 'e') {
      const location = resolveNodeLocation(tree, id);
      if (location && location.line > 0) {
        const fullPath = options.context.locator.fullPath(location.file);
        if (fullPath) {
          options.openEditor(fullPath, location.line);
        }
      }
      return 'handled';
    }

    const filter = commandFilter(command, options);
    if (!filter) {
      return 'ignored';
    }

    if (tree.payload(id).kind === 'allocation') {
      assignFrames(tree, id, filter, options.context);
      menu.pageSize = Math.min(menu.maxSize, tree.countVisibleLines());
    }
    return 'handled';
  };

/** Wraps a freshly built tree in a menu whose cursor starts on the first group. */
export const createAllocationMenu = (build: AllocationTreeBuild, options: AllocationMenuOptions): TreeMenu =>
  new TreeMenu(build.tree, {
    pageSize: options.maxSize,
    maxSize: options.maxSize,
    cursor: 1,
    dynamic: true,
    keypress: createAllocationKeypress(options),
  });
