import { NodePayload } from '../model';

export interface TreeNode {
  id: number;
  parent: number | undefined;
  children: number[];
  folded: boolean;
  payload: NodePayload;
}

export interface VisibleLine {
  id: number;
  depth: number;
}

/**
 * Node arena: parents own their children by id; children refer back to their
 * parent by id only.
 */
export class AllocationTree {
  private readonly nodes = new Map<number, TreeNode>();
  private nextId = 0;
  readonly root: number;

  constructor(rootPayload: NodePayload) {
    this.root = this.create(rootPayload, undefined);
  }

  private create(payload: NodePayload, parent: number | undefined): number {
    const id = this.nextId;
    this.nextId += 1;
    this.nodes.set(id, { id, parent, children: [], folded: false, payload });
    return id;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(id: number): boolean {
    return this.nodes.has(id);
  }

  node(id: number): TreeNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new Error(`Tree node ${id} does not exist.`);
    }
    return node;
  }

  payload(id: number): NodePayload {
    return this.node(id).payload;
  }

  parent(id: number): TreeNode | undefined {
    const { parent } = this.node(id);
    return parent === undefined ? undefined : this.node(parent);
  }

  append(parent: number, payload: NodePayload): number {
    const owner = this.node(parent);
    const id = this.create(payload, parent);
    owner.children.push(id);
    return id;
  }

  setPayload(id: number, payload: NodePayload): void {
    this.node(id).payload = payload;
  }

  /** Drops the current children (and their subtrees) and appends new ones. */
  replaceChildren(id: number, payloads: readonly NodePayload[]): number[] {
    const owner = this.node(id);
    owner.children.forEach((child) => this.remove(child));
    owner.children = [];
    return payloads.map((payload) => this.append(id, payload));
  }

  private remove(id: number): void {
    this.node(id).children.forEach((child) => this.remove(child));
    this.nodes.delete(id);
  }

  setFolded(id: number, folded: boolean): void {
    this.node(id).folded = folded;
  }

  toggleFold(id: number): void {
    const node = this.node(id);
    node.folded = !node.folded;
  }

  /** Folds `id` and every node below it. */
  foldAll(id: number): void {
    const node = this.node(id);
    node.children.forEach((child) => this.foldAll(child));
    node.folded = true;
  }

  visibleLines(): VisibleLine[] {
    const lines: VisibleLine[] = [];
    const walk = (id: number, depth: number): void => {
      lines.push({ id, depth });
      const node = this.node(id);
      if (!node.folded) {
        node.children.forEach((child) => walk(child, depth + 1));
      }
    };
    walk(this.root, 0);
    return lines;
  }

  countVisibleLines(): number {
    return this.visibleLines().length;
  }
}
