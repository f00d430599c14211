import { AllocationSummary, describeFilter, FilterNode, IntSet } from '@allocview/analyzer';

export const formatBytes = (bytes: number): string => `${bytes} B`;

const formatIntSet = (set: IntSet): string =>
  set.kind === 'range' ? `${set.from}..${set.to}` : set.values.join(', ');

const describeLeaf = (node: FilterNode): string => {
  switch (node.kind) {
    case 'type':
      return `type ${node.name}${node.sizes ? ` with size in ${formatIntSet(node.sizes)}` : ''}`;
    case 'sizes':
      return `size in ${formatIntSet(node.sizes)}`;
    case 'package':
      return node.label === '@'
        ? `any package outside the runtime${node.lines ? ` at line ${formatIntSet(node.lines)}` : ''}`
        : `package ${node.label}${node.lines ? ` at line ${formatIntSet(node.lines)}` : ''}`;
    case 'file':
      return `file named ${node.name}${node.lines ? ` at line ${formatIntSet(node.lines)}` : ''}`;
    case 'pattern':
      return `file matching /${node.source}/${node.flags}${node.lines ? ` at line ${formatIntSet(node.lines)}` : ''}`;
    case 'function':
      return `function ${node.name}`;
    case 'all':
      return 'every frame (no truncation)';
    default:
      return describeFilter(node);
  }
};

/** Indented outline of a parsed filter, one line per node. */
export const formatFilterTree = (node: FilterNode, depth = 0): string[] => {
  const indent = '  '.repeat(depth);
  switch (node.kind) {
    case 'and':
    case 'or':
      return [
        `${indent}${node.kind === 'and' ? 'all of' : 'any of'}:`,
        ...node.operands.flatMap((operand) => formatFilterTree(operand, depth + 1)),
      ];
    case 'not':
      return [`${indent}in-project frames except:`, ...formatFilterTree(node.operand, depth + 1)];
    default:
      return [`${indent}${describeLeaf(node)}`];
  }
};

export const printFilter = (node: FilterNode): void => {
  console.log(`Filter: ${describeFilter(node)}`);
  formatFilterTree(node).forEach((line) => console.log(`  ${line}`));
};

export const printSummary = (summary: AllocationSummary): void => {
  console.log(
    `Tracked ${summary.attributedCount} allocations (${formatBytes(summary.attributedBytes)}) at ${summary.groupCount} source locations.`,
  );
  if (summary.unattributedCount > 0) {
    console.log(
      `Ignored ${summary.unattributedCount} allocations (${formatBytes(summary.unattributedBytes)}) outside project code.`,
    );
  }
};
