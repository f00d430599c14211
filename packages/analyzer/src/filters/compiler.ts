import { FramePredicate } from '../model';
import { SourceLocator } from '../analysis/source-locator';
import { FilterNode, parseFilter } from './parser';
import {
  ALL_FRAMES,
  createDefaultFilter,
  matchFileName,
  matchFilePattern,
  matchFunction,
  matchPackage,
  matchSizes,
  matchType,
} from './predicates';

/**
 * Anything accepted where a frame filter is expected: filter source text, an
 * already parsed expression, a compiled predicate, or nothing (the default).
 */
export type FilterInput = string | FilterNode | FramePredicate | null | undefined;

const compileNode = (node: FilterNode, locator: SourceLocator): FramePredicate => {
  switch (node.kind) {
    case 'and': {
      const operands = node.operands.map((operand) => compileNode(operand, locator));
      return (allocation, frame) => operands.every((predicate) => predicate(allocation, frame));
    }
    case 'or': {
      const operands = node.operands.map((operand) => compileNode(operand, locator));
      return (allocation, frame) => operands.some((predicate) => predicate(allocation, frame));
    }
    case 'not': {
      // negation never reaches frames the default filter hides
      const inProject = createDefaultFilter(locator);
      const operand = compileNode(node.operand, locator);
      return (allocation, frame) => inProject(allocation, frame) && !operand(allocation, frame);
    }
    case 'type':
      return matchType(locator, node.name, node.sizes);
    case 'sizes':
      return matchSizes(locator, node.sizes);
    case 'package':
      return matchPackage(locator, node.label, node.lines);
    case 'file':
      return matchFileName(node.name, node.lines);
    case 'pattern':
      return matchFilePattern(new RegExp(node.source, node.flags), node.lines);
    case 'function':
      return matchFunction(node.name);
    case 'all':
      return ALL_FRAMES;
  }
};

export const compileFilter = (input: FilterInput, locator: SourceLocator): FramePredicate => {
  if (typeof input === 'function') {
    return input;
  }

  if (input === null || input === undefined) {
    return createDefaultFilter(locator);
  }

  if (typeof input === 'string') {
    return input.trim().length === 0 ? createDefaultFilter(locator) : compileNode(parseFilter(input), locator);
  }

  return compileNode(input, locator);
};
