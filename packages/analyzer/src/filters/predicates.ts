import { FramePredicate, isSubtypeOf } from '../model';
import {
  HIDDEN_LABELS,
  INSTRUMENTATION_SCOPE,
  RUNTIME_LABELS,
  SourceLocator,
} from '../analysis/source-locator';
import { IntSet, intSetHas } from './parser';

/** Shows every frame; attribution skips stack truncation for this exact value. */
export const ALL_FRAMES: FramePredicate = () => true;

const baseName = (file: string): string => {
  const segments = file.split(/[\\/]/);
  return segments[segments.length - 1];
};

/** Frames inside instrumented code: not runtime internals, not native, not unresolvable. */
export const createDefaultFilter = (locator: SourceLocator): FramePredicate => (_allocation, frame) =>
  !HIDDEN_LABELS.includes(locator.packageLabel(frame.file));

/** Frames of the viewer's own packages: the sampler and the command line that starts it. */
export const createBottomFilter = (locator: SourceLocator): FramePredicate => (_allocation, frame) =>
  locator.packageLabel(frame.file).startsWith(INSTRUMENTATION_SCOPE);

/** Runtime frames: internals, natives, unresolved code and the public built-in modules. */
export const createRuntimeFilter = (locator: SourceLocator): FramePredicate => (_allocation, frame) =>
  RUNTIME_LABELS.includes(locator.packageLabel(frame.file));

export const matchType = (locator: SourceLocator, name: string, sizes?: IntSet): FramePredicate => {
  const inProject = createDefaultFilter(locator);
  return (allocation, frame) =>
    inProject(allocation, frame)
    && isSubtypeOf(allocation.type, name)
    && (!sizes || intSetHas(sizes, allocation.size));
};

export const matchSizes = (locator: SourceLocator, sizes: IntSet): FramePredicate => {
  const inProject = createDefaultFilter(locator);
  return (allocation, frame) => inProject(allocation, frame) && intSetHas(sizes, allocation.size);
};

const matchLines = (lines: IntSet | undefined, predicate: FramePredicate): FramePredicate =>
  lines ? (allocation, frame) => predicate(allocation, frame) && intSetHas(lines, frame.line) : predicate;

export const matchPackage = (locator: SourceLocator, label: string, lines?: IntSet): FramePredicate => {
  if (label === '@') {
    return matchLines(lines, (_allocation, frame) => !RUNTIME_LABELS.includes(locator.packageLabel(frame.file)));
  }
  return matchLines(lines, (_allocation, frame) => locator.packageLabel(frame.file) === label);
};

export const matchFileName = (name: string, lines?: IntSet): FramePredicate =>
  matchLines(lines, (_allocation, frame) => baseName(frame.file) === name);

export const matchFilePattern = (pattern: RegExp, lines?: IntSet): FramePredicate => {
  // sticky and global patterns carry lastIndex between calls
  const stateless = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return matchLines(lines, (_allocation, frame) => stateless.test(frame.file));
};

export const matchFunction = (name: string): FramePredicate => (_allocation, frame) => frame.functionName === name;
