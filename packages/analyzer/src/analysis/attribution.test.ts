import { FramePredicate } from '../model';
import { ALL_FRAMES } from '../filters/predicates';
import {
  frame,
  INTERNAL_FRAME,
  packageFile,
  projectFile,
  record,
  SAMPLER_FILE,
  samplerFrames,
} from '../__fixtures__/allocations';
import { attributeFrames, isInstrumentationRecord, visibleFrames } from './attribution';
import { createAnalysisContext } from './context';

const a5 = frame(projectFile('a.ts'), 5, 'alloc');
const b9 = frame(projectFile('b.ts'), 9, 'outer');
const caller = frame(projectFile('main.ts'), 1, 'main');
const stack = record(8, [INTERNAL_FRAME, a5, b9, ...samplerFrames(), caller]);

const inFunction = (name: string): FramePredicate => (_allocation, site) => site.functionName === name;
const inSampler: FramePredicate = (_allocation, site) => site.file === SAMPLER_FILE;

describe('attributeFrames', () => {
  const { defaultFilter, bottomFilter } = createAnalysisContext();

  test('attributes to the first matching frame and stops before the sampler', () => {
    expect(attributeFrames(defaultFilter, stack, bottomFilter)).toEqual({ index: 1, start: 1, end: 3 });
    expect(visibleFrames(defaultFilter, stack, bottomFilter)).toEqual([a5, b9]);
  });

  test('narrower filters start further out', () => {
    expect(attributeFrames(inFunction('outer'), stack, bottomFilter)).toEqual({ index: 2, start: 2, end: 3 });
  });

  test('fails when the matching frame belongs to the sampler', () => {
    expect(attributeFrames(inSampler, stack, bottomFilter)).toBeUndefined();
    expect(visibleFrames(inSampler, stack, bottomFilter)).toEqual([]);
  });

  test('fails when nothing matches', () => {
    expect(attributeFrames(inFunction('missing'), stack, bottomFilter)).toBeUndefined();
    expect(visibleFrames(inFunction('missing'), stack, bottomFilter)).toEqual([]);
  });

  test('runs to the end of the stack when no sampler frame follows', () => {
    expect(attributeFrames(inFunction('main'), stack, bottomFilter)).toEqual({ index: 5, start: 5, end: 6 });
  });

  test('the all-frames filter keeps the whole stack', () => {
    expect(attributeFrames(ALL_FRAMES, stack, bottomFilter)).toEqual({ index: 0, start: 0, end: 6 });
    expect(visibleFrames(ALL_FRAMES, stack, bottomFilter)).toEqual(stack.stacktrace);
    expect(attributeFrames(ALL_FRAMES, record(8, []), bottomFilter)).toBeUndefined();
  });

  test('gives the same answer on every call', () => {
    const first = attributeFrames(defaultFilter, stack, bottomFilter);
    expect(attributeFrames(defaultFilter, stack, bottomFilter)).toEqual(first);
  });
});

describe('isInstrumentationRecord', () => {
  const { runtimeFilter, bottomFilter } = createAnalysisContext();
  const inspectorPost = frame('node:inspector', 81, 'post');

  test('holds when the first frame outside the runtime is the sampler', () => {
    expect(isInstrumentationRecord(record(8, [inspectorPost, ...samplerFrames()]), runtimeFilter, bottomFilter)).toBe(true);
    expect(isInstrumentationRecord(record(8, [INTERNAL_FRAME, ...samplerFrames()]), runtimeFilter, bottomFilter)).toBe(true);
  });

  test('holds for the command line that starts the sampler', () => {
    const cli = frame(packageFile('@allocview/cli', 'index.ts'), 12, 'main');
    expect(isInstrumentationRecord(record(8, [cli, ...samplerFrames()]), runtimeFilter, bottomFilter)).toBe(true);
  });

  test('does not hold for project code or stacks made of runtime frames only', () => {
    expect(isInstrumentationRecord(stack, runtimeFilter, bottomFilter)).toBe(false);
    expect(isInstrumentationRecord(record(8, [inspectorPost, a5, ...samplerFrames()]), runtimeFilter, bottomFilter)).toBe(
      false,
    );
    expect(isInstrumentationRecord(record(8, [INTERNAL_FRAME]), runtimeFilter, bottomFilter)).toBe(false);
  });
});
