import { AllocationRecord, AllocationType, StackFrame, UNKNOWN_TYPE } from '../model';

/** A file of the profiled project itself, labelled `@app`. */
export const projectFile = (name: string): string => `/work/node_modules/app/src/${name}`;

export const packageFile = (packageName: string, name: string): string =>
  `/work/node_modules/${packageName}/src/${name}`;

export const SAMPLER_FILE = '/work/node_modules/@allocview/analyzer/src/profiling/sampler.ts';

export const frame = (file: string, line: number, functionName = 'run'): StackFrame => ({ file, line, functionName });

/** The frames every sampled stack ends with. */
export const samplerFrames = (): StackFrame[] => [
  frame(SAMPLER_FILE, 80, 'sample'),
  frame(SAMPLER_FILE, 112, 'trackAllocations'),
];

export const record = (
  size: number,
  stacktrace: StackFrame[],
  type: AllocationType = UNKNOWN_TYPE,
): AllocationRecord => ({ size, type, stacktrace });

export const INTERNAL_FRAME = frame('node:internal/timers', 12, 'listOnTimeout');

/**
 * Two groups (`a.ts:5` with 8 + 24 bytes, `c.ts:7` with 16 bytes) and one
 * record that only runs through runtime internals.
 */
export const sampleRecords = (): AllocationRecord[] => {
  const a5 = frame(projectFile('a.ts'), 5, 'alloc');
  const b9 = frame(projectFile('b.ts'), 9, 'outer');
  const c7 = frame(projectFile('c.ts'), 7, 'fill');
  return [
    record(8, [INTERNAL_FRAME, a5, b9, ...samplerFrames()]),
    record(16, [c7, ...samplerFrames()]),
    record(24, [a5, ...samplerFrames()]),
    record(40, [INTERNAL_FRAME, frame('', 0, '(anonymous)')]),
  ];
};
