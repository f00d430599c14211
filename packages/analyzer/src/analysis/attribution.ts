import { AllocationRecord, FramePredicate, StackFrame } from '../model';
import { ALL_FRAMES } from '../filters/predicates';

export interface Attribution {
  /** Index of the frame the allocation is attributed to. */
  index: number;
  /** Displayed frames are `stacktrace.slice(start, end)`; `start === index`. */
  start: number;
  end: number;
}

const findFrom = (
  record: AllocationRecord,
  predicate: FramePredicate,
  from: number,
): number => {
  for (let index = from; index < record.stacktrace.length; index += 1) {
    if (predicate(record, record.stacktrace[index])) {
      return index;
    }
  }
  return -1;
};

/**
 * Locates the first frame accepted by `filter` and the frames shown from it up
 * to, not including, the next `bottom` frame. Attribution fails when nothing
 * matches or when the matching frame is itself a `bottom` frame.
 */
export const attributeFrames = (
  filter: FramePredicate,
  record: AllocationRecord,
  bottom: FramePredicate,
): Attribution | undefined => {
  if (filter === ALL_FRAMES) {
    return record.stacktrace.length > 0 ? { index: 0, start: 0, end: record.stacktrace.length } : undefined;
  }

  const index = findFrom(record, filter, 0);
  if (index === -1 || bottom(record, record.stacktrace[index])) {
    return undefined;
  }

  const boundary = findFrom(record, bottom, index + 1);
  return { index, start: index, end: boundary === -1 ? record.stacktrace.length : boundary };
};

/**
 * True for allocations made by the viewer itself, such as the profiler control
 * calls: the innermost frame outside the runtime is a `bottom` frame.
 */
export const isInstrumentationRecord = (
  record: AllocationRecord,
  runtime: FramePredicate,
  bottom: FramePredicate,
): boolean => {
  const frame = record.stacktrace.find((candidate) => !runtime(record, candidate));
  return frame !== undefined && bottom(record, frame);
};

export const visibleFrames = (
  filter: FramePredicate,
  record: AllocationRecord,
  bottom: FramePredicate,
): readonly StackFrame[] => {
  const attribution = attributeFrames(filter, record, bottom);
  return attribution ? record.stacktrace.slice(attribution.start, attribution.end) : [];
};
