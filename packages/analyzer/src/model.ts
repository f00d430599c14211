export interface AllocationType {
  name: string;
  supertypes: readonly string[];
}

export interface StackFrame {
  file: string;
  /** Non-positive when the profiler could not determine the line. */
  line: number;
  functionName: string;
}

/** Frames are ordered innermost first: index 0 is the allocation site. */
export interface AllocationRecord {
  size: number;
  type: AllocationType;
  stacktrace: readonly StackFrame[];
}

export interface SourceLocation {
  file: string;
  line: number;
}

export type FramePredicate = (allocation: AllocationRecord, frame: StackFrame) => boolean;

export interface ResolvedSource {
  fullPath: string;
  packageLabel: string;
  relativePath: string;
}

export const UNKNOWN_TYPE: AllocationType = { name: 'Unknown', supertypes: [] };

export const sourceLocationKey = (location: SourceLocation): string => `${location.file}\u0000${location.line}`;

export const sameSourceLocation = (a: SourceLocation, b: SourceLocation): boolean =>
  a.file === b.file && a.line === b.line;

export const isSubtypeOf = (type: AllocationType, name: string): boolean =>
  type.name === name || type.supertypes.includes(name);

export interface HeaderPayload {
  kind: 'header';
  attributedCount: number;
  attributedBytes: number;
  groupCount: number;
  unattributedCount: number;
  unattributedBytes: number;
}

export interface GroupPayload {
  kind: 'group';
  location: SourceLocation;
  count: number;
  totalBytes: number;
}

export interface AllocationPayload {
  kind: 'allocation';
  record: AllocationRecord;
}

export interface FramePayload {
  kind: 'frame';
  frame: StackFrame;
}

export type NodePayload = HeaderPayload | GroupPayload | AllocationPayload | FramePayload;

export type AllocationSummary = Omit<HeaderPayload, 'kind'>;

export interface TrackOptions {
  sampleRate: number;
  pageSize?: number;
  warmup: boolean;
}
