import {
  AllocationRecord,
  AllocationSummary,
  FramePredicate,
  SourceLocation,
  sourceLocationKey,
} from '../model';
import { AllocationTree } from '../tree/arena';
import { attributeFrames, isInstrumentationRecord, visibleFrames } from './attribution';
import { AnalysisContext } from './context';

export interface AllocationGroup {
  location: SourceLocation;
  records: AllocationRecord[];
}

export interface GroupingResult {
  groups: AllocationGroup[];
  unattributedCount: number;
  unattributedBytes: number;
}

export interface AllocationTreeBuild {
  tree: AllocationTree;
  summary: AllocationSummary;
}

const sumBytes = (records: readonly AllocationRecord[]): number =>
  records.reduce((total, record) => total + record.size, 0);

/**
 * Buckets records by the frame the default filter attributes them to. Groups
 * keep first-encounter order; records keep input order within their group.
 * The viewer's own allocations count as unattributed.
 */
export const groupAllocations = (
  records: readonly AllocationRecord[],
  context: AnalysisContext,
): GroupingResult => {
  const groups = new Map<string, AllocationGroup>();
  let unattributedCount = 0;
  let unattributedBytes = 0;

  records.forEach((record) => {
    const attribution = isInstrumentationRecord(record, context.runtimeFilter, context.bottomFilter)
      ? undefined
      : attributeFrames(context.defaultFilter, record, context.bottomFilter);
    if (!attribution) {
      unattributedCount += 1;
      unattributedBytes += record.size;
      return;
    }

    const frame = record.stacktrace[attribution.index];
    const location: SourceLocation = { file: frame.file, line: frame.line };
    const key = sourceLocationKey(location);
    const existing = groups.get(key);
    if (existing) {
      existing.records.push(record);
    } else {
      groups.set(key, { location, records: [record] });
    }
  });

  return { groups: [...groups.values()], unattributedCount, unattributedBytes };
};

/**
 * Rebuilds the frame children of an allocation node. Only that node's child
 * list changes.
 */
export const assignFrames = (
  tree: AllocationTree,
  allocationId: number,
  filter: FramePredicate,
  context: AnalysisContext,
): void => {
  const payload = tree.payload(allocationId);
  if (payload.kind !== 'allocation') {
    throw new Error(`Node ${allocationId} is a ${payload.kind} node, not an allocation.`);
  }

  const frames = visibleFrames(filter, payload.record, context.bottomFilter);
  tree.replaceChildren(
    allocationId,
    frames.map((frame) => ({ kind: 'frame', frame })),
  );
};

export const buildAllocationTree = (
  filter: FramePredicate,
  records: readonly AllocationRecord[],
  context: AnalysisContext,
): AllocationTreeBuild => {
  context.locator.clear();

  const { groups, unattributedCount, unattributedBytes } = groupAllocations(records, context);
  const summary: AllocationSummary = {
    attributedCount: 0,
    attributedBytes: 0,
    groupCount: groups.length,
    unattributedCount,
    unattributedBytes,
  };
  const tree = new AllocationTree({ kind: 'header', ...summary });

  groups.forEach((group) => {
    const totalBytes = sumBytes(group.records);
    summary.attributedCount += group.records.length;
    summary.attributedBytes += totalBytes;

    const groupId = tree.append(tree.root, {
      kind: 'group',
      location: group.location,
      count: group.records.length,
      totalBytes,
    });

    group.records.forEach((record) => {
      const allocationId = tree.append(groupId, { kind: 'allocation', record });
      assignFrames(tree, allocationId, filter, context);
    });

    tree.foldAll(groupId);
  });

  tree.setPayload(tree.root, { kind: 'header', ...summary });
  return { tree, summary };
};
