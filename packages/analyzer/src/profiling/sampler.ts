import inspector from 'inspector';
import { AllocationRecord, StackFrame, UNKNOWN_TYPE } from '../model';

type SamplingHeapProfile = inspector.HeapProfiler.SamplingHeapProfile;
type SamplingHeapProfileNode = inspector.HeapProfiler.SamplingHeapProfileNode;

/** A profile node as V8 sends it: every node carries the id samples refer to. */
export interface SampledNode extends SamplingHeapProfileNode {
  id: number;
  children: SampledNode[];
}

export interface HeapSample {
  size: number;
  nodeId: number;
  ordinal: number;
}

export interface SampledProfile extends SamplingHeapProfile {
  head: SampledNode;
  samples: HeapSample[];
}

export type ProfiledCode = () => unknown;

/** Bytes between samples when every allocation should be recorded. */
const FULL_RATE_INTERVAL = 1;

/**
 * V8 samples by allocated bytes rather than by allocation count; a rate of `r`
 * asks for one sample every `1 / r` bytes on average.
 */
export const samplingIntervalFor = (sampleRate: number): number =>
  Math.max(FULL_RATE_INTERVAL, Math.round(FULL_RATE_INTERVAL / sampleRate));

const enableProfiler = (session: inspector.Session): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    session.post('HeapProfiler.enable', (error) => (error ? reject(error) : resolve()));
  });

const startSampling = (
  session: inspector.Session,
  params: inspector.HeapProfiler.StartSamplingParameterType,
): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    session.post('HeapProfiler.startSampling', params, (error) => (error ? reject(error) : resolve()));
  });

const isSampledNode = (node: SamplingHeapProfileNode): node is SampledNode =>
  'id' in node && typeof node.id === 'number' && node.children.every(isSampledNode);

const isSampledProfile = (profile: SamplingHeapProfile): profile is SampledProfile =>
  'samples' in profile && Array.isArray(profile.samples) && isSampledNode(profile.head);

const stopSampling = (session: inspector.Session): Promise<SampledProfile> =>
  new Promise<SampledProfile>((resolve, reject) => {
    session.post('HeapProfiler.stopSampling', (error, result) => {
      if (error) {
        reject(error);
      } else if (!isSampledProfile(result.profile)) {
        reject(new Error('The inspector returned a heap profile without node ids or samples.'));
      } else {
        resolve(result.profile);
      }
    });
  });

/**
 * Runs `code` and then `stop`. When `code` fails, sampling is still stopped and
 * the error from `code` is the one that propagates.
 */
export const runUntilStopped = async <T>(code: ProfiledCode, stop: () => Promise<T>): Promise<T> => {
  try {
    await code();
  } catch (error) {
    await stop().catch((stopError: Error) => {
      console.warn(`Could not stop heap sampling after a failed run: ${stopError.message}`);
    });
    throw error;
  }
  return stop();
};

const toFrame = (node: SampledNode): StackFrame => {
  const { functionName, url, lineNumber } = node.callFrame;
  return {
    file: url,
    // V8 lines are zero-based, -1 when unknown
    line: lineNumber >= 0 ? lineNumber + 1 : 0,
    functionName: functionName || '(anonymous)',
  };
};

/**
 * Converts a sampling heap profile into one record per sample, with frames
 * ordered from the allocating function outward.
 */
export const recordsFromProfile = (profile: SampledProfile): AllocationRecord[] => {
  const stacks = new Map<number, StackFrame[]>();

  const walk = (node: SampledNode, outer: StackFrame[]): void => {
    const stack = node.callFrame.functionName === '(root)' && node.callFrame.url === '' ? outer : [toFrame(node), ...outer];
    stacks.set(node.id, stack);
    node.children.forEach((child) => walk(child, stack));
  };
  walk(profile.head, []);

  const records: AllocationRecord[] = [];
  [...profile.samples]
    .sort((a, b) => a.ordinal - b.ordinal)
    .forEach((sample) => {
      const stacktrace = stacks.get(sample.nodeId);
      if (!stacktrace) {
        console.warn(`Heap sample ${sample.ordinal} refers to unknown profile node ${sample.nodeId}; skipped.`);
        return;
      }
      records.push({ size: sample.size, type: UNKNOWN_TYPE, stacktrace });
    });
  return records;
};

/**
 * Records allocations made while running code, through the inspector's
 * sampling heap profiler.
 */
export class HeapSampler {
  private readonly session = new inspector.Session();
  private connected = false;

  private async ensureConnected(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.session.connect();
    this.connected = true;
    await enableProfiler(this.session);
  }

  async sample(code: ProfiledCode, sampleRate: number): Promise<AllocationRecord[]> {
    await this.ensureConnected();
    // count objects the GC has already reclaimed as well
    const params = {
      samplingInterval: samplingIntervalFor(sampleRate),
      includeObjectsCollectedByMajorGC: true,
      includeObjectsCollectedByMinorGC: true,
    };

    await startSampling(this.session, params);
    const profile = await runUntilStopped(code, () => stopSampling(this.session));
    return recordsFromProfile(profile);
  }

  dispose(): void {
    if (this.connected) {
      this.session.disconnect();
      this.connected = false;
    }
  }
}
