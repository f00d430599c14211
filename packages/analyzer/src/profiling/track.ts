import { AllocationRecord } from '../model';
import { AllocationTreeBuild, buildAllocationTree } from '../analysis/aggregator';
import { AnalysisContext, createAnalysisContext } from '../analysis/context';
import { validateTrackOptions, ViewerConfig } from '../config/loader';
import { compileFilter, FilterInput } from '../filters/compiler';
import { ColorCache, Colors, DEFAULT_LABEL_COLORS, DEFAULT_PALETTE } from '../render/colors';
import { createRenderContext, renderPayload } from '../render/format';
import { createAllocationMenu, EditorLauncher } from '../tree/controller';
import { PayloadRenderer, TreeMenu } from '../tree/menu';
import { HeapSampler, ProfiledCode } from './sampler';

export interface RecordSource {
  sample(code: ProfiledCode, sampleRate: number): Promise<AllocationRecord[]>;
  dispose?(): void;
}

/** Shows the menu and resolves once the user quits it. */
export type MenuHost = (menu: TreeMenu, render: PayloadRenderer) => Promise<void>;

export interface TrackAllocationsParams {
  code: ProfiledCode;
  filter?: FilterInput;
  /** Named options: `sampleRate`, `pageSize`, `warmup`. */
  options?: Readonly<Record<string, unknown>>;
  host: MenuHost;
  openEditor: EditorLauncher;
  config?: ViewerConfig;
  context?: AnalysisContext;
  colorCache?: ColorCache;
  colors?: Colors;
  source?: RecordSource;
  terminalRows?: number;
}

export const defaultPageSize = (terminalRows: number): number =>
  Math.max(1, terminalRows - 2, Math.trunc(0.75 * terminalRows));

export const createColorCache = (config: ViewerConfig = {}): ColorCache =>
  new ColorCache(config.palette ?? DEFAULT_PALETTE, { ...DEFAULT_LABEL_COLORS, ...config.labelColors });

/**
 * Runs `code` once under allocation sampling, groups what it allocated and
 * hands the resulting menu to `host`.
 */
export const trackAllocations = async (params: TrackAllocationsParams): Promise<AllocationTreeBuild> => {
  const options = await validateTrackOptions(params.options);
  const config = params.config ?? {};
  const context = params.context ?? createAnalysisContext();
  const displayFilter = compileFilter(params.filter, context.locator);
  const source = params.source ?? new HeapSampler();

  try {
    if (options.warmup) {
      await params.code();
    }
    // empty run so that profiler setup is not sampled
    await source.sample(() => undefined, 1);
    const records = await source.sample(params.code, options.sampleRate);

    const build = buildAllocationTree(displayFilter, records, context);
    const maxSize = options.pageSize
      ?? config.maxPageSize
      ?? defaultPageSize(params.terminalRows ?? process.stdout.rows ?? 24);
    const menu = createAllocationMenu(build, {
      context,
      displayFilter,
      maxSize,
      openEditor: params.openEditor,
    });

    const renderContext = createRenderContext(context.locator, params.colorCache ?? createColorCache(config), params.colors);
    await params.host(menu, (payload) => renderPayload(renderContext, payload));
    return build;
  } finally {
    if (!params.source) {
      source.dispose?.();
    }
  }
};
