import { FramePredicate } from '../model';
import { createBottomFilter, createDefaultFilter, createRuntimeFilter } from '../filters/predicates';
import { SourceLocator } from './source-locator';

export interface AnalysisContext {
  locator: SourceLocator;
  defaultFilter: FramePredicate;
  bottomFilter: FramePredicate;
  runtimeFilter: FramePredicate;
}

export const createAnalysisContext = (locator: SourceLocator = new SourceLocator()): AnalysisContext => ({
  locator,
  defaultFilter: createDefaultFilter(locator),
  bottomFilter: createBottomFilter(locator),
  runtimeFilter: createRuntimeFilter(locator),
});
