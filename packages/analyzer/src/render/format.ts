import pc from 'picocolors';
import { NodePayload, StackFrame } from '../model';
import { SourceLocator } from '../analysis/source-locator';
import { ColorCache, Colors, paint } from './colors';

export interface RenderContext {
  locator: SourceLocator;
  colorCache: ColorCache;
  colors: Colors;
}

export const createRenderContext = (
  locator: SourceLocator,
  colorCache: ColorCache = new ColorCache(),
  colors: Colors = pc,
): RenderContext => ({ locator, colorCache, colors });

const formatSource = (context: RenderContext, file: string, line: number): string => {
  const label = context.locator.packageLabel(file);
  const coloredLabel = label ? paint(context.colors, context.colorCache.packageColor(label), label) : '';
  return `${coloredLabel}${context.locator.displayPath(file)}:${line}`;
};

const formatFrame = (context: RenderContext, frame: StackFrame): string =>
  `${formatSource(context, frame.file, frame.line)} ${frame.functionName}`;

/** One line of text per tree node. */
export const renderPayload = (context: RenderContext, payload: NodePayload): string => {
  switch (payload.kind) {
    case 'header': {
      const header = `${payload.attributedCount} allocs: ${payload.attributedBytes} bytes at ${payload.groupCount} source locations`;
      if (payload.unattributedCount === 0) {
        return header;
      }
      const note = `(ignoring ${payload.unattributedCount} allocs: ${payload.unattributedBytes} bytes)`;
      return `${header} ${context.colors.dim(note)}`;
    }
    case 'group':
      return `${payload.count} allocs: ${payload.totalBytes} bytes at ${formatSource(
        context,
        payload.location.file,
        payload.location.line,
      )}`;
    case 'allocation': {
      const { name } = payload.record.type;
      return `${payload.record.size} bytes for ${paint(context.colors, context.colorCache.typeColor(name), name)}`;
    }
    case 'frame':
      return formatFrame(context, payload.frame);
  }
};
