#!/usr/bin/env node

import {
  createAnalysisContext,
  createColorCache,
  loadViewerConfig,
  parseFilter,
  trackAllocations,
} from '@allocview/analyzer';
import { CliCommand, parseArgs, TrackCommand, usage } from './args';
import { launchEditor } from './editor';
import { printFilter, printSummary } from './formatters';
import { loadProfiledCode } from './profiled-module';
import { printMenu, TerminalMenuHost } from './terminal';

const runTrack = async (command: TrackCommand): Promise<void> => {
  const config = await loadViewerConfig({ configPath: command.configPath });
  const code = await loadProfiledCode(command.modulePath, command.exportName);
  const host = new TerminalMenuHost();
  const print = command.print || !host.interactive;

  const { summary } = await trackAllocations({
    code,
    filter: command.filter,
    options: command.trackOptions,
    host: print ? printMenu : host.run,
    openEditor: (fullPath, line) => host.suspend(() => launchEditor(fullPath, line, config.editor)),
    config,
    context: createAnalysisContext(),
    colorCache: createColorCache(config),
  });

  if (!print) {
    printSummary(summary);
  }
};

const runCommand = async (command: CliCommand): Promise<void> => {
  switch (command.command) {
    case 'help':
      console.log(usage());
      return;
    case 'filter':
      printFilter(parseFilter(command.expression));
      return;
    case 'track':
      await runTrack(command);
  }
};

const main = async (): Promise<void> => {
  try {
    await runCommand(parseArgs(process.argv.slice(2)));
  } catch (error) {
    console.error(`Error: ${(error as Error).message}`);
    process.exit(1);
  }
};

void main();
