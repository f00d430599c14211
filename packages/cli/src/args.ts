import path from 'path';

export interface TrackCommand {
  command: 'track';
  modulePath: string;
  filter?: string;
  exportName?: string;
  configPath?: string;
  print: boolean;
  /** Named options passed on to `trackAllocations`, which validates them. */
  trackOptions: Record<string, unknown>;
}

export interface FilterCommand {
  command: 'filter';
  expression: string;
}

export interface HelpCommand {
  command: 'help';
}

export type CliCommand = TrackCommand | FilterCommand | HelpCommand;

export const usage = (): string => {
  const scriptName = path.basename(process.argv[1] ?? 'allocview');
  return `Usage: ${scriptName} track <module> [filter] [options]
       ${scriptName} filter <expression>

Commands:
  track <module> [filter]  Run the module's exported function under allocation
                           sampling and browse the allocations in a foldable menu
                           (the module is loaded with require: CommonJS only)
  filter <expression>      Check a frame filter and show how it is read

Options for track:
  --sample-rate <rate>     Fraction of allocations to record (0, 1], default 1
  --pagesize <n>           Maximal number of menu lines
  --warmup / --no-warmup   Run the code once before tracking (default: on)
  --export <name>          Export to run (default: the default export)
  --config <path>          Viewer configuration file (JSON)
  --print                  Print the grouped allocations instead of opening the menu
  --help                   Show this help message

Menu keys:
  up/down, j/k             Move the cursor
  space, enter             Fold or unfold the entry under the cursor
  e                        Open the source line in an editor
  f                        On an allocation: show the frames selected by the filter
  r                        On an allocation: show frames from the default filter on
  R                        On an allocation: show every frame
  q                        Quit
`;
};

const camelCase = (flag: string): string =>
  flag.replace(/^--/, '').replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());

const OPTION_ALIASES: Record<string, string> = {
  pagesize: 'pageSize',
};

export const parseArgs = (argv: string[]): CliCommand => {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { command: 'help' };
  }

  const [command, ...rest] = argv;

  if (command === 'filter') {
    if (rest.length !== 1) {
      throw new Error('The filter command takes exactly one expression.');
    }
    return { command: 'filter', expression: rest[0] };
  }

  if (command !== 'track') {
    throw new Error(`Unknown command: ${command}`);
  }

  const positionals: string[] = [];
  const result: TrackCommand = { command: 'track', modulePath: '', print: false, trackOptions: {} };

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const expectValue = (flag: string): string => {
      const value = rest[i + 1];
      if (!value || value.startsWith('--')) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case '--export':
        result.exportName = expectValue(arg);
        break;
      case '--config':
        result.configPath = expectValue(arg);
        break;
      case '--print':
        result.print = true;
        break;
      case '--warmup':
        result.trackOptions.warmup = true;
        break;
      case '--no-warmup':
        result.trackOptions.warmup = false;
        break;
      default: {
        // everything else is a named track option; unknown names are rejected there
        const [flag, inlineValue] = arg.split('=', 2);
        const name = camelCase(flag);
        result.trackOptions[OPTION_ALIASES[name] ?? name] = inlineValue ?? expectValue(flag);
      }
    }
  }

  if (positionals.length === 0 || positionals.length > 2) {
    throw new Error('The track command takes a module path and an optional filter.');
  }

  [result.modulePath, result.filter] = positionals;
  return result;
};
