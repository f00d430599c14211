import pc from 'picocolors';
import {
  NATIVE_LABEL,
  RUNTIME_INTERNAL_LABEL,
  RUNTIME_LABEL,
  SELF_PACKAGE_LABEL,
} from '../analysis/source-locator';

export const COLOR_NAMES = ['blue', 'cyan', 'green', 'red', 'magenta', 'yellow', 'white', 'gray', 'dim'] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

export type Colors = ReturnType<typeof pc.createColors>;

export const DEFAULT_PALETTE: readonly ColorName[] = ['blue', 'cyan', 'green', 'red', 'magenta'];

export const DEFAULT_LABEL_COLORS: Readonly<Record<string, ColorName>> = {
  '': 'dim',
  [RUNTIME_INTERNAL_LABEL]: 'dim',
  [NATIVE_LABEL]: 'dim',
  [RUNTIME_LABEL]: 'yellow',
  [SELF_PACKAGE_LABEL]: 'red',
};

const cyclePicker = (palette: readonly ColorName[]) => {
  let next = 0;
  return (): ColorName => {
    const color = palette[next % palette.length];
    next += 1;
    return color;
  };
};

/**
 * Stable color per package label and per allocation type. Lives for the whole
 * process, so a package keeps its color across repeated runs.
 */
export class ColorCache {
  private readonly packageColors: Map<string, ColorName>;
  private readonly typeColors = new Map<string, ColorName>();
  private readonly nextPackageColor: () => ColorName;
  private readonly nextTypeColor: () => ColorName;

  constructor(
    palette: readonly ColorName[] = DEFAULT_PALETTE,
    labelColors: Readonly<Record<string, ColorName>> = DEFAULT_LABEL_COLORS,
  ) {
    if (palette.length === 0) {
      throw new Error('Color palette must contain at least one color.');
    }
    this.packageColors = new Map(Object.entries(labelColors));
    this.nextPackageColor = cyclePicker(palette);
    this.nextTypeColor = cyclePicker(palette);
  }

  packageColor(label: string): ColorName {
    const cached = this.packageColors.get(label);
    if (cached) {
      return cached;
    }
    const color = this.nextPackageColor();
    this.packageColors.set(label, color);
    return color;
  }

  typeColor(typeName: string): ColorName {
    const cached = this.typeColors.get(typeName);
    if (cached) {
      return cached;
    }
    const color = this.nextTypeColor();
    this.typeColors.set(typeName, color);
    return color;
  }
}

export const paint = (colors: Colors, color: ColorName, text: string): string => colors[color](text);
