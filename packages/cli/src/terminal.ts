import readline from 'readline';
import { MenuHost, MenuKey, PayloadRenderer, renderMenuPage, TreeMenu } from '@allocview/analyzer';

const DISABLE_WRAP = '\u001b[?7l';
const ENABLE_WRAP = '\u001b[?7h';
const HIDE_CURSOR = '\u001b[?25l';
const SHOW_CURSOR = '\u001b[?25h';

/**
 * Drives a {@link TreeMenu} on a TTY: one keypress at a time, redrawing the
 * page in place after each.
 */
export class TerminalMenuHost {
  private drawnLines = 0;
  private active = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  get interactive(): boolean {
    return Boolean(this.input.isTTY && this.output.isTTY);
  }

  private erase(): void {
    if (this.drawnLines > 0) {
      readline.moveCursor(this.output, 0, -this.drawnLines);
      readline.cursorTo(this.output, 0);
      readline.clearScreenDown(this.output);
      this.drawnLines = 0;
    }
  }

  private draw(menu: TreeMenu, render: PayloadRenderer): void {
    this.erase();
    const lines = renderMenuPage(menu, render);
    this.output.write(`${lines.join('\n')}\n`);
    this.drawnLines = lines.length;
  }

  private enter(): void {
    this.input.setRawMode(true);
    this.input.resume();
    this.output.write(DISABLE_WRAP + HIDE_CURSOR);
    this.active = true;
  }

  private leave(): void {
    this.output.write(ENABLE_WRAP + SHOW_CURSOR);
    this.input.setRawMode(false);
    this.input.pause();
    this.active = false;
  }

  /** Hands the terminal to `task` (an editor, say) and takes it back afterwards. */
  suspend(task: () => void): void {
    if (!this.active) {
      task();
      return;
    }
    this.leave();
    this.drawnLines = 0;
    try {
      task();
    } finally {
      this.enter();
    }
  }

  readonly run: MenuHost = (menu, render) =>
    new Promise<void>((resolve, reject) => {
      if (!this.interactive) {
        reject(new Error('The allocation menu needs an interactive terminal; use --print instead.'));
        return;
      }

      readline.emitKeypressEvents(this.input);

      const finish = (error?: Error): void => {
        this.input.off('keypress', onKeypress);
        this.leave();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onKeypress = (sequence: string | undefined, key: MenuKey | undefined): void => {
        try {
          const outcome = menu.handleKey(key ?? { sequence });
          if (outcome === 'quit') {
            finish();
            return;
          }
          this.draw(menu, render);
        } catch (error) {
          finish(error instanceof Error ? error : new Error(String(error)));
        }
      };

      this.enter();
      this.input.on('keypress', onKeypress);
      this.draw(menu, render);
    });
}

/** Non-interactive host: writes the lines currently unfolded and returns. */
export const printMenu: MenuHost = async (menu, render) => {
  menu.pageSize = menu.lines().length;
  menu.setCursor(0);
  renderMenuPage(menu, render).forEach((line) => console.log(line.slice(2)));
};
