import { spawnSync } from 'child_process';
import path from 'path';
import type { EditorConfig } from '@allocview/analyzer';

export interface EditorCommand {
  command: string;
  args: string[];
}

const GOTO_EDITORS = new Set(['code', 'code-insiders', 'codium', 'cursor']);
const COLON_EDITORS = new Set(['subl', 'zed', 'hx']);

const substitute = (template: string, fullPath: string, line: number): string =>
  template.replace(/\{file\}/g, fullPath).replace(/\{line\}/g, String(line));

/**
 * Command line that opens `fullPath` at `line`: the configured editor if any,
 * otherwise `$VISUAL` / `$EDITOR` with the calling convention of well-known
 * editors, falling back to `+line file`.
 */
export const buildEditorCommand = (
  fullPath: string,
  line: number,
  editor: EditorConfig | undefined,
  env: NodeJS.ProcessEnv = process.env,
): EditorCommand => {
  if (editor) {
    const args = editor.args ?? ['{file}'];
    return { command: editor.command, args: args.map((arg) => substitute(arg, fullPath, line)) };
  }

  const [command, ...baseArgs] = (env.VISUAL || env.EDITOR || 'vi').trim().split(/\s+/);
  const name = path.basename(command).replace(/\.(exe|cmd)$/i, '');

  if (GOTO_EDITORS.has(name)) {
    return { command, args: [...baseArgs, '--goto', `${fullPath}:${line}`] };
  }
  if (COLON_EDITORS.has(name)) {
    return { command, args: [...baseArgs, `${fullPath}:${line}`] };
  }
  return { command, args: [...baseArgs, `+${line}`, fullPath] };
};

export const launchEditor = (fullPath: string, line: number, editor?: EditorConfig): void => {
  const { command, args } = buildEditorCommand(fullPath, line, editor);
  const result = spawnSync(command, args, { stdio: 'inherit' });
  if (result.error) {
    console.warn(`Could not start editor ${command}: ${result.error.message}`);
  }
};
