import fs from 'fs';
import os from 'os';
import path from 'path';
import { TrackOptionsError } from '../errors';
import { loadViewerConfig, validateTrackOptions } from './loader';

describe('loadViewerConfig', () => {
  let scratch: string;

  beforeEach(() => {
    scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'allocview-config-'));
  });

  afterEach(() => {
    fs.rmSync(scratch, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown): string => {
    const file = path.join(scratch, 'viewer.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  };

  test('reads the packaged defaults', async () => {
    const config = await loadViewerConfig();

    expect(config.palette).toEqual(['blue', 'cyan', 'green', 'red', 'magenta']);
    expect(config.labelColors).toMatchObject({ '@node': 'yellow', '@allocview/analyzer': 'red' });
    expect(config.maxPageSize).toBeUndefined();
  });

  test('layers a user file over the defaults', async () => {
    const configPath = writeConfig({
      maxPageSize: 12,
      labelColors: { '@app': 'green' },
      editor: { command: 'nvim', args: ['+{line}', '{file}'] },
    });

    const config = await loadViewerConfig({ configPath });

    expect(config.maxPageSize).toBe(12);
    expect(config.palette).toEqual(['blue', 'cyan', 'green', 'red', 'magenta']);
    expect(config.labelColors).toMatchObject({ '@node': 'yellow', '@app': 'green' });
    expect(config.editor).toEqual({ command: 'nvim', args: ['+{line}', '{file}'] });
  });

  test('rejects files that do not match the schema', async () => {
    const configPath = writeConfig({ palette: ['purple'] });

    await expect(loadViewerConfig({ configPath })).rejects.toThrow(
      `Viewer config at ${configPath} failed validation:\n/palette/0 must be equal to one of the allowed values`,
    );
  });

  test('rejects malformed JSON', async () => {
    const configPath = path.join(scratch, 'broken.json');
    fs.writeFileSync(configPath, '{ "maxPageSize": ');

    await expect(loadViewerConfig({ configPath })).rejects.toThrow(`Failed to parse JSON in ${configPath}`);
  });
});

describe('validateTrackOptions', () => {
  test('fills in defaults', async () => {
    await expect(validateTrackOptions()).resolves.toEqual({ sampleRate: 1, warmup: true });
  });

  test('accepts option values given as text', async () => {
    await expect(validateTrackOptions({ sampleRate: '0.5', pageSize: '10', warmup: 'false' })).resolves.toEqual({
      sampleRate: 0.5,
      pageSize: 10,
      warmup: false,
    });
  });

  test('does not modify its input', async () => {
    const input = { sampleRate: 0.25 };
    await validateTrackOptions(input);
    expect(input).toEqual({ sampleRate: 0.25 });
  });

  test('rejects unknown option names', async () => {
    await expect(validateTrackOptions({ sampel: 1 })).rejects.toThrow(
      new TrackOptionsError('Invalid track options: unknown option `sampel`'),
    );
  });

  test('rejects out-of-range and ill-typed values', async () => {
    await expect(validateTrackOptions({ sampleRate: 0 })).rejects.toThrow(
      'Invalid track options: option `sampleRate` must be > 0',
    );
    await expect(validateTrackOptions({ sampleRate: 2 })).rejects.toThrow(
      'Invalid track options: option `sampleRate` must be <= 1',
    );
    await expect(validateTrackOptions({ pageSize: 2.5 })).rejects.toThrow(
      'Invalid track options: option `pageSize` must be integer',
    );
    await expect(validateTrackOptions({ warmup: 'sometimes' })).rejects.toBeInstanceOf(TrackOptionsError);
  });
});
