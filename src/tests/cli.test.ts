import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main, USAGE } from '@/cli';
import { twoScenes, withLines } from './samples';

describe('aup2-layer cli', () => {
  let dir: string;
  let input: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'aup2-layer-'));
    input = path.join(dir, 'demo.aup2');
    await fs.writeFile(input, twoScenes, 'utf8');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the transformed project into a new directory', async () => {
    const output = path.join(dir, 'out', 'nested', 'result.aup2');
    const code = await main([input, output, '--scene', '0', '--adjust-frames']);

    expect(code).toBe(0);
    expect(await fs.readFile(output, 'utf8')).toBe(withLines(twoScenes, {
      19: 'frame=162,242',
      24: 'layer=0',
      26: 'frame=81,161',
    }));
    expect(console.log).toHaveBeenCalledWith('Moved 3 object(s) in scene 0 to layer 0.');
    expect(console.log).toHaveBeenCalledWith('Compacted 1 group(s), 2 object(s) moved.');
    expect(console.log).toHaveBeenCalledWith('Layers: 0:2 1:1 2:1 3:1 -> 0:3 2:1 3:1');
  });

  it('prints warnings but stays quiet otherwise', async () => {
    const output = path.join(dir, 'result.txt');
    const code = await main([input, output, '--scene', '0', '--txt', '--quiet']);

    expect(code).toBe(0);
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('warning: Scene 0, layer 0: objects 0 and 2 overlap.');
    expect(await fs.readFile(output, 'utf8')).toContain('  object 2  layer=0  frame=0..80  focus\n');
  });

  it('rejects inputs that are not .aup2 or .json', async () => {
    const other = path.join(dir, 'demo.txt');
    const code = await main([other, path.join(dir, 'x.aup2')]);
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`error: Input must be an .aup2 or .json file: ${other}`);
  });

  it('refuses scene and layer values that are not plain integers', async () => {
    const output = path.join(dir, 'never.aup2');

    expect(await main([input, output, '--scene='])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('error: Invalid sceneId: must be an integer, got ""');

    expect(await main([input, output, '--layer', '0x5'])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('error: Invalid targetLayer: must be an integer, got "0x5"');

    expect(await main([input, output, '--layer', '1e1'])).toBe(1);
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('turns a JSON dump back into an .aup2 file', async () => {
    const dump = path.join(dir, 'demo.json');
    expect(await main([input, dump, '--keep-layers', '--json'])).toBe(0);

    const output = path.join(dir, 'back.aup2');
    expect(await main([dump, output, '--keep-layers'])).toBe(0);
    expect(await fs.readFile(output, 'utf8')).toBe(twoScenes.replace(/\n/g, '\r\n'));
  });

  it('reports invalid layers without writing output', async () => {
    const output = path.join(dir, 'never.aup2');
    const code = await main([input, output, '--layer=-1']);
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('error: Invalid targetLayer: must be zero or greater');
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('fails on a missing input file', async () => {
    const code = await main([path.join(dir, 'missing.aup2'), path.join(dir, 'x.aup2')]);
    expect(code).toBe(1);
  });

  it('prints usage for bad invocations', async () => {
    expect(await main([])).toBe(2);
    expect(await main([input, 'a.aup2', '--txt', '--json'])).toBe(2);
    expect(await main(['--bogus'])).toBe(2);
    expect(console.error).toHaveBeenCalledWith(USAGE);
    expect(await main(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });
});
