import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { open } from 'node:fs/promises';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { IOError } from '../errors';
import { Sentinel2TileMap } from './sentinel2TileMap';

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, open: vi.fn(actual.open) };
});

// Opens for real, then makes the next close (and optionally write) fail after releasing the fd.
function failingHandle(options: { write?: boolean } = {}) {
  vi.mocked(open).mockImplementationOnce(async (file, flags) => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    const handle = await actual.open(file, flags);
    const close = handle.close.bind(handle);
    vi.spyOn(handle, 'close').mockImplementationOnce(async () => {
      await close();
      throw new Error('EIO: close failed');
    });
    if (options.write) vi.spyOn(handle, 'write').mockRejectedValueOnce(new Error('ENOSPC: disk full'));
    return handle;
  });
}

describe('TileMap.write handle release', () => {
  let dir: string;
  let map: Sentinel2TileMap;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tilemap-close-'));
    map = new Sentinel2TileMap({ verbose: false, cornerConvention: 'literal' });
    const seed = path.join(dir, 'in.tiles');
    fs.writeFileSync(seed, '31TGM x=2.0,y=40.0,w=1.0,h=1.0\n');
    await map.readFile(seed);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports a failed close as IOError', async () => {
    failingHandle();
    const file = path.join(dir, 'out.tiles');
    const error = await map.write(file).then(() => undefined, (e: unknown) => e);
    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ message: `Failed to close tile map (EIO: close failed): ${file}`, path: file });
  });

  it('keeps the write failure when close fails too', async () => {
    failingHandle({ write: true });
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = path.join(dir, 'out.tiles');
    const error = await map.write(file).then(() => undefined, (e: unknown) => e);
    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ message: `Failed to write tile map (ENOSPC: disk full): ${file}`, path: file });
    expect(logged).toHaveBeenCalledWith(`[TILEMAP] Failed to close ${file} after write error: EIO: close failed`);
  });
});
