import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExecutionError } from '@gcmrun/utils';
import {
  createRestartArchive,
  extractRestartArchive,
  listRestartStateFiles,
} from '../../src/run/restart-archive.js';

describe('restart archives', () => {
  let dir: string;
  let staging: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gcmrun-restart-'));
    staging = join(dir, 'RESTART');
    mkdirSync(staging);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists only restart state files, sorted', async () => {
    writeFileSync(join(staging, 'ocean.res.nc'), 'o');
    writeFileSync(join(staging, 'atmos.res'), 'a');
    writeFileSync(join(staging, 'notes.txt'), 'n');
    mkdirSync(join(staging, 'nested.res'));

    await expect(listRestartStateFiles(staging)).resolves.toEqual(['atmos.res', 'ocean.res.nc']);
  });

  it('packs state files and unpacks them elsewhere', async () => {
    writeFileSync(join(staging, 'atmos.res.nc'), 'state 4');
    writeFileSync(join(staging, 'coupler.res'), 'clock');
    writeFileSync(join(staging, 'log.out'), 'ignored');
    const archive = join(dir, 'res_4.tar');

    const packed = await createRestartArchive(staging, archive);

    expect(packed).toEqual(['atmos.res.nc', 'coupler.res']);
    expect(existsSync(`${archive}.partial`)).toBe(false);

    const dest = join(dir, 'INPUT');
    await extractRestartArchive(archive, dest);

    expect(readdirSync(dest).sort()).toEqual(['atmos.res.nc', 'coupler.res']);
    expect(readFileSync(join(dest, 'atmos.res.nc'), 'utf8')).toBe('state 4');
  });

  it('refuses to write an archive with no state files', async () => {
    writeFileSync(join(staging, 'log.out'), 'x');
    const archive = join(dir, 'res_1.tar');

    await expect(createRestartArchive(staging, archive)).rejects.toThrow(ExecutionError);
    expect(existsSync(archive)).toBe(false);
  });
});
