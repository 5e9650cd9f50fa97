import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PreconditionFailedError } from '../core/errors.js';
import { deriveToolPaths, verifyToolPaths } from './tools.js';

describe('deriveToolPaths', () => {
  it('joins each tool under the home bin directory', () => {
    expect(deriveToolPaths('/u01/app/19.0.0/grid')).toEqual({
      srvctl: '/u01/app/19.0.0/grid/bin/srvctl',
      crsctl: '/u01/app/19.0.0/grid/bin/crsctl',
      cemutlo: '/u01/app/19.0.0/grid/bin/cemutlo',
      olsnodes: '/u01/app/19.0.0/grid/bin/olsnodes',
    });
  });
});

describe('verifyToolPaths', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(path.join(tmpdir(), 'gridfacts-tools-'));
    await mkdir(path.join(home, 'bin'));
    for (const tool of ['srvctl', 'crsctl', 'cemutlo', 'olsnodes']) {
      const file = path.join(home, 'bin', tool);
      await writeFile(file, '#!/bin/sh\n');
      await chmod(file, 0o755);
    }
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('accepts executable regular files', async () => {
    await expect(verifyToolPaths(deriveToolPaths(home))).resolves.toBeUndefined();
  });

  it('names a missing tool', async () => {
    await rm(path.join(home, 'bin', 'cemutlo'));
    await expect(verifyToolPaths(deriveToolPaths(home))).rejects.toThrow(
      `cemutlo is not executable: ${path.join(home, 'bin', 'cemutlo')}`,
    );
  });

  it('rejects a directory in place of a tool', async () => {
    await rm(path.join(home, 'bin', 'srvctl'));
    await mkdir(path.join(home, 'bin', 'srvctl'));
    await expect(verifyToolPaths(deriveToolPaths(home))).rejects.toBeInstanceOf(
      PreconditionFailedError,
    );
  });
});
