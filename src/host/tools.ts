import { access, constants, stat } from 'node:fs/promises';
import path from 'node:path';

import { TOOL_NAMES } from '../config/defaults.js';
import type { ToolName } from '../config/defaults.js';
import { PreconditionFailedError } from '../core/errors.js';

export type ToolPaths = Readonly<Record<ToolName, string>>;

export function deriveToolPaths(home: string): ToolPaths {
  return {
    srvctl: path.join(home, 'bin', 'srvctl'),
    crsctl: path.join(home, 'bin', 'crsctl'),
    cemutlo: path.join(home, 'bin', 'cemutlo'),
    olsnodes: path.join(home, 'bin', 'olsnodes'),
  };
}

/**
 * @throws PreconditionFailedError naming the first tool that is not an
 *   executable regular file
 */
export async function verifyToolPaths(tools: ToolPaths): Promise<void> {
  for (const name of TOOL_NAMES) {
    const file = tools[name];
    try {
      const info = await stat(file);
      if (!info.isFile()) {
        throw new PreconditionFailedError(`${name} is not a regular file: ${file}`);
      }
      await access(file, constants.X_OK);
    } catch (err) {
      if (err instanceof PreconditionFailedError) throw err;
      throw new PreconditionFailedError(`${name} is not executable: ${file}`);
    }
  }
}
