/**
 * WorkspaceService Implementation
 *
 * Each user gets a working directory the CLI runs in:
 *   <workspaceRoot>/claude_user_<userId>
 * The user id is reduced to [A-Za-z0-9_-] so it cannot leave the root.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { UserId } from '../types/index.js';

export interface WorkspaceService {
  resolve(userId: UserId): string;
  prepare(userId: UserId): Promise<string>;
}

const MAX_DIR_ID_LENGTH = 64;

export function toDirectoryId(userId: UserId): string {
  const cleaned = String(userId)
    .replace(/[^A-Za-z0-9_-]/g, '_')
    .slice(0, MAX_DIR_ID_LENGTH);
  return cleaned === '' ? '_' : cleaned;
}

export function createWorkspaceService(deps: {
  workspaceRoot: string;
  mkdirFn?: (path: string) => Promise<unknown>;
}): WorkspaceService {
  const makeDir =
    deps.mkdirFn ?? ((path: string) => mkdir(path, { recursive: true }));

  const resolve = (userId: UserId): string =>
    join(deps.workspaceRoot, `claude_user_${toDirectoryId(userId)}`);

  return {
    resolve,

    async prepare(userId: UserId): Promise<string> {
      const directory = resolve(userId);
      await makeDir(directory);
      return directory;
    },
  };
}
