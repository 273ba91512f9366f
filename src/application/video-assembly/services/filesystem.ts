import { access, rm } from 'node:fs/promises';

import type { JobWorkspace } from '@domain/video-assembly/index.js';

export async function fileExists(filePath: string): Promise<boolean> {
  return access(filePath).then(() => true, () => false);
}

export async function removeScratchDirectory(workspace: JobWorkspace): Promise<void> {
  await rm(workspace.root, { recursive: true, force: true });
}
