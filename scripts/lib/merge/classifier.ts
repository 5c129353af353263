import fs from 'fs-extra';

import { listXmlFiles } from '../io.js';
import { ConfigurationError } from './errors.js';
import type { ConflictPolicy, DirectoryState, OperationMode } from './types.js';

/** A directory counts as present when it holds at least one `*.xml` file anywhere below it. */
export async function classifyDirectory(dirPath: string): Promise<DirectoryState> {
  if (!(await fs.pathExists(dirPath))) {
    return 'absent';
  }

  const stat = await fs.stat(dirPath);
  if (!stat.isDirectory()) {
    return 'absent';
  }

  const files = await listXmlFiles(dirPath);
  return files.length > 0 ? 'present' : 'absent';
}

export interface ModeInput {
  source: DirectoryState;
  target: DirectoryState;
  policy: ConflictPolicy;
  sourcePath?: string;
  targetPath?: string;
}

export function selectMode(input: ModeInput): OperationMode {
  if (input.source === 'absent') {
    throw new ConfigurationError(input.sourcePath ?? '', 'source tree has no XML files');
  }

  if (input.target === 'absent') {
    return 'new';
  }

  if (input.policy === 'new') {
    throw new ConfigurationError(
      input.targetPath ?? '',
      "target tree already exists; policy 'new' would overwrite it"
    );
  }

  return input.policy;
}
