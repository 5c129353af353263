import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
}

export interface CliFlags extends RunOptions {
  yes: boolean;
  rest: string[];
}

const BARE_FLAGS = new Set(['--check', '--yes']);

export function getRunOptions(argv: string[]): CliFlags {
  return {
    check: argv.includes('--check'),
    yes: argv.includes('--yes'),
    rest: argv.filter((arg) => !BARE_FLAGS.has(arg))
  };
}

export function toPosixRelative(filePath: string, from: string = process.cwd()): string {
  return path.relative(from, filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export interface WriteResult {
  changed: boolean;
  wrote: boolean;
}

/**
 * Writes through a temporary sibling that is renamed into place, so the
 * target is either the previous content or the complete new one.
 */
export async function writeTextFile(
  filePath: string,
  content: string,
  options: RunOptions
): Promise<WriteResult> {
  const next = stableText(content);
  let current: string | null = null;

  if (await fs.pathExists(filePath)) {
    current = await fs.readFile(filePath, 'utf8');
  }

  if (current === next) {
    return { changed: false, wrote: false };
  }

  if (options.check) {
    return { changed: true, wrote: false };
  }

  await ensureParentDir(filePath);
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, next, 'utf8');
    await fs.move(tempPath, filePath, { overwrite: true });
  } finally {
    await fs.remove(tempPath);
  }
  return { changed: true, wrote: true };
}

export async function listXmlFiles(rootDir: string): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg('**/*.xml', {
    cwd: rootDir,
    dot: false,
    onlyFiles: true
  });

  return files.sort((a, b) => a.localeCompare(b));
}
