import { promises as fs, type Stats } from 'node:fs';
import * as path from 'node:path';

export function isEnoent(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isEnoent(e)) return null;
    throw e;
  }
}

export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (e) {
    if (isEnoent(e)) return null;
    throw e;
  }
}

/** Reads a file as UTF-8, throwing a TypeError on invalid byte sequences. */
export async function readUtf8Strict(filePath: string): Promise<string> {
  const bytes = await fs.readFile(filePath);
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/** Resolves symlinks on both sides before comparing, so a link cannot escape root. */
export async function isContainedIn(root: string, target: string): Promise<boolean> {
  try {
    const realRoot = await fs.realpath(root);
    const realTarget = await fs.realpath(target);
    const rel = path.relative(realRoot, realTarget);
    return rel !== '' && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
  } catch {
    return false;
  }
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, content, 'utf-8');
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}
