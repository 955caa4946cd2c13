import { promises as fsp } from 'fs';
import { dirname, join } from 'path';

export async function readJson(p: string): Promise<unknown> {
  const buf = await fsp.readFile(p, 'utf8');
  return JSON.parse(buf);
}

export async function writeJson(p: string, data: unknown) {
  await fsp.mkdir(dirname(p), { recursive: true });
  await fsp.writeFile(p, JSON.stringify(data, null, '\t') + '\n', 'utf8');
}

export async function exists(p: string) {
  try {
    await fsp.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await fsp.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isDirEmpty(p: string) {
  const entries = await fsp.readdir(p);
  return entries.length === 0;
}

export async function removeIfExists(p: string) {
  await makeWritable(p);
  await fsp.rm(p, { recursive: true, force: true });
}

export async function copyDir(src: string, dest: string) {
  await fsp.mkdir(dirname(dest), { recursive: true });
  await fsp.cp(src, dest, { recursive: true });
}

/**
 * Moves a directory, falling back to copy + delete across devices.
 */
export async function moveDir(src: string, dest: string) {
  await fsp.mkdir(dirname(dest), { recursive: true });
  try {
    await fsp.rename(src, dest);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) { throw err; }
    await fsp.cp(src, dest, { recursive: true });
    await fsp.rm(src, { recursive: true, force: true });
  }
}

async function walkFiles(root: string, visit: (file: string) => Promise<void>) {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const p = join(root, entry.name);
    if (entry.isDirectory()) {
      await walkFiles(p, visit);
    } else if (entry.isFile()) {
      await visit(p);
    }
  }
}

export async function makeReadOnly(root: string) {
  await walkFiles(root, (file) => fsp.chmod(file, 0o444));
}

/** Undoes {@link makeReadOnly}; a missing path is left alone. */
export async function makeWritable(root: string) {
  if (!(await isDirectory(root))) { return; }
  await walkFiles(root, (file) => fsp.chmod(file, 0o644));
}
