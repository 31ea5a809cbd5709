/**
 * Atomic, symlink-refusing file writes for report output.
 *
 * The target is checked with lstat, the data goes to a uniquely named temp
 * file in the same directory, and the temp file is renamed over the target.
 */

import { writeFile, rename, unlink, mkdir } from "fs/promises";
import { lstatSync } from "fs";
import { dirname, basename, join } from "path";

export interface SafeWriteOptions {
  /** POSIX permissions for the created file. Defaults to 0o600. */
  mode?: number;
}

function assertNotSymlink(path: string): void {
  try {
    if (lstatSync(path).isSymbolicLink()) {
      throw new Error(`Refusing to write to symlink: ${path}`);
    }
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code !== "ENOENT") {
      throw err;
    }
  }
}

export async function writeFileAtomicNoFollow(
  path: string,
  data: string | Buffer,
  opts: SafeWriteOptions = {}
): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true, mode: 0o700 });
  assertNotSymlink(path);

  const tempPath = join(dir, `.${basename(path)}.tmp-${String(process.pid)}-${String(Date.now())}`);

  try {
    await writeFile(tempPath, data, { mode: opts.mode ?? 0o600 });
    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch(() => undefined);
    throw err;
  }
}
