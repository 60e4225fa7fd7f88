import {
  chmod,
  mkdir,
  mkdtemp,
  realpath,
  rm,
  symlink,
  writeFile,
} from "fs/promises";
import { dirname, join } from "path";
import { tmpdir } from "os";

/**
 * A file to place in a test content directory. Strings are written as-is
 * with mode 0644.
 */
export type FixtureEntry =
  | string
  | { content: string; mode?: number }
  | { symlinkTo: string };

export interface ContentDirectoryFixture {
  /** Absolute, symlink-free path of the directory */
  root: string;
  /** Remove the directory and everything in it */
  cleanup(): Promise<void>;
}

/**
 * An executable `/bin/sh` script with the given body
 */
export function shellScript(body: string): { content: string; mode: number } {
  return { content: `#!/bin/sh\n${body}\n`, mode: 0o755 };
}

/**
 * Create a temporary content directory populated with the given files.
 * Keys are paths relative to the directory root.
 */
export async function createContentDirectory(
  entries: Record<string, FixtureEntry>,
): Promise<ContentDirectoryFixture> {
  const created = await mkdtemp(join(tmpdir(), "operator-content-"));
  const root = await realpath(created);

  for (const [relativePath, entry] of Object.entries(entries)) {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });

    if (typeof entry === "string") {
      await writeFile(path, entry);
    } else if ("symlinkTo" in entry) {
      await symlink(entry.symlinkTo, path);
    } else {
      await writeFile(path, entry.content);
      await chmod(path, entry.mode ?? 0o644);
    }
  }

  return {
    root,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
