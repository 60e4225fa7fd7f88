import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { getErrorMessage, type Logger } from "@operator/utils";
import { parseContentFileName } from "./naming";
import { isHiddenSegment } from "./route";

/**
 * Tree of the routes in a content directory. Files map their logical name to
 * their route; directories appear under their name with a trailing `/`.
 *
 * @example
 * ```json
 * { "home": "/home", "docs/": { "index": "/docs/index" } }
 * ```
 */
export interface ContentIndex {
  [name: string]: string | ContentIndex;
}

/**
 * Walks a content directory into a {@link ContentIndex}. Hidden entries,
 * names outside the file-name grammar and entries that cannot be read are
 * left out; symlinked directories are not descended into.
 */
export class ContentIndexBuilder {
  constructor(
    private readonly root: string,
    private readonly realRoot: string,
    private readonly logger: Logger,
  ) {}

  public build(): Promise<ContentIndex> {
    return this.walk(this.root, "");
  }

  private async walk(directory: string, route: string): Promise<ContentIndex> {
    const index: ContentIndex = {};

    for (const entry of await this.readDirectory(directory)) {
      if (isHiddenSegment(entry.name)) continue;
      const path = join(directory, entry.name);

      if (entry.isDirectory()) {
        const branch = await this.walk(path, `${route}/${entry.name}`);
        if (Object.keys(branch).length > 0) {
          index[`${entry.name}/`] = branch;
        }
        continue;
      }

      const executable = await this.executableFile(path);
      if (executable === undefined) continue;

      const parsed = parseContentFileName(entry.name, executable);
      if (parsed.valid) {
        index[parsed.name.logicalName] = `${route}/${parsed.name.logicalName}`;
      }
    }

    return index;
  }

  private async readDirectory(directory: string): Promise<Dirent[]> {
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries.sort((a, b) => (a.name < b.name ? -1 : 1));
    } catch (error) {
      this.leaveOut(directory, error);
      return [];
    }
  }

  /**
   * Whether a regular file inside the content directory is executable;
   * undefined for anything else
   */
  private async executableFile(path: string): Promise<boolean | undefined> {
    try {
      const stats = await stat(path);
      const target = await realpath(path);
      if (!target.startsWith(this.realRoot + sep) || !stats.isFile()) {
        return undefined;
      }
      return (stats.mode & 0o111) !== 0;
    } catch (error) {
      this.leaveOut(path, error);
      return undefined;
    }
  }

  private leaveOut(path: string, error: unknown): void {
    this.logger.debug(
      `Leaving ${relative(this.root, path) || "."} out of the content index: ${getErrorMessage(error)}`,
    );
  }
}
