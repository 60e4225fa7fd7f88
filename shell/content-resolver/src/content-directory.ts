import type { Stats } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { getErrorMessage, type Logger } from "@operator/utils";
import { ForbiddenError } from "./errors";
import { parseContentFileName } from "./naming";
import { isHiddenSegment, routeSegments } from "./route";
import type { ContentSource, Specificity } from "./types";

const INDEX_NAME = "index";

const SPECIFICITY_RANK: Record<Specificity, number> = {
  exact: 0,
  annotated: 1,
  index: 2,
};

export function compareSpecificity(a: Specificity, b: Specificity): number {
  return SPECIFICITY_RANK[a] - SPECIFICITY_RANK[b];
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
    ? error.code
    : undefined;
}

/**
 * Candidate enumeration for one route. Reads the file system fresh on every
 * call; nothing is cached between requests.
 */
export class ContentDirectoryScan {
  private readonly candidates = new Map<string, ContentSource>();

  constructor(
    private readonly root: string,
    private readonly realRoot: string,
    private readonly route: string,
    private readonly logger: Logger,
  ) {}

  public async run(): Promise<ContentSource[]> {
    const segments = routeSegments(this.route);
    const last = segments.pop();

    if (last === undefined) {
      await this.addIndexCandidates(this.root);
      return [...this.candidates.values()];
    }

    const parent = join(this.root, ...segments);
    for (const entry of await this.readDirectory(parent)) {
      if (entry !== last && !entry.startsWith(`${last}.`)) continue;

      const path = join(parent, entry);
      const stats = await this.inspect(path);

      if (stats.isDirectory()) {
        if (entry === last) {
          await this.addIndexCandidates(path);
        }
        continue;
      }

      if (entry === last) {
        this.addFile(path, entry, stats, "exact");
      } else {
        this.addFile(path, entry, stats, "annotated", last);
      }
    }

    return [...this.candidates.values()];
  }

  private async addIndexCandidates(directory: string): Promise<void> {
    for (const entry of await this.readDirectory(directory)) {
      if (entry !== INDEX_NAME && !entry.startsWith(`${INDEX_NAME}.`)) {
        continue;
      }
      const path = join(directory, entry);
      const stats = await this.inspect(path);
      if (!stats.isDirectory()) {
        this.addFile(path, entry, stats, "index", INDEX_NAME);
      }
    }
  }

  /**
   * Add a file when its name follows the grammar and, for annotated and
   * index candidates, its logical name is the expected one
   */
  private addFile(
    path: string,
    entry: string,
    stats: Stats,
    specificity: Specificity,
    logicalName?: string,
  ): void {
    if (!stats.isFile()) return;

    const executable = (stats.mode & 0o111) !== 0;
    const parsed = parseContentFileName(entry, executable);
    const relativePath = relative(this.root, path).split(sep).join("/");

    if (!parsed.valid) {
      this.logger.warn(`Ignoring ${relativePath}: ${parsed.reason}`);
      return;
    }
    if (logicalName !== undefined && parsed.name.logicalName !== logicalName) {
      return;
    }

    const existing = this.candidates.get(path);
    if (existing && compareSpecificity(existing.specificity, specificity) <= 0) {
      return;
    }

    this.candidates.set(path, {
      absolutePath: path,
      relativePath,
      route: this.route,
      logicalName: parsed.name.logicalName,
      mediaType: parsed.name.mediaType,
      strategy: parsed.name.strategy,
      specificity,
      hidden: relativePath.split("/").some(isHiddenSegment),
    });
  }

  private async readDirectory(directory: string): Promise<string[]> {
    try {
      const entries = await readdir(directory);
      return entries.sort();
    } catch (error) {
      const code = errorCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return [];
      }
      throw new ForbiddenError(
        this.route,
        directory,
        `cannot read directory (${code ?? getErrorMessage(error)})`,
        error,
      );
    }
  }

  /**
   * Stat a path, following symlinks, and make sure it stays inside the
   * content directory
   */
  private async inspect(path: string): Promise<Stats> {
    let stats: Stats;
    let target: string;
    try {
      stats = await stat(path);
      target = await realpath(path);
    } catch (error) {
      throw new ForbiddenError(
        this.route,
        path,
        `cannot inspect ${relative(this.root, path)} (${errorCode(error) ?? getErrorMessage(error)})`,
        error,
      );
    }

    if (target !== this.realRoot && !target.startsWith(this.realRoot + sep)) {
      throw new ForbiddenError(
        this.route,
        path,
        `${relative(this.root, path)} resolves outside the content directory`,
      );
    }
    return stats;
  }
}
