import { realpath } from "node:fs/promises";
import {
  compareScores,
  essence,
  formatMediaRange,
  isSameEssence,
  rankCandidates,
  UnsupportedMediaTypeError,
  type MediaType,
} from "@operator/media-type";
import { getErrorMessage, type Logger } from "@operator/utils";
import {
  compareSpecificity,
  ContentDirectoryScan,
} from "./content-directory";
import { ContentIndexBuilder, type ContentIndex } from "./content-index";
import {
  AmbiguousContentError,
  ForbiddenError,
  NotFoundError,
} from "./errors";
import { isHiddenRoute, normalizeRoute } from "./route";
import type { ContentSource, ResolveOptions, Specificity } from "./types";

export interface ContentResolverOptions {
  contentDirectory: string;
  logger: Logger;
}

interface MediaTypeGroup {
  mediaType: MediaType;
  sources: ContentSource[];
}

function groupByMediaType(sources: ContentSource[]): MediaTypeGroup[] {
  const groups: MediaTypeGroup[] = [];
  for (const source of sources) {
    const group = groups.find((candidate) =>
      isSameEssence(candidate.mediaType, source.mediaType),
    );
    if (group) {
      group.sources.push(source);
    } else {
      groups.push({ mediaType: source.mediaType, sources: [source] });
    }
  }
  return groups;
}

function bestSpecificity(group: MediaTypeGroup): Specificity {
  return group.sources.reduce<Specificity>(
    (best, source) =>
      compareSpecificity(source.specificity, best) < 0
        ? source.specificity
        : best,
    "index",
  );
}

/**
 * Of groups that negotiate equally, those holding the most specific source
 */
function mostSpecificGroups(groups: MediaTypeGroup[]): MediaTypeGroup[] {
  const ranked = groups.map((group) => ({
    group,
    specificity: bestSpecificity(group),
  }));
  const best = ranked.reduce<Specificity>(
    (current, entry) =>
      compareSpecificity(entry.specificity, current) < 0
        ? entry.specificity
        : current,
    "index",
  );
  return ranked
    .filter((entry) => entry.specificity === best)
    .map((entry) => entry.group);
}

/**
 * Maps routes to content sources in a content directory
 */
export class ContentResolver {
  private readonly contentDirectory: string;
  private readonly logger: Logger;

  /**
   * Create a resolver for a content directory
   */
  public static createFresh(options: ContentResolverOptions): ContentResolver {
    return new ContentResolver(options);
  }

  private constructor(options: ContentResolverOptions) {
    this.contentDirectory = options.contentDirectory;
    this.logger = options.logger.child("ContentResolver");
  }

  /**
   * Tree of every visible route, read fresh on each call
   */
  public async buildIndex(): Promise<ContentIndex> {
    return new ContentIndexBuilder(
      this.contentDirectory,
      await this.realContentDirectory("/"),
      this.logger,
    ).build();
  }

  /**
   * Every candidate source for a route, before negotiation
   */
  public async listCandidates(route: string): Promise<ContentSource[]> {
    const normalized = normalizeRoute(route);
    return new ContentDirectoryScan(
      this.contentDirectory,
      await this.realContentDirectory(normalized),
      normalized,
      this.logger,
    ).run();
  }

  /**
   * Whether a route has at least one candidate, hidden content included
   */
  public async hasCandidates(route: string): Promise<boolean> {
    const candidates = await this.listCandidates(route);
    return candidates.length > 0;
  }

  /**
   * Select the single source that serves a route
   */
  public async resolve(
    route: string,
    options: ResolveOptions = {},
  ): Promise<ContentSource> {
    const normalized = normalizeRoute(route);
    const internal = options.internal ?? false;

    if (!internal && isHiddenRoute(normalized)) {
      throw new NotFoundError(normalized);
    }

    const candidates = (await this.listCandidates(normalized)).filter(
      (candidate) => internal || !candidate.hidden,
    );
    if (candidates.length === 0) {
      throw new NotFoundError(normalized);
    }

    const groups = mostSpecificGroups(
      this.selectMediaTypeGroups(
        normalized,
        groupByMediaType(candidates),
        options,
      ),
    );

    const [group, ...otherGroups] = groups;
    if (group === undefined) {
      throw new NotFoundError(normalized);
    }
    if (otherGroups.length > 0) {
      const specificity = bestSpecificity(group);
      throw new AmbiguousContentError(
        normalized,
        groups.flatMap((g) =>
          g.sources
            .filter((source) => source.specificity === specificity)
            .map((source) => source.relativePath),
        ),
      );
    }

    const mostSpecific = [...group.sources].sort((a, b) =>
      compareSpecificity(a.specificity, b.specificity),
    );
    const [selected, runnerUp] = mostSpecific;
    if (selected === undefined) {
      throw new NotFoundError(normalized);
    }
    if (
      runnerUp !== undefined &&
      compareSpecificity(selected.specificity, runnerUp.specificity) === 0
    ) {
      throw new AmbiguousContentError(
        normalized,
        mostSpecific
          .filter((source) => source.specificity === selected.specificity)
          .map((source) => source.relativePath),
      );
    }

    this.logger.debug(
      `Resolved ${normalized} to ${selected.relativePath} (${essence(selected.mediaType)}, ${selected.strategy})`,
    );
    return selected;
  }

  /**
   * The media type groups sharing the best rank
   */
  private selectMediaTypeGroups(
    route: string,
    groups: MediaTypeGroup[],
    options: ResolveOptions,
  ): MediaTypeGroup[] {
    if (options.preferences === undefined) {
      return groups;
    }

    const ranked = rankCandidates(groups, options.preferences);
    const [best] = ranked;
    if (best === undefined) {
      this.logger.debug(`No acceptable media type for ${route}`);
      throw new UnsupportedMediaTypeError(
        groups.map((group) => essence(group.mediaType)),
        options.preferences.map(formatMediaRange),
      );
    }

    return ranked
      .filter((entry) => compareScores(entry.score, best.score) === 0)
      .map((entry) => entry.candidate);
  }

  private async realContentDirectory(route: string): Promise<string> {
    try {
      return await realpath(this.contentDirectory);
    } catch (error) {
      throw new ForbiddenError(
        route,
        this.contentDirectory,
        `content directory is not accessible (${getErrorMessage(error)})`,
        error,
      );
    }
  }
}
