import { ReferenceParseError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Credentials, TagLister } from "./registry.js";
import { resolveNewerVersions } from "./resolve.js";
import { type ImageRef, parseImageRef } from "./util/parseImage.js";
import { Version } from "./version.js";

export type CheckResult =
  | { status: "up-to-date"; reference: string; image: ImageRef; current: Version }
  | { status: "outdated"; reference: string; image: ImageRef; current: Version; newer: Version[] }
  | { status: "failed"; reference: string; error: Error };

export type BatchSummary = {
  results: CheckResult[];
  newerFound: boolean;
  failed: number;
};

export type CheckDeps = {
  lister: TagLister;
  credentials: Credentials;
  logger: Logger;
  /** Tag assumed for references that carry none; without it such references fail. */
  defaultTag?: string | null;
};

const toError = (err: unknown) => (err instanceof Error ? err : new Error(errorMessage(err)));

export const checkImage = async (reference: string, deps: CheckDeps): Promise<CheckResult> => {
  const log = deps.logger.child({ image: reference });
  log.info(`Checking image: ${reference}`);

  try {
    const parsed = parseImageRef(reference);
    const tag = parsed.tag ?? deps.defaultTag ?? null;
    if (tag === null) {
      throw new ReferenceParseError(parsed.raw, "No tag found on image reference");
    }
    const image: ImageRef = { ...parsed, tag };
    const current = Version.parse(tag);

    const tags = await deps.lister.listTags(image, deps.credentials);
    const newer = resolveNewerVersions(current, tags, log);

    if (newer.length === 0) {
      log.info(`No newer image versions found for ${reference}.`);
      return { status: "up-to-date", reference, image, current };
    }
    log.info({ newer: newer.map((version) => version.original) }, `Newer image versions available for ${reference}`);
    return { status: "outdated", reference, image, current, newer };
  } catch (err) {
    const error = toError(err);
    log.error({ err: error }, `Failed to check ${reference}: ${error.message}`);
    return { status: "failed", reference, error };
  }
};

export const checkImages = async (
  references: string[],
  deps: CheckDeps,
  onResult?: (result: CheckResult) => void
): Promise<BatchSummary> => {
  const results: CheckResult[] = [];
  for (const reference of references) {
    const result = await checkImage(reference, deps);
    onResult?.(result);
    results.push(result);
  }
  return {
    results,
    newerFound: results.some((result) => result.status === "outdated"),
    failed: results.filter((result) => result.status === "failed").length
  };
};

export const exitCodeFor = (summary: BatchSummary) => {
  return summary.newerFound || summary.failed > 0 ? 1 : 0;
};
