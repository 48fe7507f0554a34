import type { Logger } from "./logger.js";
import { parseVersion, type Version } from "./version.js";

/**
 * Versions among `tags` that are newer than `current` and not prereleases,
 * ascending. Tags that are not `x.y.z[-variant]` (`latest`, `stable`, commit
 * hashes) are skipped. Equal triples keep the order they were listed in.
 */
export const resolveNewerVersions = (current: Version, tags: Iterable<string>, logger?: Logger): Version[] => {
  const seen = new Set<string>();
  const candidates: Version[] = [];

  for (const tag of tags) {
    if (seen.has(tag)) continue;
    seen.add(tag);

    const result = parseVersion(tag);
    if (!result.ok) {
      logger?.debug({ tag }, `Could not parse image tag as a version: ${tag} - skipping`);
      continue;
    }
    const version = result.version;
    if (version.isNewerThan(current) && !version.isPrerelease()) {
      candidates.push(version);
    }
  }

  return candidates.sort((a, b) => a.compare(b));
};
