import { ReferenceParseError } from "../errors.js";

export type ImageRef = {
  raw: string;
  registry: string;
  repository: string;
  tag: string | null;
  digest: string | null;
};

export const DEFAULT_REGISTRY = "registry-1.docker.io";

// Names that resolve to Docker Hub but are not its registry API host.
const DOCKER_HUB_ALIASES = new Set(["docker.io", "index.docker.io"]);

const ensureDockerHubRepo = (repository: string) => {
  if (repository.includes("/")) return repository;
  return `library/${repository}`;
};

/**
 * Whether the last colon of a reference delimits a tag.
 *
 * The colon has to come after the last slash. A reference with more than one
 * colon is read as `host:port/name:...` and its last colon as part of the
 * registry port, so `localhost:5000/app:1.0.0` carries no tag.
 */
export const hasTagDelimiter = (value: string) => {
  const lastColon = value.lastIndexOf(":");
  const lastSlash = value.lastIndexOf("/");
  if (lastColon === -1 || lastColon < lastSlash) return false;
  return value.split(":").length <= 2;
};

const splitDigest = (value: string) => {
  const parts = value.split("@", 2);
  if (parts.length === 2) {
    return { name: parts[0], digest: parts[1] };
  }
  return { name: value, digest: null };
};

const splitTag = (value: string) => {
  if (!hasTagDelimiter(value)) {
    return { name: value, tag: null };
  }
  const lastColon = value.lastIndexOf(":");
  return { name: value.slice(0, lastColon), tag: value.slice(lastColon + 1) };
};

const looksLikeHost = (segment: string) => segment.includes(".") || segment.includes(":");

export const parseImageRef = (raw: string): ImageRef => {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ReferenceParseError(raw, "Empty image reference");
  }
  if (/\s/.test(trimmed)) {
    throw new ReferenceParseError(trimmed, "Image reference contains whitespace");
  }

  const { name: nameWithTag, digest } = splitDigest(trimmed);
  if (digest === "") {
    throw new ReferenceParseError(trimmed, "Empty digest on image reference");
  }
  const { name, tag } = splitTag(nameWithTag);
  if (tag === "") {
    throw new ReferenceParseError(trimmed, "Empty tag on image reference");
  }

  let registry = DEFAULT_REGISTRY;
  let repository: string;
  if (!name.includes("/")) {
    repository = ensureDockerHubRepo(name);
  } else {
    const firstSlash = name.indexOf("/");
    const firstPart = name.slice(0, firstSlash);
    if (looksLikeHost(firstPart)) {
      registry = firstPart;
      repository = name.slice(firstSlash + 1);
    } else {
      repository = name;
    }
  }

  if (!repository || repository.split("/").some((segment) => !segment)) {
    throw new ReferenceParseError(trimmed, "Missing repository path in image reference");
  }
  if (repository.includes(":")) {
    // host:port/name:tag lands here, its last colon having been read as a port
    throw new ReferenceParseError(trimmed, "Ambiguous colon in repository path of image reference");
  }

  if (DOCKER_HUB_ALIASES.has(registry)) {
    registry = DEFAULT_REGISTRY;
    repository = ensureDockerHubRepo(repository);
  }

  return { raw: trimmed, registry, repository, tag, digest };
};

export const formatImageRef = (ref: ImageRef) => {
  const name = `${ref.registry}/${ref.repository}`;
  return ref.tag === null ? name : `${name}:${ref.tag}`;
};

export const normalizeRepoKey = (ref: ImageRef) => {
  return `${ref.registry}/${ref.repository}`.toLowerCase();
};
