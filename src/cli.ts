import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { DestinationStream, Level } from "pino";
import { type CheckDeps, type CheckResult, checkImages, exitCodeFor } from "./checker.js";
import { findComposeFiles, loadComposeImages } from "./compose.js";
import { type Config, MAX_PAGES_LIMIT, MAX_TIMEOUT_MS, loadConfig } from "./config.js";
import { type ContainerSource, connectDocker, listContainerImages } from "./docker.js";
import { ReferenceParseError, errorMessage } from "./errors.js";
import { LOG_LEVELS, type Logger, createLogger, parseLogLevel } from "./logger.js";
import { type FetchLike, type TagLister, createRegistryTagLister } from "./registry.js";
import { type Output, formatJson, reportResult, reportSummary } from "./report.js";
import { normalizeRepoKey, parseImageRef } from "./util/parseImage.js";

export const USAGE_EXIT_CODE = 2;

type CliOptions = {
  imageUrl?: string[];
  githubToken?: string;
  logLevel?: Level;
  maxPages?: number;
  pageSize?: number;
  timeout?: number;
  defaultTag?: string;
  composeFile?: string[];
  composeDir?: string[];
  fromContainers?: boolean;
  json?: boolean;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  stdout: Output;
  stderr: Output;
  logDestination?: DestinationStream;
  fetch?: FetchLike;
  lister?: TagLister;
  docker?: ContainerSource;
};

const positiveInt = (max?: number) => (value: string) => {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 1 || (max !== undefined && num > max)) {
    throw new InvalidArgumentError(max === undefined ? "Expected a positive integer." : `Expected an integer from 1 to ${max}.`);
  }
  return num;
};

const logLevel = (value: string) => {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
};

export const buildProgram = (deps: Pick<CliDeps, "stdout" | "stderr">) => {
  return new Command()
    .name("image-tag-check")
    .description("Checks for newer image versions and fails if any are found")
    .option(
      "--image-url <ref...>",
      "image reference(s) including the current tag, e.g. quay.io/org/app:1.2.3; repeatable"
    )
    .option("--github-token <token>", "token for ghcr.io images (default: $GITHUB_TOKEN)")
    .option("--log-level <level>", `log level: ${LOG_LEVELS.join(", ")} (default: $LOG_LEVEL or info)`, logLevel)
    .option("--max-pages <n>", `tag list pages to fetch per image, 1-${MAX_PAGES_LIMIT}`, positiveInt(MAX_PAGES_LIMIT))
    .option("--page-size <n>", "tags requested per page", positiveInt())
    .option("--timeout <ms>", `timeout per registry request in milliseconds, up to ${MAX_TIMEOUT_MS}`, positiveInt(MAX_TIMEOUT_MS))
    .option("--default-tag <tag>", "tag assumed for references without one")
    .option("--compose-file <path...>", "read image references from compose files")
    .option("--compose-dir <dir...>", "scan directories for compose files")
    .option("--from-containers", "check the images of running containers ($DOCKER_SOCKET)")
    .option("--json", "print results as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str)
    });
};

const referenceKey = (reference: string) => {
  try {
    const ref = parseImageRef(reference);
    return `${normalizeRepoKey(ref)}:${ref.tag ?? ""}`;
  } catch (err) {
    if (err instanceof ReferenceParseError) return reference;
    throw err;
  }
};

/** First occurrence wins; `nginx:1.0.0` and `docker.io/library/nginx:1.0.0` are the same image. */
export const dedupeReferences = (references: string[]) => {
  const seen = new Set<string>();
  return references.filter((reference) => {
    const key = referenceKey(reference);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

const gatherReferences = async (opts: CliOptions, config: Config, deps: CliDeps, logger: Logger) => {
  // a single argument may hold a space-separated list
  const references = (opts.imageUrl ?? []).flatMap((value) => value.split(/\s+/)).filter(Boolean);

  const composeFiles = [...(opts.composeFile ?? []), ...(await findComposeFiles(opts.composeDir ?? []))];
  for (const file of composeFiles) {
    const images = await loadComposeImages(file);
    logger.debug({ file, count: images.length }, "Loaded compose file");
    references.push(...images.map((item) => item.image));
  }

  if (opts.fromContainers) {
    const docker = deps.docker ?? connectDocker(config.dockerSocketPath);
    const images = await listContainerImages(docker);
    logger.debug({ count: images.length }, "Listed running containers");
    references.push(...images.map((item) => item.image));
  }

  return dedupeReferences(references);
};

export const run = async (argv: string[], deps: CliDeps): Promise<number> => {
  const program = buildProgram(deps);
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const config = loadConfig(deps.env ?? process.env);
  const logger = createLogger(opts.logLevel ?? config.logLevel, deps.logDestination);

  let references: string[];
  try {
    references = await gatherReferences(opts, config, deps, logger);
  } catch (err) {
    logger.error({ err }, `Failed to collect image references: ${errorMessage(err)}`);
    return USAGE_EXIT_CODE;
  }
  if (references.length === 0) {
    deps.stderr.write("error: no image references given (use --image-url, --compose-file, --compose-dir or --from-containers)\n");
    return USAGE_EXIT_CODE;
  }

  const lister =
    deps.lister ??
    createRegistryTagLister({
      fetch: deps.fetch,
      maxPages: opts.maxPages ?? config.maxPages,
      pageSize: opts.pageSize ?? config.pageSize,
      timeoutMs: opts.timeout ?? config.requestTimeoutMs,
      logger
    });

  const checkDeps: CheckDeps = {
    lister,
    credentials: { githubToken: opts.githubToken ?? config.githubToken },
    logger,
    defaultTag: opts.defaultTag ?? null
  };
  const summary = await checkImages(
    references,
    checkDeps,
    opts.json ? undefined : (result: CheckResult) => reportResult(result, deps.stdout)
  );

  if (opts.json) {
    deps.stdout.write(`${formatJson(summary)}\n`);
  } else {
    reportSummary(summary, deps.stdout);
  }
  logger.info({ newerFound: summary.newerFound, failed: summary.failed }, "Finished checking images");
  return exitCodeFor(summary);
};
