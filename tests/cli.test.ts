import { describe, expect, it, vi } from "vitest";
import { type CliDeps, USAGE_EXIT_CODE, dedupeReferences, run } from "../src/cli.js";
import type { ContainerSource } from "../src/docker.js";
import type { TagLister } from "../src/registry.js";
import type { ImageRef } from "../src/util/parseImage.js";
import { fakeFetch, jsonResponse } from "./utils.js";

const capture = () => {
  let text = "";
  return {
    write: (chunk: string) => {
      text += chunk;
    },
    text: () => text
  };
};

const setup = (extra: Partial<CliDeps> = {}) => {
  const stdout = capture();
  const stderr = capture();
  const deps: CliDeps = {
    env: {},
    stdout,
    stderr,
    logDestination: { write: () => undefined },
    ...extra
  };
  return { stdout, stderr, deps };
};

const stubLister = (tags: string[]): TagLister => ({
  listTags: vi.fn(async (_image: ImageRef) => tags)
});

describe("run", () => {
  it("reports newer versions and exits 1", async () => {
    const { stdout, deps } = setup({ lister: stubLister(["1.0.0", "1.1.0", "1.1.0-beta", "2.0.0"]) });

    const code = await run(["--image-url", "nginx:1.0.0"], deps);

    expect(code).toBe(1);
    expect(stdout.text()).toBe(
      [
        "Newer image versions available for nginx:1.0.0:",
        "  1.1.0",
        "  2.0.0",
        "Checked 1 image(s): 1 outdated, 0 up to date, 0 failed.",
        ""
      ].join("\n")
    );
  });

  it("exits 0 when every image is current", async () => {
    const { stdout, deps } = setup({ lister: stubLister(["0.9.0", "1.0.0", "latest"]) });

    expect(await run(["--image-url", "quay.io/org/app:1.0.0"], deps)).toBe(0);
    expect(stdout.text()).toBe(
      "No newer image versions found for quay.io/org/app:1.0.0.\nChecked 1 image(s): 0 outdated, 1 up to date, 0 failed.\n"
    );
  });

  it("talks to the registry through the given fetch", async () => {
    const { fetch, calls } = fakeFetch(() => jsonResponse({ name: "org/app", tags: ["1.0.0", "1.0.1"] }));
    const { deps } = setup({ fetch });

    expect(await run(["--image-url", "quay.io/org/app:1.0.0", "--page-size", "20"], deps)).toBe(1);
    expect(calls.map((call) => call.url)).toEqual(["https://quay.io/v2/org/app/tags/list?n=20"]);
  });

  it("accepts repeated and space-separated references and drops duplicates", async () => {
    const lister = stubLister(["1.0.0"]);
    const { stdout, deps } = setup({ lister });

    const code = await run(
      ["--image-url", "nginx:1.0.0 quay.io/org/app:1.0.0", "--image-url", "docker.io/library/nginx:1.0.0"],
      deps
    );

    expect(code).toBe(0);
    expect(lister.listTags).toHaveBeenCalledTimes(2);
    expect(stdout.text()).toContain("Checked 2 image(s)");
  });

  it("continues after a failing reference and exits 1", async () => {
    const { stdout, deps } = setup({ lister: stubLister(["1.0.0"]) });

    const code = await run(["--image-url", "nginx", "quay.io/org/app:1.0.0"], deps);

    expect(code).toBe(1);
    expect(stdout.text()).toBe(
      [
        "Failed to check nginx: No tag found on image reference: nginx",
        "No newer image versions found for quay.io/org/app:1.0.0.",
        "Checked 2 image(s): 0 outdated, 1 up to date, 1 failed.",
        ""
      ].join("\n")
    );
  });

  it("passes the GitHub token from the flag or the environment", async () => {
    const fromFlag = stubLister(["1.0.0"]);
    await run(["--image-url", "ghcr.io/owner/app:1.0.0", "--github-token", "test-token"], setup({ lister: fromFlag }).deps);
    expect(fromFlag.listTags).toHaveBeenCalledWith(expect.objectContaining({ registry: "ghcr.io" }), {
      githubToken: "test-token"
    });

    const fromEnv = stubLister(["1.0.0"]);
    await run(
      ["--image-url", "ghcr.io/owner/app:1.0.0"],
      setup({ lister: fromEnv, env: { GITHUB_TOKEN: "env-token" } }).deps
    );
    expect(fromEnv.listTags).toHaveBeenCalledWith(expect.objectContaining({ registry: "ghcr.io" }), {
      githubToken: "env-token"
    });
  });

  it("prints JSON with --json", async () => {
    const { stdout, deps } = setup({ lister: stubLister(["1.0.0", "1.2.0"]) });

    expect(await run(["--image-url", "nginx:1.0.0", "--json"], deps)).toBe(1);
    expect(JSON.parse(stdout.text())).toEqual({
      newerFound: true,
      failed: 0,
      results: [
        {
          reference: "nginx:1.0.0",
          status: "outdated",
          registry: "registry-1.docker.io",
          repository: "library/nginx",
          current: "1.0.0",
          newer: ["1.2.0"]
        }
      ]
    });
  });

  it("checks the images of running containers", async () => {
    const docker: ContainerSource = {
      listContainers: async () => [{ Id: "a1", Names: ["/web"], Image: "nginx:1.0.0" }]
    };
    const lister = stubLister(["1.0.0"]);
    const { deps } = setup({ lister, docker });

    expect(await run(["--from-containers"], deps)).toBe(0);
    expect(lister.listTags).toHaveBeenCalledTimes(1);
  });

  it("fails with a usage error when no references are given", async () => {
    const { stderr, deps } = setup({ lister: stubLister([]) });

    expect(await run([], deps)).toBe(USAGE_EXIT_CODE);
    expect(stderr.text()).toBe(
      "error: no image references given (use --image-url, --compose-file, --compose-dir or --from-containers)\n"
    );
  });

  it("rejects an out-of-range page count", async () => {
    const { stderr, deps } = setup({ lister: stubLister([]) });

    expect(await run(["--image-url", "nginx:1.0.0", "--max-pages", "0"], deps)).toBe(USAGE_EXIT_CODE);
    expect(stderr.text()).toContain("Expected an integer from 1 to 100.");
  });

  it("rejects a timeout above the limit", async () => {
    const { stderr, deps } = setup({ lister: stubLister([]) });

    expect(await run(["--image-url", "nginx:1.0.0", "--timeout", "3000000000"], deps)).toBe(USAGE_EXIT_CODE);
    expect(stderr.text()).toContain("Expected an integer from 1 to 600000.");
  });

  it("rejects an unknown log level", async () => {
    const { stderr, deps } = setup({ lister: stubLister([]) });

    expect(await run(["--image-url", "nginx:1.0.0", "--log-level", "loud"], deps)).toBe(USAGE_EXIT_CODE);
    expect(stderr.text()).toContain("Expected one of trace, debug, info, warn, error, fatal.");
  });

  it("prints help and exits 0", async () => {
    const { stdout, deps } = setup();

    expect(await run(["--help"], deps)).toBe(0);
    expect(stdout.text()).toContain("--image-url <ref...>");
  });
});

describe("dedupeReferences", () => {
  it("keeps the first spelling of each image and tag", () => {
    expect(
      dedupeReferences(["nginx:1.0.0", "docker.io/library/nginx:1.0.0", "nginx:1.1.0", "nginx:", "nginx:"])
    ).toEqual(["nginx:1.0.0", "nginx:1.1.0", "nginx:"]);
  });
});
