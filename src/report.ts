import type { BatchSummary, CheckResult } from "./checker.js";

export type Output = {
  write: (chunk: string) => unknown;
};

export const formatResult = (result: CheckResult): string[] => {
  switch (result.status) {
    case "outdated":
      return [
        `Newer image versions available for ${result.reference}:`,
        ...result.newer.map((version) => `  ${version.original}`)
      ];
    case "up-to-date":
      return [`No newer image versions found for ${result.reference}.`];
    case "failed":
      return [`Failed to check ${result.reference}: ${result.error.message}`];
  }
};

export const formatSummary = (summary: BatchSummary) => {
  const outdated = summary.results.filter((result) => result.status === "outdated").length;
  const upToDate = summary.results.length - outdated - summary.failed;
  return `Checked ${summary.results.length} image(s): ${outdated} outdated, ${upToDate} up to date, ${summary.failed} failed.`;
};

export const reportResult = (result: CheckResult, out: Output) => {
  for (const line of formatResult(result)) {
    out.write(`${line}\n`);
  }
};

export const reportSummary = (summary: BatchSummary, out: Output) => {
  out.write(`${formatSummary(summary)}\n`);
};

const toJson = (result: CheckResult) => {
  if (result.status === "failed") {
    return { reference: result.reference, status: result.status, error: result.error.message };
  }
  return {
    reference: result.reference,
    status: result.status,
    registry: result.image.registry,
    repository: result.image.repository,
    current: result.current.original,
    newer: result.status === "outdated" ? result.newer.map((version) => version.original) : []
  };
};

export const formatJson = (summary: BatchSummary) => {
  return JSON.stringify(
    {
      newerFound: summary.newerFound,
      failed: summary.failed,
      results: summary.results.map(toJson)
    },
    null,
    2
  );
};
