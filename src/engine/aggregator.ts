import type {
  FatalRunError,
  OutcomeCounts,
  RequestOutcome,
  RunSummary
} from "../types.js";

export function emptyCounts(): OutcomeCounts {
  return { requested: 0, alreadySatisfied: 0, notFound: 0, error: 0 };
}

export function summarize(
  outcomes: readonly RequestOutcome[],
  options: { dryRun?: boolean; fatalError?: FatalRunError } = {}
): RunSummary {
  const counts = emptyCounts();
  for (const item of outcomes) {
    counts[item.outcome] += 1;
  }
  const total = outcomes.length;
  const counted = counts.requested + counts.alreadySatisfied + counts.notFound + counts.error;
  if (counted !== total) {
    throw new Error(`Outcome counts (${counted}) do not cover all ${total} entries.`);
  }

  return {
    outcomes: [...outcomes],
    counts,
    total,
    skipped: counts.alreadySatisfied + counts.notFound,
    dryRun: options.dryRun ?? false,
    ...(options.fatalError ? { fatalError: options.fatalError } : {})
  };
}

export function formatSummaryLine(summary: RunSummary) {
  const { counts } = summary;
  const parts = [
    `${summary.total} processed`,
    `${counts.requested} ${summary.dryRun ? "would be requested" : "requested"}`,
    `${counts.alreadySatisfied} already satisfied`,
    `${counts.notFound} not found`,
    `${counts.error} errors`
  ];
  const line = parts.join(", ");
  if (summary.fatalError) {
    return `${line} (aborted: ${summary.fatalError.message})`;
  }
  return line;
}
