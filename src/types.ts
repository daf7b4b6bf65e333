export type MediaType = "movie" | "show";

export type SourceEntry = {
  title: string;
  mediaType: MediaType;
  rank: number;
  country: string;
};

export type MatchCandidate = {
  catalogId: number;
  mediaType: MediaType;
  title: string;
  releaseDate?: string;
};

export type MatchResult = {
  sourceEntry: SourceEntry;
  candidate?: MatchCandidate;
  matched: boolean;
  exact: boolean;
};

export type SeasonState = "available" | "requestedOrProcessing" | "unavailable";

export type SeasonStatus = {
  seasonNumber: number;
  state: SeasonState;
};

export type OutcomeKind = "requested" | "alreadySatisfied" | "notFound" | "error";

export type RequestOutcome = {
  readonly sourceEntry: SourceEntry;
  readonly outcome: OutcomeKind;
  readonly detail: string;
  readonly catalogId?: number;
  readonly seasonNumber?: number;
  readonly dryRun: boolean;
};

export type OutcomeCounts = Record<OutcomeKind, number>;

export type FatalRunError = {
  kind: "auth";
  message: string;
};

export type RunSummary = {
  outcomes: readonly RequestOutcome[];
  counts: OutcomeCounts;
  total: number;
  skipped: number;
  dryRun: boolean;
  fatalError?: FatalRunError;
};

export type RequestSubmission =
  | { status: "requested"; requestId: number | null }
  | { status: "exists" };

export type WebhookPayload = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  countries: string[];
  counts: OutcomeCounts;
  total: number;
  fatalError?: FatalRunError;
  summaryUri?: string;
};
