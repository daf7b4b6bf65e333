import { CatalogAuthError, CatalogError } from "../errors.js";
import type { SourceEntry } from "../types.js";
import { createFakeCatalog, silentLogger } from "./__fixtures__/fake-catalog.js";
import { ABORTED_DETAIL, createRequestOrchestrator } from "./orchestrator.js";

const alpha: SourceEntry = { title: "Alpha", mediaType: "movie", rank: 1, country: "US" };
const beta: SourceEntry = { title: "Beta", mediaType: "show", rank: 2, country: "US" };

function seedCatalog() {
  return createFakeCatalog({
    movies: [{ id: 11, title: "Alpha", releaseDate: "2026-01-01" }],
    shows: [{ id: 22, title: "Beta", seasons: ["requestedOrProcessing", "unavailable"] }]
  });
}

function orchestratorFor(catalog: ReturnType<typeof seedCatalog>["catalog"]) {
  const sleep = jest.fn().mockResolvedValue(undefined);
  const orchestrator = createRequestOrchestrator({
    catalog,
    logger: silentLogger,
    delayMs: 5,
    sleep
  });
  return { orchestrator, sleep };
}

describe("createRequestOrchestrator", () => {
  it("requests the movie and the first unavailable season", async () => {
    const { catalog, submissions } = seedCatalog();
    const { orchestrator, sleep } = orchestratorFor(catalog);

    const summary = await orchestrator.run([alpha, beta], { dryRun: false });

    expect(summary.outcomes).toEqual([
      {
        sourceEntry: alpha,
        outcome: "requested",
        detail: "movie requested (request #100)",
        dryRun: false,
        catalogId: 11
      },
      {
        sourceEntry: beta,
        outcome: "requested",
        detail: "season 2 requested (request #101)",
        dryRun: false,
        catalogId: 22,
        seasonNumber: 2
      }
    ]);
    expect(summary.counts).toEqual({ requested: 2, alreadySatisfied: 0, notFound: 0, error: 0 });
    expect(summary.total).toBe(2);
    expect(summary.skipped).toBe(0);
    expect(summary.fatalError).toBeUndefined();
    expect(submissions).toEqual([
      { mediaType: "movie", catalogId: 11 },
      { mediaType: "show", catalogId: 22, seasonNumber: 2 }
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5);
  });

  it("reports notFound without issuing any request", async () => {
    const { catalog, submissions } = seedCatalog();
    const requestMovie = jest.spyOn(catalog, "requestMovie");
    const { orchestrator } = orchestratorFor(catalog);
    const gamma: SourceEntry = { title: "Gamma", mediaType: "movie", rank: 3, country: "US" };

    const summary = await orchestrator.run([gamma], { dryRun: false });

    expect(summary.outcomes).toEqual([
      { sourceEntry: gamma, outcome: "notFound", detail: "no movie match in catalog", dryRun: false }
    ]);
    expect(summary.skipped).toBe(1);
    expect(requestMovie).not.toHaveBeenCalled();
    expect(submissions).toHaveLength(0);
  });

  it("does not match a show against a movie of the same title", async () => {
    const { catalog } = seedCatalog();
    const { orchestrator } = orchestratorFor(catalog);
    const alphaShow: SourceEntry = { title: "Alpha", mediaType: "show", rank: 1, country: "US" };

    const summary = await orchestrator.run([alphaShow], { dryRun: false });

    expect(summary.outcomes[0].outcome).toBe("notFound");
    expect(summary.outcomes[0].detail).toBe("no show match in catalog");
  });

  it("reports would-be requests in a dry run without submitting", async () => {
    const { catalog, submissions } = seedCatalog();
    const requestMovie = jest.spyOn(catalog, "requestMovie");
    const requestShowSeason = jest.spyOn(catalog, "requestShowSeason");
    const { orchestrator } = orchestratorFor(catalog);

    const summary = await orchestrator.run([alpha, beta], { dryRun: true });

    expect(summary.dryRun).toBe(true);
    expect(summary.outcomes.map((item) => [item.outcome, item.detail, item.dryRun])).toEqual([
      ["requested", "dry run: would request movie", true],
      ["requested", "dry run: would request season 2", true]
    ]);
    expect(summary.outcomes[1].seasonNumber).toBe(2);
    expect(requestMovie).not.toHaveBeenCalled();
    expect(requestShowSeason).not.toHaveBeenCalled();
    expect(submissions).toHaveLength(0);
  });

  it("treats requested or available titles as already satisfied", async () => {
    const { catalog } = createFakeCatalog({
      movies: [{ id: 11, title: "Alpha", requested: true }],
      shows: [{ id: 22, title: "Beta", seasons: ["available", "requestedOrProcessing", "available"] }]
    });
    const { orchestrator } = orchestratorFor(catalog);

    const summary = await orchestrator.run([alpha, beta], { dryRun: false });

    expect(summary.outcomes.map((item) => item.detail)).toEqual([
      "movie already requested or available",
      "seasons 1, 2, 3 already available or requested"
    ]);
    expect(summary.counts.alreadySatisfied).toBe(2);
    expect(summary.skipped).toBe(2);
  });

  it("treats a show without seasons as already satisfied", async () => {
    const { catalog } = createFakeCatalog({ shows: [{ id: 22, title: "Beta", seasons: [] }] });
    const { orchestrator } = orchestratorFor(catalog);

    const summary = await orchestrator.run([beta], { dryRun: false });

    expect(summary.outcomes[0]).toEqual({
      sourceEntry: beta,
      outcome: "alreadySatisfied",
      detail: "no requestable seasons in catalog",
      dryRun: false,
      catalogId: 22
    });
  });

  it("maps a duplicate submission to already satisfied", async () => {
    const { catalog } = seedCatalog();
    jest.spyOn(catalog, "requestShowSeason").mockResolvedValue({ status: "exists" });
    const { orchestrator } = orchestratorFor(catalog);

    const summary = await orchestrator.run([beta], { dryRun: false });

    expect(summary.outcomes[0].outcome).toBe("alreadySatisfied");
    expect(summary.outcomes[0].detail).toBe("season 2 request already exists");
    expect(summary.outcomes[0].seasonNumber).toBe(2);
  });

  it("isolates a failing entry and keeps processing the rest", async () => {
    const { catalog, submissions } = seedCatalog();
    jest
      .spyOn(catalog, "getMovieStatus")
      .mockRejectedValueOnce(new CatalogError("GET /movie/11 failed: HTTP 502", { status: 502 }));
    const { orchestrator, sleep } = orchestratorFor(catalog);

    const summary = await orchestrator.run([alpha, beta], { dryRun: false });

    expect(summary.outcomes[0]).toEqual({
      sourceEntry: alpha,
      outcome: "error",
      detail: "GET /movie/11 failed: HTTP 502",
      dryRun: false,
      catalogId: 11
    });
    expect(summary.outcomes[1].outcome).toBe("requested");
    expect(summary.counts).toEqual({ requested: 1, alreadySatisfied: 0, notFound: 0, error: 1 });
    expect(summary.fatalError).toBeUndefined();
    expect(submissions).toEqual([{ mediaType: "show", catalogId: 22, seasonNumber: 2 }]);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("aborts the run on an authentication failure and accounts for every entry", async () => {
    const { catalog, submissions } = seedCatalog();
    const search = catalog.search;
    catalog.search = jest.fn((title: string, mediaType: "movie" | "show") =>
      title === "Beta"
        ? Promise.reject(new CatalogAuthError("GET /search rejected: HTTP 401"))
        : search(title, mediaType)
    );
    const delta: SourceEntry = { title: "Delta", mediaType: "movie", rank: 4, country: "US" };
    const { orchestrator, sleep } = orchestratorFor(catalog);

    const summary = await orchestrator.run([alpha, beta, delta], { dryRun: false });

    expect(summary.total).toBe(3);
    expect(summary.outcomes.map((item) => [item.sourceEntry.title, item.outcome, item.detail])).toEqual([
      ["Alpha", "requested", "movie requested (request #100)"],
      ["Beta", "error", "GET /search rejected: HTTP 401"],
      ["Delta", "error", ABORTED_DETAIL]
    ]);
    expect(summary.fatalError).toEqual({ kind: "auth", message: "GET /search rejected: HTTP 401" });
    expect(summary.counts).toEqual({ requested: 1, alreadySatisfied: 0, notFound: 0, error: 2 });
    expect(catalog.search).toHaveBeenCalledTimes(2);
    expect(submissions).toHaveLength(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("does not submit again when re-run against the resulting catalog state", async () => {
    const { catalog, submissions } = createFakeCatalog({
      movies: [{ id: 11, title: "Alpha" }],
      shows: [{ id: 22, title: "Beta", seasons: ["available", "unavailable"] }]
    });
    const { orchestrator } = orchestratorFor(catalog);

    const first = await orchestrator.run([alpha, beta], { dryRun: false });
    const second = await orchestrator.run([alpha, beta], { dryRun: false });

    expect(first.outcomes.map((item) => item.outcome)).toEqual(["requested", "requested"]);
    expect(first.outcomes[1].seasonNumber).toBe(2);
    expect(second.outcomes.map((item) => item.outcome)).toEqual([
      "alreadySatisfied",
      "alreadySatisfied"
    ]);
    expect(submissions).toEqual([
      { mediaType: "movie", catalogId: 11 },
      { mediaType: "show", catalogId: 22, seasonNumber: 2 }
    ]);
  });

  it("returns frozen outcomes and an empty summary for no entries", async () => {
    const { catalog } = seedCatalog();
    const { orchestrator, sleep } = orchestratorFor(catalog);

    const empty = await orchestrator.run([], { dryRun: false });
    const single = await orchestrator.run([alpha], { dryRun: true });

    expect(empty.total).toBe(0);
    expect(empty.outcomes).toEqual([]);
    expect(Object.isFrozen(single.outcomes[0])).toBe(true);
    expect(sleep).not.toHaveBeenCalled();
  });
});
