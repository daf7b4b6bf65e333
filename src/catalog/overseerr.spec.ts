import { CatalogAuthError, CatalogError } from "../errors.js";
import { silentLogger } from "../engine/__fixtures__/fake-catalog.js";
import { buildApiUrl, createOverseerrClient, encodeQuery, toCandidate } from "./overseerr.js";

function jsonResponse(status: number, body: unknown) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

function textResponse(status: number, body: string) {
  return new Response(body, { status });
}

describe("createOverseerrClient", () => {
  const fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
  const sleep = jest.fn().mockResolvedValue(undefined);
  const client = createOverseerrClient(
    {
      baseUrl: "http://localhost:5055",
      apiKey: "test-key",
      is4k: false,
      timeoutMs: 1000,
      retryCount: 2,
      retryBackoffMs: 10
    },
    { fetch: fetchMock, sleep, logger: silentLogger }
  );

  beforeEach(() => {
    fetchMock.mockReset();
    sleep.mockClear();
  });

  function lastBody() {
    const init = fetchMock.mock.calls[fetchMock.mock.calls.length - 1]?.[1];
    return JSON.parse(String(init?.body));
  }

  it("searches with an encoded query and keeps results of the requested type", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(200, {
        page: 1,
        results: [
          { id: 1, mediaType: "movie", title: "Alpha", releaseDate: "2021-05-01" },
          { id: 2, mediaType: "tv", name: "Alpha", firstAirDate: "2019-01-01" },
          { id: 3, mediaType: "person", name: "Alpha" }
        ]
      })
    );

    const candidates = await client.search("Alpha (2019)", "show");

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "http://localhost:5055/api/v1/search?query=Alpha%20%282019%29&page=1&language=en"
    );
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      method: "GET",
      headers: expect.objectContaining({ "X-Api-Key": "test-key" })
    });
    expect(candidates).toEqual([
      { catalogId: 2, mediaType: "show", title: "Alpha", releaseDate: "2019-01-01" }
    ]);
  });

  it("maps season and request state for seasons 1 to 3", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(200, {
        id: 22,
        name: "Beta",
        seasons: [
          { seasonNumber: 0 },
          { seasonNumber: 1 },
          { seasonNumber: 2 },
          { seasonNumber: 3 },
          { seasonNumber: 4 }
        ],
        mediaInfo: {
          status: 4,
          seasons: [
            { seasonNumber: 1, status: 5 },
            { seasonNumber: 2, status: 1 }
          ],
          requests: [
            { status: 3, seasons: [{ seasonNumber: 3 }] },
            { status: 2, seasons: [{ seasonNumber: 2 }] }
          ]
        }
      })
    );

    await expect(client.getSeasonStatuses(22)).resolves.toEqual([
      { seasonNumber: 1, state: "available" },
      { seasonNumber: 2, state: "requestedOrProcessing" },
      { seasonNumber: 3, state: "unavailable" }
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:5055/api/v1/tv/22");
  });

  it("lists only seasons the show has", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(200, { id: 23, seasons: [{ seasonNumber: 1 }], mediaInfo: null })
    );
    await expect(client.getSeasonStatuses(23)).resolves.toEqual([
      { seasonNumber: 1, state: "unavailable" }
    ]);
  });

  it.each<[{ status: number } | null, boolean]>([
    [null, false],
    [{ status: 1 }, false],
    [{ status: 3 }, true],
    [{ status: 5 }, true]
  ])("reads movie mediaInfo %j as requested=%s", async (mediaInfo, expected) => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { id: 11, title: "Alpha", mediaInfo }));
    await expect(client.getMovieStatus(11)).resolves.toBe(expected);
  });

  it("submits a single-season request", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { id: 77 }));

    await expect(client.requestShowSeason(22, 2)).resolves.toEqual({
      status: "requested",
      requestId: 77
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:5055/api/v1/request");
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(lastBody()).toEqual({ mediaType: "tv", mediaId: 22, is4k: false, seasons: [2] });
  });

  it("submits a movie request", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, {}));

    await expect(client.requestMovie(11)).resolves.toEqual({ status: "requested", requestId: null });
    expect(lastBody()).toEqual({ mediaType: "movie", mediaId: 11, is4k: false });
  });

  it.each<[number, { message: string }]>([
    [409, { message: "Conflict" }],
    [400, { message: "Request already exists" }],
    [202, { message: "No seasons available to request" }]
  ])("treats HTTP %s %j as an existing request", async (status, body) => {
    fetchMock.mockResolvedValueOnce(jsonResponse(status, body));
    await expect(client.requestMovie(11)).resolves.toEqual({ status: "exists" });
  });

  it("fails other client errors without retrying", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(400, { message: "Bad thing" }));

    await expect(client.requestMovie(11)).rejects.toThrow("POST /request failed: HTTP 400 Bad thing");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("raises an auth error on 401 without retrying", async () => {
    fetchMock.mockResolvedValueOnce(textResponse(401, "unauthorized"));

    const error = await client.search("Alpha", "movie").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CatalogAuthError);
    expect(error).toMatchObject({ status: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("keeps a quota 403 as a per-item failure", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(403, { message: "Movie quota exceeded" }));

    const error = await client.requestMovie(11).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CatalogError);
    expect(error).not.toBeInstanceOf(CatalogAuthError);
    expect(error).toMatchObject({ status: 403 });
  });

  it("retries server errors with exponential backoff", async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse(503, "busy"))
      .mockResolvedValueOnce(jsonResponse(200, { id: 1, displayName: "Admin" }));

    await expect(client.testConnection()).resolves.toEqual({ userId: 1, displayName: "Admin" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[10]]);
  });

  it("gives up after the configured retries", async () => {
    fetchMock.mockImplementation(async () => textResponse(500, "oops"));

    await expect(client.getMovieStatus(1)).rejects.toThrow("GET /movie/1 failed: HTTP 500 oops");
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
  });

  it("sends a request submission once even when it fails with a server error", async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse(503, "busy"))
      .mockResolvedValueOnce(jsonResponse(409, { message: "Request already exists" }));

    const error = await client.requestMovie(7).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CatalogError);
    expect(error).toMatchObject({ status: 503, message: "POST /request failed: HTTP 503 busy" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("does not resend a submission after a network failure", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.requestShowSeason(22, 1)).rejects.toThrow(
      "POST /request failed: fetch failed"
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries network failures", async () => {
    fetchMock.mockImplementation(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(client.testConnection()).rejects.toThrow("GET /auth/me failed: fetch failed");
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("rejects bodies that are not JSON", async () => {
    fetchMock.mockResolvedValueOnce(textResponse(200, "<html></html>"));
    await expect(client.getMovieStatus(1)).rejects.toThrow("GET /movie/1 returned invalid JSON");
  });
});

describe("toCandidate", () => {
  it("drops empty and malformed dates", () => {
    expect(toCandidate({ id: 4, mediaType: "movie", title: "X", releaseDate: "" })).toEqual({
      catalogId: 4,
      mediaType: "movie",
      title: "X"
    });
    expect(toCandidate({ id: 5, mediaType: "tv", name: "Y", firstAirDate: "2020-02-02T00:00:00Z" })).toEqual({
      catalogId: 5,
      mediaType: "show",
      title: "Y",
      releaseDate: "2020-02-02"
    });
  });

  it("skips results that are not movies or shows", () => {
    expect(toCandidate({ id: 6, mediaType: "person", name: "Z" })).toBeNull();
  });
});

describe("buildApiUrl", () => {
  it.each([
    ["http://localhost:5055", "/auth/me", "http://localhost:5055/api/v1/auth/me"],
    ["http://localhost:5055/", "/auth/me", "http://localhost:5055/api/v1/auth/me"],
    ["http://localhost:5055/api/v1", "/auth/me", "http://localhost:5055/api/v1/auth/me"],
    ["overseerr.local:5055", "/tv/1", "http://overseerr.local:5055/api/v1/tv/1"],
    ["https://media.example/overseerr/api/v1/", "/tv/1", "https://media.example/overseerr/api/v1/tv/1"]
  ])("builds %s + %s", (baseUrl, path, expected) => {
    expect(buildApiUrl(baseUrl, path)).toBe(expected);
  });
});

describe("encodeQuery", () => {
  it("escapes characters encodeURIComponent leaves alone", () => {
    expect(encodeQuery("Grey's Anatomy (2005)!")).toBe("Grey%27s%20Anatomy%20%282005%29%21");
  });
});
