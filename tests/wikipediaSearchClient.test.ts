import { afterEach, describe, expect, it, vi } from "vitest";
import { WikipediaSearchClient } from "../src/infra/online/wikipediaSearchClient.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("WikipediaSearchClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("orders pages by search rank and scores them by reciprocal rank", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        query: {
          pages: [
            { pageid: 2, title: "Wind power", index: 2, extract: "Wind power uses   turbines." },
            {
              pageid: 1,
              title: "Solar panel",
              index: 1,
              extract: "A solar panel converts light.",
              fullurl: "https://en.wikipedia.org/wiki/Solar_panel",
            },
            { pageid: 3, title: "Empty page", index: 3, extract: "  " },
          ],
        },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new WikipediaSearchClient({ endpoint: "https://wiki.test/w/api.php" });
    const hits = await client.search("  solar   energy ", 3);

    expect(hits).toEqual([
      {
        text: "A solar panel converts light.",
        score: 1,
        attribution: "https://en.wikipedia.org/wiki/Solar_panel",
      },
      {
        text: "Wind power uses turbines.",
        score: 0.5,
        attribution: "https://en.wikipedia.org/wiki/Wind_power",
      },
    ]);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe("https://wiki.test/w/api.php");
    expect(requested.searchParams.get("gsrsearch")).toBe("solar energy");
    expect(requested.searchParams.get("gsrlimit")).toBe("3");
    expect(requested.searchParams.get("generator")).toBe("search");
  });

  it("returns nothing for a blank query without calling the API", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const client = new WikipediaSearchClient();
    expect(await client.search("   ", 3)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns nothing when the search has no pages", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ batchcomplete: true })));

    const client = new WikipediaSearchClient();
    expect(await client.search("qwxz", 3)).toEqual([]);
  });

  it("throws on an HTTP error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 503 })));

    const client = new WikipediaSearchClient();
    await expect(client.search("solar", 3)).rejects.toThrow("Wikipedia search failed (503): busy");
  });
});
