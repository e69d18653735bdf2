import { z } from "zod";
import { OnlineSearchHit } from "../../domain/types.js";
import { collapseWhitespace, truncateAtWord } from "../../utils/text.js";
import { OnlineSearchGateway } from "./types.js";

const DEFAULT_ENDPOINT = "https://en.wikipedia.org/w/api.php";
const MAX_EXTRACT_CHARS = 1200;

interface WikipediaSearchClientOptions {
  endpoint?: string;
  userAgent?: string;
}

const searchResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(
        z.object({
          pageid: z.number().optional(),
          title: z.string(),
          index: z.number().optional(),
          extract: z.string().optional(),
          fullurl: z.string().optional(),
          missing: z.boolean().optional(),
        }),
      ),
    })
    .optional(),
});

/** Searches Wikipedia and returns the plain-text intro of each matching page. */
export class WikipediaSearchClient implements OnlineSearchGateway {
  private readonly endpoint: string;

  constructor(private readonly options: WikipediaSearchClientOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<OnlineSearchHit[]> {
    const trimmed = collapseWhitespace(query);
    if (!trimmed || maxResults <= 0) {
      return [];
    }

    const url = new URL(this.endpoint);
    url.search = new URLSearchParams({
      action: "query",
      format: "json",
      formatversion: "2",
      generator: "search",
      gsrsearch: trimmed,
      gsrlimit: String(maxResults),
      prop: "extracts|info",
      exintro: "1",
      explaintext: "1",
      inprop: "url",
    }).toString();

    const response = await fetch(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": this.options.userAgent ?? "local-first-suggest/0.1",
      },
      signal,
    });

    if (!response.ok) {
      throw new Error(`Wikipedia search failed (${response.status}): ${await response.text()}`);
    }

    const parsed = searchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Wikipedia search returned an unexpected payload.");
    }

    const pages = [...(parsed.data.query?.pages ?? [])]
      .filter((page) => !page.missing && page.extract && page.extract.trim())
      .sort((a, b) => (a.index ?? Number.MAX_SAFE_INTEGER) - (b.index ?? Number.MAX_SAFE_INTEGER))
      .slice(0, maxResults);

    return pages.map((page, rank) => ({
      text: truncateAtWord(collapseWhitespace(page.extract ?? ""), MAX_EXTRACT_CHARS),
      score: Number((1 / (rank + 1)).toFixed(4)),
      attribution:
        page.fullurl ?? `https://en.wikipedia.org/wiki/${encodeURIComponent(page.title.replace(/ /g, "_"))}`,
    }));
  }
}
