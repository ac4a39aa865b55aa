import { z } from "zod";
import type { CapabilityFn } from "../orchestrator/capabilities";
import { missingKey, requestJson, type HttpOptions } from "./http";

const TAVILY_URL = "https://api.tavily.com/search";

const searchSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
        content: z.string().default(""),
      }),
    )
    .default([]),
});

export interface WebSearchOptions extends HttpOptions {
  apiKey?: string;
}

/**
 * Tavily search. `sourceQuery` is the query as sent; the web stage
 * overwrites it with the variant it issued.
 */
export function createWebSearchClient(options: WebSearchOptions): CapabilityFn<"search_web"> {
  return async ({ query, maxResults }) => {
    if (!options.apiKey) return missingKey("Tavily");
    const res = await requestJson(
      "Tavily",
      TAVILY_URL,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          api_key: options.apiKey,
          query,
          search_depth: "advanced",
          max_results: maxResults,
          include_answer: true,
          include_raw_content: false,
        }),
      },
      searchSchema,
      options.fetch,
    );
    if (!res.ok) return res;
    return {
      ok: true,
      data: res.data.results.map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content,
        sourceQuery: query,
      })),
    };
  };
}
