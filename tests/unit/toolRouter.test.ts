import { describe, expect, it } from "vitest";
import { ToolRouter } from "../../src/agent/tools/toolRouter.js";
import { ResultCache } from "../../src/services/cache/resultCache.js";
import { PubMedClient } from "../../src/services/pubmed/pubmedClient.js";
import { BaseErrorCode } from "../../src/types-global/errors.js";
import { captureMcpError } from "../helpers/errors.js";
import { FakeEUtilities, testContext } from "../helpers/fakes.js";

function setup() {
  const eutils = new FakeEUtilities(
    { "Jane Doe[Author]": ["111", "222"] },
    { "111": { title: "First paper", authors: [["Jane", "Doe"]], journal: "J Test" } },
  );
  const cache = new ResultCache({ maxEntries: 10, ttlMs: 0 });
  const router = new ToolRouter(new PubMedClient(eutils), cache, { maxAuthorResults: 20 });
  return { eutils, cache, router };
}

describe("ToolRouter", () => {
  it("declares the three tools with one required string argument each", () => {
    const { router } = setup();
    expect(router.listTools().map((tool) => [tool.name, tool.parameters.required])).toEqual([
      ["search_papers_by_author", ["author_name"]],
      ["search_paper_by_title", ["title"]],
      ["get_paper_details", ["paper_id"]],
    ]);
  });

  it("rejects tools outside the fixed set", async () => {
    const { router } = setup();
    const error = await captureMcpError(() => router.parseToolCall("delete_everything", "{}"));
    expect(error.code).toBe(BaseErrorCode.UNRECOGNIZED_TOOL);
    expect(error.message).toBe("Unknown tool: delete_everything");
  });

  it("rejects malformed argument JSON", async () => {
    const { router } = setup();
    const error = await captureMcpError(() => router.parseToolCall("get_paper_details", "{paper_id:"));
    expect(error.code).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe("Malformed arguments for tool 'get_paper_details'.");
  });

  it("rejects non-numeric paper IDs", async () => {
    const { router } = setup();
    const error = await captureMcpError(() =>
      router.parseToolCall("get_paper_details", { paper_id: "abc123" }),
    );
    expect(error.code).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe(
      "Invalid arguments for tool 'get_paper_details': paper_id: Paper IDs must be numeric.",
    );
  });

  it("trims string arguments", () => {
    const { router } = setup();
    expect(router.parseToolCall("search_paper_by_title", '{"title":"  Cavity  "}')).toEqual({
      name: "search_paper_by_title",
      args: { title: "Cavity" },
    });
  });

  it("normalizes the author and caches the identifiers under the normalized name", async () => {
    const { router, cache } = setup();

    const result = await router.invoke(
      "search_papers_by_author",
      '{"author_name":"Dr. Jane Doe"}',
      testContext(),
    );

    expect(result).toEqual({
      tool: "search_papers_by_author",
      query: "Jane Doe",
      author: "Jane Doe",
      count: 2,
      ids: ["111", "222"],
      matchedBy: "full_name",
    });
    expect(cache.recall("Jane Doe")).toEqual(["111", "222"]);
  });

  it("rejects an author name made only of honorifics", async () => {
    const { router, eutils } = setup();
    const error = await captureMcpError(() =>
      router.invoke("search_papers_by_author", { author_name: "Dr." }, testContext()),
    );
    expect(error.code).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe("Please provide an author name to search for.");
    expect(eutils.searches).toHaveLength(0);
  });

  it("returns no paper for an unknown identifier", async () => {
    const { router } = setup();
    const result = await router.invoke("get_paper_details", { paper_id: "999" }, testContext());
    expect(result).toEqual({ tool: "get_paper_details", paperId: "999", paper: undefined });
  });

  it("returns the paper for a known identifier", async () => {
    const { router } = setup();
    const result = await router.invoke("get_paper_details", { paper_id: "111" }, testContext());
    expect(result).toEqual({
      tool: "get_paper_details",
      paperId: "111",
      paper: { id: "111", title: "First paper", authors: ["Jane Doe"], journal: "J Test" },
    });
  });
});
