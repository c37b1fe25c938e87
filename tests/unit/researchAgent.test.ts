import { describe, expect, it } from "vitest";
import type { ChatModel, ModelReply } from "../../src/agent/llm/llmClient.js";
import { EMPTY_INPUT_MESSAGE, ResearchAgent } from "../../src/agent/researchAgent.js";
import {
  HELP_MESSAGE,
  NOT_UNDERSTOOD_MESSAGE,
  SEPARATOR,
} from "../../src/agent/responseFormatter.js";
import { ToolRouter } from "../../src/agent/tools/toolRouter.js";
import { ResultCache } from "../../src/services/cache/resultCache.js";
import { PubMedClient } from "../../src/services/pubmed/pubmedClient.js";
import { BaseErrorCode, McpError } from "../../src/types-global/errors.js";
import {
  type FakeArticle,
  FakeEUtilities,
  ScriptedChatModel,
  textReply,
  toolReply,
} from "../helpers/fakes.js";

const NETWORK_ERROR_MESSAGE =
  "Sorry, I couldn't reach an external service (NCBI request failed: connect ECONNREFUSED). Please try again later.";

function setup(
  idsByTerm: Record<string, string[]>,
  articles: Record<string, FakeArticle>,
  options: { model?: ChatModel; pageSize?: number; historyLimit?: number } = {},
) {
  const eutils = new FakeEUtilities(idsByTerm, articles);
  const cache = new ResultCache({ maxEntries: 10, ttlMs: 0 });
  const client = new PubMedClient(eutils, { maxAuthorResults: 20 });
  const router = new ToolRouter(client, cache, { maxAuthorResults: 20 });
  const agent = new ResearchAgent({
    client,
    cache,
    router,
    model: options.model,
    pageSize: options.pageSize ?? 3,
    historyLimit: options.historyLimit ?? 10,
  });
  return { agent, eutils, cache };
}

const JANE_ARTICLES: Record<string, FakeArticle> = {
  "111": { title: "First paper", authors: [["Jane", "Doe"]], journal: "J Test", year: "2023" },
  "222": { title: "Second paper", authors: [["Jane", "Doe"]], journal: "J Test", year: "2022" },
};

const CAVITY_ARTICLE: Record<string, FakeArticle> = {
  "37635766": {
    title: "Cavity paper",
    authors: [["Jane", "Doe"]],
    journal: "J Test",
    doi: "10.1000/cavity",
  },
};

const JANE_FIRST_PAGE = [
  "Papers 1-2 of 2 for Jane Doe:",
  SEPARATOR,
  "[1]",
  "Paper ID: 111",
  "Title: First paper",
  "Authors: Jane Doe",
  "Journal: J Test (2023)",
  SEPARATOR,
  "[2]",
  "Paper ID: 222",
  "Title: Second paper",
  "Authors: Jane Doe",
  "Journal: J Test (2022)",
].join("\n");

describe("ResearchAgent in direct mode", () => {
  it("searches by a normalized author, caches the ids and lists both papers", async () => {
    const { agent, cache } = setup({ "Jane Doe[Author]": ["111", "222"] }, JANE_ARTICLES);

    const reply = await agent.handle("Show papers by Dr. Jane Doe");

    expect(reply).toBe(`Found 2 papers by Jane Doe.\nPaper IDs: 111, 222\n\n${JANE_FIRST_PAGE}`);
    expect(cache.recall("Jane Doe")).toEqual(["111", "222"]);
    expect(agent.state).toBe("Idle");
  });

  it("answers a paper-id request with the paper's present fields only", async () => {
    const { agent, eutils } = setup({}, CAVITY_ARTICLE);

    const reply = await agent.handle("Tell me about paper 37635766");

    expect(reply).toBe(
      "Paper ID: 37635766\nTitle: Cavity paper\nAuthors: Jane Doe\nJournal: J Test\nDOI: 10.1000/cavity",
    );
    expect(eutils.fetches.map((f) => f.id)).toEqual(["37635766"]);
  });

  it("turns a network failure during a title search into one message", async () => {
    const { agent, eutils } = setup({}, {});
    eutils.failure = new McpError(
      BaseErrorCode.SOURCE_UNAVAILABLE,
      "NCBI request failed: connect ECONNREFUSED",
    );

    const reply = await agent.handle('Find the paper titled "Cavity architecture"');

    expect(reply).toBe(NETWORK_ERROR_MESSAGE);
    expect(agent.state).toBe("Idle");
  });

  it("pages through cached results without searching again", async () => {
    const { agent, eutils } = setup(
      { "Jane Doe[Author]": ["111", "222", "333", "444"] },
      {
        "111": { title: "Paper one" },
        "222": { title: "Paper two" },
        "333": { title: "Paper three" },
        "444": { title: "Paper four" },
      },
      { pageSize: 2 },
    );

    const first = await agent.handle("papers by Jane Doe");
    expect(first).toBe(
      [
        "Found 4 papers by Jane Doe.",
        "Paper IDs: 111, 222, 333, 444",
        "",
        "Papers 1-2 of 4 for Jane Doe:",
        SEPARATOR,
        "[1]\nPaper ID: 111\nTitle: Paper one",
        SEPARATOR,
        "[2]\nPaper ID: 222\nTitle: Paper two",
        SEPARATOR,
        'Ask for "more" to see the next papers.',
      ].join("\n"),
    );

    const second = await agent.handle("show me more");
    expect(second).toBe(
      [
        "Papers 3-4 of 4 for Jane Doe:",
        SEPARATOR,
        "[3]\nPaper ID: 333\nTitle: Paper three",
        SEPARATOR,
        "[4]\nPaper ID: 444\nTitle: Paper four",
      ].join("\n"),
    );

    expect(await agent.handle("more")).toBe("That's all 4 papers I found for Jane Doe.");
    expect(eutils.searches).toHaveLength(1);
    expect(eutils.fetches.map((f) => f.id)).toEqual(["111,222", "333,444"]);
  });

  it("pages through a named author already in the cache", async () => {
    const { agent, eutils, cache } = setup({}, { "555": { title: "Cached paper" } });
    cache.remember("John Roe", ["555"]);

    const reply = await agent.handle("more papers by Dr. John Roe");

    expect(reply).toBe(`Papers 1-1 of 1 for John Roe:\n${SEPARATOR}\n[1]\nPaper ID: 555\nTitle: Cached paper`);
    expect(eutils.searches).toHaveLength(0);
  });

  it("runs a title search after an author search even when the title says Further", async () => {
    const { agent, eutils } = setup(
      {
        "Jane Doe[Author]": ["111", "222", "333", "444"],
        '"Further evidence for gut microbiome drug metabolism"[Title]': ["777"],
      },
      {
        "111": { title: "Paper one" },
        "222": { title: "Paper two" },
        "333": { title: "Paper three" },
        "444": { title: "Paper four" },
        "777": { title: "Further evidence for gut microbiome drug metabolism" },
      },
    );

    await agent.handle("Show papers by Jane Doe");
    const reply = await agent.handle(
      'Find the paper titled "Further evidence for gut microbiome drug metabolism"',
    );

    expect(reply).toBe(
      "Paper ID: 777\nTitle: Further evidence for gut microbiome drug metabolism",
    );
    expect(eutils.searches.map((search) => search.term)).toEqual([
      "Jane Doe[Author]",
      '"Further evidence for gut microbiome drug metabolism"[Title]',
    ]);
  });

  it("shows help when asked for more before any search", async () => {
    const { agent } = setup({}, {});
    expect(await agent.handle("show me more")).toBe(HELP_MESSAGE);
  });

  it("asks for input on a blank message", async () => {
    const { agent, eutils } = setup({}, {});
    expect(await agent.handle("   ")).toBe(EMPTY_INPUT_MESSAGE);
    expect(eutils.searches).toHaveLength(0);
  });
});

describe("ResearchAgent with a language model", () => {
  it("returns plain-text answers and offers the three tools", async () => {
    const model = new ScriptedChatModel([textReply("Ask me about PubMed papers.")]);
    const { agent } = setup({}, {}, { model });

    expect(await agent.handle("hi")).toBe("Ask me about PubMed papers.");
    expect(model.calls).toHaveLength(1);
    expect(model.calls[0]?.tools.map((tool) => tool.name)).toEqual([
      "search_papers_by_author",
      "search_paper_by_title",
      "get_paper_details",
    ]);
  });

  it("runs the chosen tool and lets the model compose the answer", async () => {
    const model = new ScriptedChatModel([
      toolReply("search_papers_by_author", { author_name: "Dr. Jane Doe" }),
      textReply("Jane Doe has 2 papers: 111 and 222."),
    ]);
    const { agent, cache } = setup({ "Jane Doe[Author]": ["111", "222"] }, JANE_ARTICLES, { model });

    const reply = await agent.handle("What has Dr. Jane Doe written?");

    expect(reply).toBe(`Jane Doe has 2 papers: 111 and 222.\n\n${JANE_FIRST_PAGE}`);
    expect(cache.recall("Jane Doe")).toEqual(["111", "222"]);
    expect(model.calls).toHaveLength(2);
    expect(model.calls[1]?.tools).toEqual([]);
    expect(model.calls[1]?.messages.at(-1)).toEqual({
      role: "tool",
      toolCallId: "call_1",
      content: JSON.stringify({
        tool: "search_papers_by_author",
        query: "Jane Doe",
        author: "Jane Doe",
        count: 2,
        ids: ["111", "222"],
        matchedBy: "full_name",
      }),
    });
  });

  it("skips the model for paper-id requests", async () => {
    const model = new ScriptedChatModel([]);
    const { agent } = setup({}, CAVITY_ARTICLE, { model });

    const reply = await agent.handle("Get details for paper ID 37635766");

    expect(reply.startsWith("Paper ID: 37635766\nTitle: Cavity paper")).toBe(true);
    expect(model.calls).toHaveLength(0);
  });

  it("leaves a question that mentions next to the model after an author search", async () => {
    const model = new ScriptedChatModel([
      toolReply("search_papers_by_author", { author_name: "Jane Doe" }),
      textReply("Jane Doe has 2 papers."),
      textReply("Follow-up studies usually come next."),
    ]);
    const { agent, eutils } = setup({ "Jane Doe[Author]": ["111", "222"] }, JANE_ARTICLES, { model });

    await agent.handle("Papers by Jane Doe");
    const reply = await agent.handle("What usually comes next after a pilot study?");

    expect(reply).toBe("Follow-up studies usually come next.");
    expect(model.calls).toHaveLength(3);
    expect(eutils.fetches).toHaveLength(1);
  });

  it("answers gracefully when the model names an unknown tool", async () => {
    const model = new ScriptedChatModel([toolReply("delete_everything", {})]);
    const { agent } = setup({}, {}, { model });

    expect(await agent.handle("do something odd")).toBe(NOT_UNDERSTOOD_MESSAGE);
    expect(model.calls).toHaveLength(1);
    expect(agent.state).toBe("Idle");
  });

  it("passes a tool failure back to the model as an error string", async () => {
    const model = new ScriptedChatModel([
      toolReply("search_paper_by_title", { title: "Cavity architecture" }),
      textReply("PubMed is unreachable right now."),
    ]);
    const { agent, eutils } = setup({}, {}, { model });
    eutils.failure = new McpError(
      BaseErrorCode.SOURCE_UNAVAILABLE,
      "NCBI request failed: connect ECONNREFUSED",
    );

    const reply = await agent.handle("Find the cavity architecture paper");

    expect(reply).toBe("PubMed is unreachable right now.");
    expect(model.calls[1]?.messages.at(-1)).toEqual({
      role: "tool",
      toolCallId: "call_1",
      content: `Error: ${NETWORK_ERROR_MESSAGE}`,
    });
  });

  it("falls back to the formatted result when the second model call fails", async () => {
    const model = new ScriptedChatModel([
      toolReply("get_paper_details", { paper_id: "37635766" }),
      new McpError(BaseErrorCode.SOURCE_UNAVAILABLE, "Language model request failed: timeout"),
    ]);
    const { agent } = setup({}, CAVITY_ARTICLE, { model });

    const reply = await agent.handle("Show me PMID 37635766 please");

    expect(reply).toBe(
      "Paper ID: 37635766\nTitle: Cavity paper\nAuthors: Jane Doe\nJournal: J Test\nDOI: 10.1000/cavity",
    );
  });

  it("reports a failed first model call as one message", async () => {
    const model = new ScriptedChatModel([
      new McpError(BaseErrorCode.SOURCE_UNAVAILABLE, "Language model request failed: 503"),
    ]);
    const { agent } = setup({}, {}, { model });

    expect(await agent.handle("papers about enzymes")).toBe(
      "Sorry, I couldn't reach an external service (Language model request failed: 503). Please try again later.",
    );
    expect(agent.state).toBe("Idle");
  });

  it("moves through the model states during a turn", async () => {
    const seen: string[] = [];
    let agentRef: ResearchAgent | undefined;
    const replies: ModelReply[] = [
      toolReply("get_paper_details", { paper_id: "37635766" }),
      textReply("Here it is."),
    ];
    const model: ChatModel = {
      model: "state-probe",
      async complete() {
        seen.push(agentRef?.state ?? "none");
        return replies.shift() ?? textReply("");
      },
    };
    const { agent } = setup({}, CAVITY_ARTICLE, { model });
    agentRef = agent;

    await agent.handle("what is PMID 37635766");

    expect(seen).toEqual(["AwaitingModelDecision", "AwaitingModelDecision"]);
    expect(agent.state).toBe("Idle");
  });

  it("keeps only the most recent history messages", async () => {
    const model = new ScriptedChatModel([
      textReply("a1"),
      textReply("a2"),
      textReply("a3"),
      textReply("a4"),
    ]);
    const { agent } = setup({}, {}, { model, historyLimit: 4 });

    await agent.handle("q1");
    await agent.handle("q2");
    await agent.handle("q3");
    await agent.handle("q4");

    expect(model.calls[3]?.messages.map((m) => m.content)).toEqual([
      expect.any(String),
      "q2",
      "a2",
      "q3",
      "a3",
      "q4",
    ]);
  });

  it("runs concurrent turns one after another", async () => {
    const model = new ScriptedChatModel([textReply("first"), textReply("second")]);
    const { agent } = setup({}, {}, { model });

    const replies = await Promise.all([agent.handle("one"), agent.handle("two")]);

    expect(replies).toEqual(["first", "second"]);
    expect(model.calls[1]?.messages.map((m) => m.content)).toEqual([
      expect.any(String),
      "one",
      "first",
      "two",
    ]);
  });
});
