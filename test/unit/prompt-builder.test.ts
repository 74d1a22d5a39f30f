import { describe, expect, it } from "vitest";
import { buildPrompt } from "../../src/modules/generation/prompt-builder.js";
import { EMAIL_SYSTEM_PROMPT, NARRATIVE_SYSTEM_PROMPT, buildContextBlocks } from "../../src/prompts/index.js";
import { makeChunk } from "../helpers/fixtures.js";

const brief = {
  campaignBrief: "Winter repairs",
  orgBrief: "Community recovery fund",
  audience: "major_donor",
  tone: "hopeful",
  ask: "$500"
};

describe("modules/generation/prompt-builder", () => {
  it("numbers context blocks in chunk order", () => {
    const blocks = buildContextBlocks([
      makeChunk({ id: "a#0", title: "Alpha", date: "2024-01-02", text: "First text", url: "https://example.org/a" }),
      makeChunk({ id: "b#0", title: "Beta", date: "2024-02-03", text: "x".repeat(700), url: null })
    ]);

    expect(blocks).toBe(
      [
        "[1] Alpha (2024-01-02)",
        "First text",
        "URL: https://example.org/a",
        "",
        "[2] Beta (2024-02-03)",
        "x".repeat(600),
        "URL: n/a"
      ].join("\n")
    );
  });

  it("says so when there is no context", () => {
    expect(buildContextBlocks([])).toBe("No context available.");
  });

  it("builds a JSON-mode email prompt", () => {
    const prompt = buildPrompt({ route: "email", brief, chunks: [makeChunk({ id: "a#0", title: "Alpha" })] });
    const user = prompt.messages[1];

    expect(prompt.jsonMode).toBe(true);
    expect(prompt.systemPrompt).toBe(EMAIL_SYSTEM_PROMPT);
    expect(prompt.messages[0]).toEqual({ role: "system", content: EMAIL_SYSTEM_PROMPT });
    expect(user.role).toBe("user");
    expect(user.content).toContain("Audience: major_donor");
    expect(user.content).toContain("Ask amount or range: $500");
    expect(user.content).toContain("Deadline/urgency note: not specified");
    expect(user.content).toContain("CAMPAIGN BRIEF\n---\nWinter repairs");
    expect(user.content).toContain("[1] Alpha (");
  });

  it("builds a plain-markdown narrative prompt", () => {
    const prompt = buildPrompt({ route: "narrative", brief: { ...brief, orgBrief: "" }, chunks: [] });

    expect(prompt.jsonMode).toBe(false);
    expect(prompt.messages[0]).toEqual({ role: "system", content: NARRATIVE_SYSTEM_PROMPT });
    expect(prompt.messages[1].content).toContain("ORG BRIEF\n---\n(none)");
    expect(prompt.messages[1].content).toContain("No context available.");
  });
});
