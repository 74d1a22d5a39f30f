import { describe, expect, it } from "vitest";
import {
  DEFAULT_POSTSCRIPT,
  DEFAULT_SUBJECT_LINE_FALLBACKS,
  countDistinctMarkers,
  isPostscriptLine,
  normalizeSubjectLines,
  reconcile,
  renumberMarkers,
  stripModelSourcesSection,
  toSourceItem
} from "../../src/modules/rag/citation-reconciler.js";
import { makeChunk } from "../helpers/fixtures.js";

const first = makeChunk({ id: "a#0", doc_id: "a", title: "First", date: "2024-01-01", county: "Harlan", topics: ["housing"] });
const second = makeChunk({ id: "b#0", doc_id: "b", title: "Second", url: null });
const third = makeChunk({ id: "c#0", doc_id: "c", title: "Third" });

const postscriptLines = (markdown: string): string[] => markdown.split("\n").filter((line) => line.startsWith("P.S.:"));

describe("modules/rag/citation-reconciler", () => {
  it("adds the default postscript and returns no sources when the draft has no markers", () => {
    const result = reconcile({ body_md: "We rebuilt homes.\n\nThank you." }, [first, second]);

    expect(result.markdown).toBe(`We rebuilt homes.\n\nThank you.\n\nP.S.: ${DEFAULT_POSTSCRIPT}`);
    expect(result.sources).toEqual([]);
  });

  it("renumbers markers in first-seen order and drops out-of-range ones", () => {
    const result = reconcile(
      { body_md: "Homes were rebuilt [3]. Grants helped [1] and [3] again [7]." },
      [first, second, third],
      { defaultPostscript: "Call us." }
    );

    expect(result.markdown).toBe("Homes were rebuilt [1]. Grants helped [2] and [1] again.\n\nP.S.: Call us.");
    expect(result.sources).toEqual([toSourceItem(third, 1), toSourceItem(first, 2)]);
    expect(countDistinctMarkers(result.markdown)).toBe(result.sources.length);
  });

  it("removes every marker when no chunks were supplied", () => {
    const result = reconcile({ body_md: "[5] Families recovered [1] and thrived [2]." }, [], { defaultPostscript: "Call us." });

    expect(result.markdown).toBe("Families recovered and thrived.\n\nP.S.: Call us.");
    expect(result.sources).toEqual([]);
    expect(countDistinctMarkers(result.markdown)).toBe(0);
  });

  it("keeps only the first postscript and moves it to the end", () => {
    const result = reconcile(
      {
        body_md: "Body text [2].\n\nP.S.: First note [1].\n\nPS: second note",
        postscript: "ignored"
      },
      [first, second]
    );

    expect(result.markdown).toBe("Body text [1].\n\nP.S.: First note [2].");
    expect(postscriptLines(result.markdown)).toHaveLength(1);
    expect(result.sources.map((source) => source.doc_id)).toEqual(["b", "a"]);
  });

  it("moves a postscript written mid-body to the final paragraph", () => {
    const result = reconcile({ body_md: "Intro.\nP.S.: early note\nMore body." }, []);

    expect(result.markdown).toBe("Intro.\nMore body.\n\nP.S.: early note");
  });

  it("uses the draft's separate postscript when the body has none", () => {
    const result = reconcile({ body_md: "Body.", postscript: "P.S. Reply today" }, []);

    expect(result.markdown).toBe("Body.\n\nP.S.: Reply today");
  });

  it("strips a model-written sources section but keeps a trailing postscript", () => {
    const body = "Para one [1].\n\n## Sources\n[1] Some title\nP.S.: keep me";

    expect(stripModelSourcesSection(body)).toBe("Para one [1].\n\n\nP.S.: keep me");

    const result = reconcile({ body_md: body }, [first]);
    expect(result.markdown).toBe("Para one [1].\n\nP.S.: keep me");
    expect(result.sources).toEqual([
      { n: 1, doc_id: "a", title: "First", url: first.url, date: "2024-01-01", county: "Harlan", topics: ["housing"] }
    ]);
  });

  it("recognizes lenient postscript spellings", () => {
    expect(isPostscriptLine("P.S.: thanks")).toBe(true);
    expect(isPostscriptLine("PS: thanks")).toBe(true);
    expect(isPostscriptLine("P.S: thanks")).toBe(true);
    expect(isPostscriptLine("**P.S.** thanks")).toBe(true);
    expect(isPostscriptLine("PSA: not a postscript")).toBe(false);
    expect(isPostscriptLine("Please give")).toBe(false);
    expect(isPostscriptLine("Ps and Qs matter to donors.")).toBe(false);
    expect(isPostscriptLine("P s is not a marker")).toBe(false);
  });

  it("leaves body lines that merely start with Ps in place", () => {
    const result = reconcile({ body_md: "Intro.\n\nPs and Qs matter to donors.\n\nMore body." }, [], {
      defaultPostscript: "Call us."
    });

    expect(result.markdown).toBe("Intro.\n\nPs and Qs matter to donors.\n\nMore body.\n\nP.S.: Call us.");
  });

  it("collapses the whitespace a dropped marker leaves behind", () => {
    expect(renumberMarkers("Aid arrived [9] quickly.", []).markdown).toBe("Aid arrived quickly.");
    expect(renumberMarkers("Aid arrived [9].", []).markdown).toBe("Aid arrived.");
    expect(renumberMarkers("[9] Aid arrived.", []).markdown).toBe("Aid arrived.");
    expect(renumberMarkers("claim [1] [9].", [first]).markdown).toBe("claim [1].");
    expect(renumberMarkers("claim [9] [8] here", []).markdown).toBe("claim here");
    expect(renumberMarkers("claim ([9]) here", [first]).markdown).toBe("claim here");
  });

  it("keeps list indentation on lines that lost a marker", () => {
    expect(renumberMarkers("Needs:\n  - Roofs [4]\n  - Wells [1]", [first]).markdown).toBe(
      "Needs:\n  - Roofs\n  - Wells [1]"
    );
  });

  it("is deterministic", () => {
    const draft = { body_md: "One [2]. Two [1].", subject_lines: ["Hello"] };

    expect(reconcile(draft, [first, second])).toEqual(reconcile(draft, [first, second]));
  });

  describe("subject lines", () => {
    it("cleans, de-duplicates and pads to exactly three", () => {
      expect(
        normalizeSubjectLines(["Subject: Help neighbors [1]", "help neighbors", "", 42, '"Rebuild now"'])
      ).toEqual(["Help neighbors", "Rebuild now", DEFAULT_SUBJECT_LINE_FALLBACKS[0]]);
    });

    it("truncates long lists", () => {
      expect(normalizeSubjectLines(["One", "Two", "Three", "Four"])).toEqual(["One", "Two", "Three"]);
    });

    it("pads an empty list from the configured fallbacks first", () => {
      expect(normalizeSubjectLines([], ["Custom one"])).toEqual([
        "Custom one",
        DEFAULT_SUBJECT_LINE_FALLBACKS[0],
        DEFAULT_SUBJECT_LINE_FALLBACKS[1]
      ]);
    });

    it("omits subject lines when the draft supplied none", () => {
      expect(normalizeSubjectLines(undefined)).toBeUndefined();
      expect("subjectLines" in reconcile({ body_md: "Body." }, [])).toBe(false);
      expect(reconcile({ body_md: "Body.", subject_lines: ["Only one"] }, []).subjectLines).toHaveLength(3);
    });
  });
});
