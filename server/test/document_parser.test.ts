import { describe, expect, it } from "vitest";
import { DocumentParseError } from "../src/pipeline/errors.js";
import {
  analyzeDocument,
  detectFormat,
  detectLanguage,
  parseDocument,
  parseSectionsMechanical,
  preprocessDocument,
  shapeSections,
  validateSections
} from "../src/pipeline/document_parser.js";
import type { Section } from "../src/pipeline/schemas.js";

function section(order: number, title: string, body: string, level = 1): Section {
  return { title, body, level, order };
}

describe("document parser", () => {
  it("detects the format from the filename, then from heading lines", () => {
    expect(detectFormat("notes.MD", "plain words")).toBe("markdown");
    expect(detectFormat("notes.markdown", "")).toBe("markdown");
    expect(detectFormat("notes.txt", "# Looks like markdown")).toBe("plain");
    expect(detectFormat("notes", "intro\n## Heading")).toBe("markdown");
    expect(detectFormat("notes", "#hashtag only")).toBe("plain");
  });

  it("normalizes newlines, caps blank runs and spaces heading hashes", () => {
    expect(preprocessDocument("  #Intro\r\n\r\n\r\n\r\n\r\nbody  ")).toBe("# Intro\n\n\nbody");
    expect(preprocessDocument("## Already spaced\n  indented line")).toBe("## Already spaced\n  indented line");
  });

  it("splits markdown at headings, drops the preface and links parents", () => {
    const sections = parseSectionsMechanical("Preface\n# A\nalpha\n## B\nbeta\n\n\n\ngamma\n# C\n", "markdown");
    expect(sections).toEqual([
      { title: "A", body: "alpha", level: 1, order: 0 },
      { title: "B", body: "beta\n\ngamma", level: 2, order: 1, parentTitle: "A" },
      { title: "C", body: "", level: 1, order: 2 }
    ]);
  });

  it("recognizes numbered and all-caps headings in plain text only", () => {
    const text = "INTRO\nSome text.\n1. Setup\nDo things.\n2024\nyear line";
    expect(parseSectionsMechanical(text, "plain")).toEqual([
      { title: "INTRO", body: "Some text.", level: 1, order: 0 },
      { title: "Setup", body: "Do things.\n2024\nyear line", level: 1, order: 1 }
    ]);
    expect(parseSectionsMechanical(text, "markdown")).toEqual([{ title: "Document", body: text, level: 1, order: 0 }]);
  });

  it("rejects an empty document", () => {
    expect(() => parseSectionsMechanical("  \n ", "markdown")).toThrow(DocumentParseError);
    expect(() => parseDocument("", "plain")).toThrow("Document is empty");
  });

  it("merges short sections into their predecessor and splits long ones on paragraphs", () => {
    const p1 = `p1 ${"a".repeat(20)}`;
    const p2 = `p2 ${"b".repeat(20)}`;
    const shaped = shapeSections(
      [section(0, "A", "long enough body"), section(1, "B", "tiny"), section(2, "C", `${p1}\n\n${p2}`)],
      { minSectionLength: 10, maxSectionLength: 30 }
    );
    expect(shaped).toEqual([
      { title: "A", body: "long enough body\n\nB\ntiny", level: 1, order: 0 },
      { title: "C (part 1)", body: p1, level: 1, order: 1 },
      { title: "C (part 2)", body: p2, level: 1, order: 2 }
    ]);
  });

  it("keeps a short first section", () => {
    expect(shapeSections([section(0, "A", "x")]).map((s) => s.title)).toEqual(["A"]);
  });

  it("parses and shapes a document end to end", () => {
    const intro = "This opening paragraph is comfortably longer than fifty characters.";
    const sections = parseDocument(`# Intro\n${intro}\n\n#Tiny\nshort`, "markdown");
    expect(sections).toEqual([{ title: "Intro", body: `${intro}\n\nTiny\nshort`, level: 1, order: 0 }]);
  });

  it("detects the dominant script", () => {
    expect(detectLanguage("")).toBe("en-US");
    expect(detectLanguage("plain english text")).toBe("en-US");
    expect(detectLanguage("你好世界 hi")).toBe("zh-CN");
  });

  it("reports document statistics", () => {
    const analysis = analyzeDocument("# A\nalpha beta\n\n# B\ngamma", "markdown", [section(0, "A", "alpha beta"), section(1, "B", "gamma")]);
    expect(analysis).toEqual({
      format: "markdown",
      charCount: 25,
      wordCount: 7,
      lineCount: 5,
      paragraphCount: 2,
      headingCount: 2,
      language: "en-US",
      structureType: "sectioned",
      estimatedSlides: 2,
      estimatedDurationSeconds: { min: 60, max: 120, average: 90 }
    });
    expect(analyzeDocument("just text", "plain", [section(0, "Document", "just text")]).structureType).toBe("linear");
  });

  it("flags empty, short, long and untitled sections", () => {
    const result = validateSections([
      section(0, "Empty", ""),
      section(1, "Short", "tiny"),
      section(2, "Long", "x".repeat(2001)),
      section(3, "  ", "y".repeat(60))
    ]);

    expect(result.isValid).toBe(false);
    expect(result.qualityScore).toBe(0.3);
    expect(result.issues.map((i) => [i.type, i.sectionIndex])).toEqual([
      ["empty_section", 0],
      ["missing_title", 3]
    ]);
    expect(result.warnings.map((w) => w.message)).toEqual([
      "Section is short (4 chars)",
      "Section is long (2001 chars) and may need splitting"
    ]);
    expect(result.statistics).toEqual({
      totalSections: 4,
      emptySections: 1,
      shortSections: 1,
      longSections: 1,
      totalContentLength: 2065
    });
  });

  it("scores clean sections as 1 and no sections as 0", () => {
    expect(validateSections([section(0, "A", "a".repeat(60)), section(1, "B", "b".repeat(60))]).qualityScore).toBe(1);
    expect(validateSections([])).toMatchObject({ isValid: true, qualityScore: 0 });
  });
});
