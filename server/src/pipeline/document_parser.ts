import { DocumentParseError } from "./errors.js";
import type { Section } from "./schemas.js";

export type DocumentFormat = "markdown" | "plain";

export type SectionShapeOptions = {
  minSectionLength: number;
  maxSectionLength: number;
};

export const DEFAULT_SHAPE_OPTIONS: SectionShapeOptions = {
  minSectionLength: 50,
  maxSectionLength: 2000
};

export const UNTITLED_SECTION_TITLE = "Document";

const SHORT_SECTION_CHARS = 50;
const LONG_SECTION_CHARS = 2000;
const CJK_RE = /[一-鿿぀-ヿ가-힯]/g;

export function detectFormat(filename: string, text: string): DocumentFormat {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".md") || lower.endsWith(".markdown")) return "markdown";
  if (lower.endsWith(".txt")) return "plain";
  return /^#{1,6} /m.test(text) ? "markdown" : "plain";
}

/** Normalizes newlines, keeps at most two blank lines in a row and puts a space after heading hashes. */
export function preprocessDocument(text: string): string {
  const lines = text.trim().replace(/\r\n?/g, "\n").split("\n");
  const out: string[] = [];
  let blankRun = 0;
  for (const line of lines) {
    if (line.trim().length === 0) {
      blankRun += 1;
      if (blankRun <= 2) out.push("");
      continue;
    }
    blankRun = 0;
    const trimmed = line.trim();
    if (trimmed.startsWith("#")) {
      out.push(trimmed.replace(/^(#+)(?=[^#\s])/, "$1 "));
    } else {
      out.push(line);
    }
  }
  return out.join("\n");
}

function isAllCaps(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

type Heading = { level: number; title: string };

function headingOf(line: string, format: DocumentFormat): Heading | null {
  const md = /^(#{1,6})\s+(.+)$/.exec(line);
  if (md) return { level: md[1].length, title: md[2].replace(/\s+#+\s*$/, "").trim() };
  if (format !== "plain") return null;

  const numbered = /^\d+\.?\s+(\S.*)$/.exec(line);
  if (numbered && line.length < 80) return { level: 1, title: numbered[1].trim() };
  if (line.length < 50 && isAllCaps(line) && !/^\d+$/.test(line)) return { level: 1, title: line };
  return null;
}

function withParents(sections: readonly Omit<Section, "parentTitle">[]): Section[] {
  const out: Section[] = [];
  for (const [order, s] of sections.entries()) {
    const parent = [...out].reverse().find((prev) => prev.level < s.level);
    out.push({ title: s.title, body: s.body, level: s.level, order, ...(parent ? { parentTitle: parent.title } : {}) });
  }
  return out;
}

function joinBody(lines: readonly string[]): string {
  // Paragraph breaks survive as a single blank line.
  return lines
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Splits preprocessed text at heading lines. Text before the first heading is dropped; a document
 * without headings becomes a single section.
 */
export function parseSectionsMechanical(text: string, format: DocumentFormat): Section[] {
  if (text.trim().length === 0) throw new DocumentParseError("Document is empty");

  const raw: { title: string; level: number; lines: string[] }[] = [];
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    const heading = line ? headingOf(line, format) : null;
    if (heading) {
      raw.push({ title: heading.title, level: heading.level, lines: [] });
      continue;
    }
    const current = raw[raw.length - 1];
    if (current) current.lines.push(line);
  }

  if (raw.length === 0) {
    return [{ title: UNTITLED_SECTION_TITLE, body: text.trim(), level: 1, order: 0 }];
  }
  return withParents(raw.map((r, order) => ({ title: r.title, body: joinBody(r.lines), level: r.level, order })));
}

function splitLongSection(section: Section, maxLength: number): Section[] {
  const paragraphs = section.body.split("\n\n");
  const parts: string[][] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const paragraph of paragraphs) {
    if (currentLength + paragraph.length > maxLength && current.length > 0) {
      parts.push(current);
      current = [];
      currentLength = 0;
    }
    current.push(paragraph);
    currentLength += paragraph.length;
  }
  if (current.length > 0) parts.push(current);

  if (parts.length === 1) return [section];
  return parts.map((p, i) => ({
    title: `${section.title} (part ${i + 1})`,
    body: p.join("\n\n").trim(),
    level: section.level,
    order: section.order
  }));
}

/** Merges short sections into their predecessor, splits long ones on paragraphs, renumbers. */
export function shapeSections(sections: readonly Section[], options: SectionShapeOptions = DEFAULT_SHAPE_OPTIONS): Section[] {
  const out: Section[] = [];
  let pending: Section | null = null;

  for (const section of sections) {
    const length = section.body.trim().length;
    if (length < options.minSectionLength && pending) {
      const merged = [pending.body, `${section.title}\n${section.body}`.trim()].filter((p) => p.length > 0).join("\n\n");
      const mergedSection: Section = { ...pending, body: merged };
      pending = mergedSection;
      continue;
    }
    if (pending) out.push(pending);

    if (length > options.maxSectionLength) {
      out.push(...splitLongSection(section, options.maxSectionLength));
      pending = null;
    } else {
      pending = section;
    }
  }
  if (pending) out.push(pending);

  return withParents(out.map((s) => ({ title: s.title, body: s.body, level: s.level, order: s.order })));
}

export function parseDocument(
  text: string,
  format: DocumentFormat,
  options: SectionShapeOptions = DEFAULT_SHAPE_OPTIONS
): Section[] {
  const processed = preprocessDocument(text);
  return shapeSections(parseSectionsMechanical(processed, format), options);
}

export type StructureType = "linear" | "sectioned" | "hierarchical";

export type DocumentAnalysis = {
  format: DocumentFormat;
  charCount: number;
  wordCount: number;
  lineCount: number;
  paragraphCount: number;
  headingCount: number;
  language: "zh-CN" | "en-US";
  structureType: StructureType;
  estimatedSlides: number;
  estimatedDurationSeconds: { min: number; max: number; average: number };
};

export function detectLanguage(text: string): "zh-CN" | "en-US" {
  const visible = text.replace(/\s+/g, "");
  if (visible.length === 0) return "en-US";
  const cjk = visible.match(CJK_RE)?.length ?? 0;
  return cjk / visible.length > 0.3 ? "zh-CN" : "en-US";
}

export function analyzeDocument(text: string, format: DocumentFormat, sections: readonly Section[]): DocumentAnalysis {
  const processed = preprocessDocument(text);
  const lines = processed.split("\n");
  const headingCount = lines.filter((l) => headingOf(l.trim(), format) !== null).length;
  const slides = sections.length;
  const min = slides * 30;
  const max = slides * 60;

  return {
    format,
    charCount: processed.length,
    wordCount: processed.split(/\s+/).filter((w) => w.length > 0).length,
    lineCount: lines.length,
    paragraphCount: processed.split("\n\n").filter((p) => p.trim().length > 0).length,
    headingCount,
    language: detectLanguage(processed),
    structureType: headingCount > 5 ? "hierarchical" : headingCount > 0 ? "sectioned" : "linear",
    estimatedSlides: slides,
    estimatedDurationSeconds: { min, max, average: Math.floor((min + max) / 2) }
  };
}

export type ValidationFinding = {
  type: "empty_section" | "missing_title" | "short_section" | "long_section";
  sectionIndex: number;
  sectionTitle: string;
  message: string;
};

export type DocumentValidation = {
  isValid: boolean;
  qualityScore: number;
  issues: ValidationFinding[];
  warnings: ValidationFinding[];
  statistics: {
    totalSections: number;
    emptySections: number;
    shortSections: number;
    longSections: number;
    totalContentLength: number;
  };
};

export function validateSections(sections: readonly Section[]): DocumentValidation {
  const issues: ValidationFinding[] = [];
  const warnings: ValidationFinding[] = [];
  const statistics = { totalSections: sections.length, emptySections: 0, shortSections: 0, longSections: 0, totalContentLength: 0 };

  for (const [i, s] of sections.entries()) {
    const length = s.body.trim().length;
    statistics.totalContentLength += length;
    const base = { sectionIndex: i, sectionTitle: s.title };

    if (length === 0) {
      statistics.emptySections += 1;
      issues.push({ ...base, type: "empty_section", message: "Section has no content" });
    } else if (length < SHORT_SECTION_CHARS) {
      statistics.shortSections += 1;
      warnings.push({ ...base, type: "short_section", message: `Section is short (${length} chars)` });
    } else if (length > LONG_SECTION_CHARS) {
      statistics.longSections += 1;
      warnings.push({ ...base, type: "long_section", message: `Section is long (${length} chars) and may need splitting` });
    }

    if (s.title.trim().length === 0) {
      issues.push({ ...base, type: "missing_title", message: "Section has no title" });
    }
  }

  let score = 1 - issues.length * 0.2 - warnings.length * 0.1 - statistics.emptySections * 0.1;
  if (sections.length === 0) score = 0;
  const qualityScore = Math.round(Math.min(1, Math.max(0, score)) * 10_000) / 10_000;

  return { isValid: issues.length === 0, qualityScore, issues, warnings, statistics };
}
