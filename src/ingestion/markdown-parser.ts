/**
 * Markdown section parser for knowledge ingestion.
 *
 * Splits curated health documents into discrete sections by ## headings.
 * Each section becomes one SourceDocument, which the chunker slices
 * further when it is longer than the chunk size.
 */

import type { SourceDocument } from '../knowledge/types.js';

export interface ParsedSection {
  title: string;        // Full title: "Sleep > Duration" (docTitle > heading)
  heading: string;      // Just the heading text: "Duration"
  content: string;      // Everything under heading until next ## or EOF
  sourceFile: string;   // Filename: "sleep.md"
  sectionIndex: number; // 0-based index within file
}

/**
 * Lowercase, dash-separated slug: "Heart rate" -> "heart-rate".
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/\.md$/, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Parse a markdown file into discrete sections split on ## headings.
 *
 * - The # (level 1) heading is the doc title, used as prefix: "DocTitle > SectionHeading"
 * - ### subsections stay within their parent ## section (not split separately)
 * - Sections with empty content after trimming are skipped
 * - Content before the first ## heading is skipped
 * - ## inside fenced code blocks are not treated as headings
 */
export function parseMarkdownSections(
  fileContent: string,
  sourceFile: string,
): ParsedSection[] {
  const lines = fileContent.split(/\r?\n/);
  const sections: ParsedSection[] = [];

  let docTitle = '';
  let currentHeading = '';
  let currentLines: string[] = [];
  let sectionIndex = 0;
  let inCodeBlock = false;

  const flush = (): void => {
    if (!currentHeading) return;
    const content = currentLines.join('\n').trim();
    if (content.length === 0) return;
    sections.push({
      title: docTitle ? `${docTitle} > ${currentHeading}` : currentHeading,
      heading: currentHeading,
      content,
      sourceFile,
      sectionIndex,
    });
    sectionIndex++;
  };

  for (const line of lines) {
    if (line.trimStart().startsWith('```')) {
      inCodeBlock = !inCodeBlock;
    }

    if (inCodeBlock) {
      if (currentHeading) {
        currentLines.push(line);
      }
      continue;
    }

    // Document title (# heading) -- only match single # not ##
    if (/^# (?!#)/.test(line)) {
      docTitle = line.slice(2).trim();
      continue;
    }

    // Section heading (## heading) -- only match exactly ## not ###
    if (/^## (?!#)/.test(line)) {
      flush();
      currentHeading = line.slice(3).trim();
      currentLines = [];
      continue;
    }

    if (currentHeading) {
      currentLines.push(line);
    }
  }

  flush();
  return sections;
}

/**
 * Parses a markdown file straight into source documents with stable ids
 * (`<file-slug>/<heading-slug>`). Files without ## sections become a
 * single document holding the whole body.
 */
export function markdownToDocuments(fileContent: string, sourceFile: string): SourceDocument[] {
  const fileSlug = slugify(sourceFile);
  const sections = parseMarkdownSections(fileContent, sourceFile);

  if (sections.length === 0) {
    const body = fileContent.replace(/^# .*$/m, '').trim();
    return body.length > 0 ? [{ id: fileSlug, title: fileSlug, text: body }] : [];
  }

  const used = new Set<string>();
  return sections.map((s) => {
    let id = `${fileSlug}/${slugify(s.heading) || `section-${s.sectionIndex}`}`;
    // Repeated headings within one file get their index appended
    if (used.has(id)) id = `${id}-${s.sectionIndex}`;
    used.add(id);
    return { id, title: s.title, text: s.content };
  });
}
