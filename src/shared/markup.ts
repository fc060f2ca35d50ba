/**
 * Markup helpers — escaping and small builders for the two fragment formats.
 *
 * Markdown text from the configuration (titles, names, comments, summaries)
 * goes through escapeMarkdown() so free text cannot open emphasis, links,
 * table cells or math. LaTeX fragments use escapeLatex().
 */

// ── Markdown ───────────────────────────────────────────────────────

/** ASCII punctuation that Markdown (and pandoc's LaTeX writer) treat as markup. */
const MARKDOWN_RESERVED = /[\\`*_{}[\]<>#|&%$~^]/g;
const MARKDOWN_ESCAPED = /\\([\\`*_{}[\]<>#|&%$~^])/g;

export function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_RESERVED, "\\$&");
}

/** Inverse of escapeMarkdown(). */
export function unescapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_ESCAPED, "$1");
}

/** Link text for a URL: everything after the scheme, or the value itself. */
export function linkDisplay(url: string): string {
  const idx = url.indexOf("://");
  return idx === -1 ? url : url.slice(idx + 3);
}

const URL_RE = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;

/** `[display](url)` when the whole value is a URL, escaped plain text otherwise. */
export function markdownLink(url: string): string {
  if (!URL_RE.test(url)) return escapeMarkdown(url);
  return `[${escapeMarkdown(linkDisplay(url))}](${url})`;
}

/** Collapse runs of whitespace (including newlines) so text fits in one table cell. */
export function singleLine(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export type ColumnAlign = "left" | "right";

/**
 * Pipe table. Cells are inserted as given; escape them first.
 */
export function markdownTable(
  columns: string[],
  align: ColumnAlign[],
  rows: string[][],
): string {
  const rule = columns.map((_, i) => (align[i] === "right" ? "---:" : ":---"));
  const line = (cells: string[]) => `| ${cells.join(" | ")} |`;
  return [line(columns), line(rule), ...rows.map(line)].join("\n");
}

/** Fixed-point number, `nan` for values that are not finite. */
export function formatFixed(value: number, decimals: number): string {
  if (!Number.isFinite(value)) return "nan";
  return value.toFixed(decimals);
}

// ── LaTeX ──────────────────────────────────────────────────────────

const LATEX_REPLACEMENTS: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "&": "\\&",
  "%": "\\%",
  $: "\\$",
  "#": "\\#",
  _: "\\_",
  "{": "\\{",
  "}": "\\}",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}",
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, (ch) => LATEX_REPLACEMENTS[ch] ?? ch);
}
