/**
 * Report Builder — turns a CodecheckConfig into certificate fragments.
 *
 * Each operation is independent and returns one OutputFragment. Nothing is
 * cached: files in the outputs directory are read again on every call.
 */

import path from "path";

import { loadConfig, DEFAULT_CONFIG_PATH } from "../config/loader.js";
import type { CodecheckConfig } from "../config/types.js";
import { ManifestProcessor } from "../manifest/processor.js";
import { readCsvTable, numericColumns } from "../data/csv_reader.js";
import type { CsvReadOptions } from "../data/csv_reader.js";
import { describe } from "../analytics/stats.js";
import {
  escapeLatex,
  escapeMarkdown,
  formatFixed,
  markdownLink,
  markdownTable,
  singleLine,
} from "../shared/markup.js";
import type { ColumnAlign } from "../shared/markup.js";
import { CertificateError } from "../shared/errors.js";
import { markdown, latex } from "./fragments.js";
import type { OutputFragment } from "./fragments.js";

export const DEFAULT_FIGURE_EXTENSIONS = [".pdf", ".eps"];

const ABOUT_CODECHECK =
  "This certificate confirms that the codechecker could independently reproduce the results " +
  "of a computational analysis given the data and code from a third party. A CODECHECK does " +
  "not check whether the original computation analysis is correct. However, as all materials " +
  "required for the reproduction are freely available by following the links in this document, " +
  "the reader can then study for themselves the code and data.";

const STATS_COLUMNS = ["Column", "count", "mean", "std", "min", "25%", "50%", "75%", "max"];

export interface ReportBuilderOptions {
  /** Directory the manifest paths are relative to. */
  outputsDir: string;
  /** Prefix of figure paths in `\includegraphics`, relative to the rendered document. */
  figurePathPrefix?: string;
  /** Largest figure width as a fraction of `\textwidth` (0–1]. */
  maxFigureWidth?: number;
  /** Logo image linked under the title. */
  logo?: string;
}

/** `Name`, or `Name (ORCID: [id](https://orcid.org/id))`. The ORCID is not altered. */
export function nameOrcid(name: string, orcid?: string): string {
  if (!orcid) return escapeMarkdown(name);
  return `${escapeMarkdown(name)} (ORCID: [${orcid}](https://orcid.org/${orcid}))`;
}

export class ReportBuilder {
  readonly config: CodecheckConfig;
  readonly outputsDir: string;
  private readonly figurePathPrefix: string;
  private readonly maxFigureWidth: number;
  private readonly logo: string | undefined;
  private readonly manifest: ManifestProcessor;

  constructor(config: CodecheckConfig, options: ReportBuilderOptions) {
    const maxFigureWidth = options.maxFigureWidth ?? 0.9;
    if (!(maxFigureWidth > 0 && maxFigureWidth <= 1)) {
      throw new CertificateError(
        `maxFigureWidth must be in (0, 1], got ${maxFigureWidth}`,
      );
    }

    this.config = config;
    this.manifest = new ManifestProcessor(config.manifest, options.outputsDir);
    this.outputsDir = this.manifest.outputsDir;
    this.figurePathPrefix = options.figurePathPrefix ?? "outputs/";
    this.maxFigureWidth = maxFigureWidth;
    this.logo = options.logo;
  }

  /**
   * Load `configPath` and build against `<config dir>/outputs` unless
   * `outputsDir` says otherwise.
   */
  static fromFile(
    configPath: string = DEFAULT_CONFIG_PATH,
    options: Partial<ReportBuilderOptions> = {},
  ): ReportBuilder {
    const config = loadConfig(configPath);
    return new ReportBuilder(config, {
      ...options,
      outputsDir: options.outputsDir ?? path.join(path.dirname(configPath), "outputs"),
    });
  }

  nameOrcid(name: string, orcid?: string): string {
    return nameOrcid(name, orcid);
  }

  // ── Title and metadata ────────────────────────────────────────────

  title(): OutputFragment {
    const lines = [
      `# CODECHECK certificate ${escapeMarkdown(this.config.certificate)} {-}`,
      `## ${markdownLink(this.config.report)} {-}`,
    ];
    if (this.logo) {
      lines.push(`[![CODECHECK logo](${this.logo})](https://codecheck.org.uk)`);
    }
    return markdown(lines.join("\n"));
  }

  summaryTable(): OutputFragment {
    const { paper, codechecker } = this.config;
    const rows: string[][] = [
      ["Title", `*${escapeMarkdown(singleLine(paper.title))}*`],
      ...paper.authors.map((a, i) => [i === 0 ? "Authors" : "", nameOrcid(a.name, a.orcid)]),
      ["Reference", markdownLink(paper.reference)],
      ["Repository", markdownLink(this.config.repository)],
      ["Codechecker", nameOrcid(codechecker.name, codechecker.orcid)],
      ["Date of check", this.config.check_time.slice(0, 10)],
      ["Summary", escapeMarkdown(singleLine(this.config.summary))],
    ];
    return markdown(markdownTable(["Item", "Value"], ["left", "left"], rows));
  }

  titleAndMetadata(): OutputFragment {
    return markdown(`${this.title().content}\n\n${this.summaryTable().content}`);
  }

  summary(): OutputFragment {
    return markdown(escapeMarkdown(this.config.summary.trim()));
  }

  aboutCodecheck(): OutputFragment {
    return markdown(ABOUT_CODECHECK);
  }

  // ── Manifest ──────────────────────────────────────────────────────

  /**
   * `File | Comment | Size (b)`, one row per manifest entry.
   * A missing file throws FileResolutionError before any row is built.
   */
  manifestTable(opts: { removeDirname?: boolean } = {}): OutputFragment {
    const entries = this.manifest.resolveEntries(opts);
    const rows = entries.map((e) => [
      `\`${e.displayPath}\``,
      escapeMarkdown(singleLine(e.comment ?? "")),
      String(e.size),
    ]);
    return markdown(
      markdownTable(["File", "Comment", "Size (b)"], ["left", "left", "right"], rows),
    );
  }

  manifestSummary(): OutputFragment {
    const s = this.manifest.summary();
    const lines = [
      "### Manifest Summary",
      "",
      `- **Total files**: ${s.totalFiles}`,
      `- **Total size**: ${s.totalSize.toLocaleString("en-US")} bytes (${s.totalSizeMb.toFixed(2)} MB)`,
      `- **Files with comments**: ${s.withComments}`,
      "",
      "**File types:**",
      "",
    ];
    for (const ext of Object.keys(s.fileTypes).sort()) {
      lines.push(`- \`${ext || "(no extension)"}\`: ${s.fileTypes[ext]} file(s)`);
    }
    return markdown(lines.join("\n"));
  }

  // ── CSV summaries ─────────────────────────────────────────────────

  /**
   * Column statistics for every `.csv` entry, in manifest order.
   * Unparseable files throw DataParseError.
   */
  csvFiles(options: CsvReadOptions = {}): OutputFragment {
    const sections = this.manifest.filterByExtension([".csv"]).map((entry) => {
      const table = readCsvTable(this.manifest.requirePath(entry), entry.file, options);
      const columns = numericColumns(table, entry.file, options);

      const lines = [`### \`${entry.file}\` {-}`, ""];
      if (entry.comment) {
        lines.push(`Author comment: *${escapeMarkdown(singleLine(entry.comment))}*`, "");
      }
      lines.push("**Column summary statistics:**", "");

      if (columns.length === 0) {
        lines.push("*No numeric columns.*");
      } else {
        const rows = columns.map((c) => {
          const d = describe(c.values);
          return [
            escapeMarkdown(c.name),
            formatFixed(d.count, 0),
            ...[d.mean, d.std, d.min, d.q25, d.q50, d.q75, d.max].map((v) => formatFixed(v, 4)),
          ];
        });
        lines.push(
          markdownTable(
            STATS_COLUMNS,
            STATS_COLUMNS.map((_, i): ColumnAlign => (i === 0 ? "left" : "right")),
            rows,
          ),
        );
      }
      return lines.join("\n");
    });

    return markdown(sections.join("\n\n"));
  }

  // ── Figures ───────────────────────────────────────────────────────

  /**
   * One `figure` environment per entry with an extension in `extensions`
   * (compared lower-cased). Other entries produce nothing here; see
   * unembeddedFiles().
   */
  latexFigures(extensions: readonly string[] = DEFAULT_FIGURE_EXTENSIONS): OutputFragment {
    const width = `width=${this.maxFigureWidth}\\textwidth,height=0.8\\textheight,keepaspectratio`;
    const blocks = this.manifest.filterByExtension(extensions).map((entry) => {
      const lines = [
        "\\begin{figure}[htbp]",
        "\\centering",
        `\\texttt{${escapeLatex(entry.file)}}.\\\\`,
      ];
      if (entry.comment) {
        lines.push(`Author comment: \\emph{${escapeLatex(singleLine(entry.comment))}}\\\\`);
      }
      lines.push(
        `\\includegraphics[${width}]{${this.figurePathPrefix}${entry.file}}`,
        "\\end{figure}",
      );
      return lines.join("\n");
    });
    return latex(blocks.join("\n\n"));
  }

  /** Manifest files latexFigures() leaves out for the given extensions. */
  unembeddedFiles(extensions: readonly string[] = DEFAULT_FIGURE_EXTENSIONS): string[] {
    const embedded = new Set(this.manifest.filterByExtension(extensions).map((e) => e.file));
    return this.config.manifest.map((e) => e.file).filter((f) => !embedded.has(f));
  }

  // ── Citations ─────────────────────────────────────────────────────

  /** `<title> by <A, B>. <reference>. <report link>` */
  citation(): OutputFragment {
    const { paper } = this.config;
    const authors = paper.authors.map((a) => escapeMarkdown(a.name)).join(", ");
    return markdown(
      `${escapeMarkdown(singleLine(paper.title))} by ${authors}. ` +
        `${markdownLink(paper.reference)}. ${markdownLink(this.config.report)}`,
    );
  }

  /** How to cite the certificate itself. */
  certificateCitation(): OutputFragment {
    const year = this.config.check_time.slice(0, 4);
    return markdown(
      `${escapeMarkdown(this.config.codechecker.name)} (${year}). ` +
        `CODECHECK Certificate ${escapeMarkdown(this.config.certificate)}. ` +
        `Zenodo. ${markdownLink(this.config.report)}`,
    );
  }
}
