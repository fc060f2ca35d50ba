#!/usr/bin/env tsx
/**
 * CLI: certificate:render
 *
 * Usage: npm run certificate:render -- [--config <codecheck.yml>] [--outputs <dir>]
 *                                      [--out <file.md>] [--figure-prefix <prefix>]
 *                                      [--figures on|off]
 *
 * Builds every certificate fragment in presentation order and writes a
 * single Markdown document for pandoc.
 */

import { writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { loadConfig } from "../config/loader.js";
import { ReportBuilder } from "../certificate/report_builder.js";
import { toMarkdownSource } from "../certificate/fragments.js";
import type { OutputFragment } from "../certificate/fragments.js";
import { resolveRenderConfig } from "../shared/render_config.js";
import type { RenderConfig } from "../shared/render_config.js";

/**
 * Fragments in presentation order. Figures come last because they only
 * render in the LaTeX/PDF output.
 */
export function certificateFragments(
  builder: ReportBuilder,
  includeFigures: boolean,
): OutputFragment[] {
  const fragments = [
    builder.titleAndMetadata(),
    builder.aboutCodecheck(),
    builder.manifestTable(),
    builder.csvFiles(),
    builder.citation(),
    builder.certificateCitation(),
  ];
  if (includeFigures) fragments.push(builder.latexFigures());
  return fragments.filter((f) => f.content.length > 0);
}

export function renderCertificate(cfg: RenderConfig): string {
  const config = loadConfig(cfg.configPath);
  const builder = new ReportBuilder(config, {
    outputsDir: cfg.outputsDir,
    figurePathPrefix: cfg.figurePathPrefix,
  });
  return certificateFragments(builder, cfg.includeFigures).map(toMarkdownSource).join("\n\n") + "\n";
}

function main() {
  let cfg: RenderConfig;
  try {
    cfg = resolveRenderConfig(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
    console.error(
      "Usage: npm run certificate:render -- [--config <file>] [--outputs <dir>] [--out <file>]",
    );
    process.exit(1);
  }

  console.error("╔══════════════════════════════════════════════════════════════╗");
  console.error("║  CODECHECK — Certificate Renderer                            ║");
  console.error("╚══════════════════════════════════════════════════════════════╝");
  console.error();
  console.error(`  Config:  ${cfg.configPath}`);
  console.error(`  Outputs: ${cfg.outputsDir}`);
  console.error();

  try {
    const document = renderCertificate(cfg);
    if (cfg.outPath) {
      writeFileSync(cfg.outPath, document, "utf-8");
      console.error(`  ✓ Certificate written to ${cfg.outPath}`);
    } else {
      process.stdout.write(document);
    }
  } catch (err: unknown) {
    console.error(`\n  ✗ Render failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main();
}
