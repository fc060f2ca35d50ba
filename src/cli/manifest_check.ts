#!/usr/bin/env tsx
/**
 * CLI: manifest:check
 *
 * Usage: npm run manifest:check -- [--config <codecheck.yml>] [--outputs <dir>]
 *                                  [--copy-from <dir>] [--flatten] [--dry-run]
 *
 * Optionally copies manifest files into the outputs directory, then reports
 * unsafe paths, missing files and size mismatches. Exits 1 on any problem.
 */

import path from "path";
import { fileURLToPath } from "url";

import { loadConfig } from "../config/loader.js";
import { ManifestProcessor } from "../manifest/processor.js";
import { resolveManifestCheckConfig } from "../shared/render_config.js";
import type { ManifestCheckConfig } from "../shared/render_config.js";

export type ManifestCheckOptions = ManifestCheckConfig;

export interface ManifestCheckResult {
  passed: boolean;
  lines: string[];
}

export function checkManifest(opts: ManifestCheckOptions): ManifestCheckResult {
  const config = loadConfig(opts.configPath);
  const processor = new ManifestProcessor(config.manifest, opts.outputsDir);
  const lines: string[] = [];
  let passed = true;

  const paths = processor.validatePaths();
  if (!paths.allSafe) {
    passed = false;
    lines.push("Unsafe paths:");
    for (const p of paths.unsafe) lines.push(`  - ${p}`);
    // copying or stat-ing an unsafe path would leave the outputs directory
    return { passed, lines };
  }

  if (opts.copyFrom) {
    const copied = processor.copyManifestFiles(opts.copyFrom, {
      keepFullPath: !opts.flatten,
      dryRun: opts.dryRun,
    });
    lines.push(`${opts.dryRun ? "Would copy" : "Copied"} ${copied.length} file(s):`);
    for (const c of copied) lines.push(`  - ${c.file} (${(c.size / 1024).toFixed(1)} KB)`);
  }

  const existence = processor.validateOutputFilesExist({ flatten: opts.flatten });
  if (!existence.allExist) {
    passed = false;
    lines.push("Missing files:");
    for (const m of existence.missing) lines.push(`  - ${m}`);
  }

  const mismatches = processor.compareSizes({ flatten: opts.flatten });
  if (mismatches.length > 0) {
    passed = false;
    lines.push("Size mismatches:");
    for (const m of mismatches) {
      lines.push(`  - ${m.file}: declared ${m.declared}, actual ${m.actual} (${m.difference > 0 ? "+" : ""}${m.difference})`);
    }
  }

  if (passed) lines.push(`All ${config.manifest.length} manifest file(s) present.`);
  return { passed, lines };
}

function main() {
  let opts: ManifestCheckOptions;
  try {
    opts = resolveManifestCheckConfig(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
    console.error(
      "Usage: npm run manifest:check -- [--config <file>] [--outputs <dir>] [--copy-from <dir>] [--flatten] [--dry-run]",
    );
    process.exit(1);
  }

  try {
    const result = checkManifest(opts);
    for (const line of result.lines) console.log(`  ${line}`);
    console.log();
    console.log(result.passed ? "  ✓ Manifest check PASSED" : "  ✗ Manifest check FAILED");
    if (!result.passed) process.exit(1);
  } catch (err: unknown) {
    console.error(`\n  ✗ Manifest check failed: ${err instanceof Error ? err.message : String(err)}`);
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
