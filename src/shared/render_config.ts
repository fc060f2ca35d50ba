/**
 * Render Configuration
 *
 * Where the certificate inputs live and where the rendered document goes:
 * - configPath:        codecheck.yml (default ../codecheck.yml)
 * - outputsDir:        manifest root (default <config dir>/outputs)
 * - outPath:           rendered Markdown; stdout when absent
 * - figurePathPrefix:  prefix of figure paths inside the document
 * - includeFigures:    emit LaTeX figure blocks
 *
 * `manifest:check` shares the config/outputs resolution.
 *
 * CLI arguments take priority over environment variables, which take
 * priority over defaults.
 */

import path from "path";

import { DEFAULT_CONFIG_PATH } from "../config/loader.js";

export interface RenderConfig {
  configPath: string;
  outputsDir: string;
  outPath: string | undefined;
  figurePathPrefix: string;
  includeFigures: boolean;
}

export type RenderEnv = Record<string, string | undefined>;

export interface CliFlags {
  /** Flags followed by a value, without the leading `--`. */
  values: string[];
  /** Flags that stand alone; read as `"true"`. */
  switches?: string[];
}

/**
 * Read `--flag value` pairs and bare switches. Unknown flags are errors.
 */
export function parseCliArgs(argv: string[], flags: CliFlags): Record<string, string> {
  const values = new Set(flags.values);
  const switches = new Set(flags.switches ?? []);
  const args: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const name = flag.startsWith("--") ? flag.slice(2) : "";
    if (switches.has(name)) {
      args[name] = "true";
      continue;
    }
    if (!values.has(name)) {
      throw new Error(`Unknown argument: ${flag}`);
    }
    if (i + 1 >= argv.length) {
      throw new Error(`Missing value for ${flag}`);
    }
    args[name] = argv[i + 1];
    i++;
  }
  return args;
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const v = raw.toLowerCase();
  if (v === "on" || v === "true" || v === "1") return true;
  if (v === "off" || v === "false" || v === "0") return false;
  throw new Error(`Expected on/off, got "${raw}"`);
}

export function resolveRenderConfig(argv: string[], env: RenderEnv = process.env): RenderConfig {
  const args = parseCliArgs(argv, {
    values: ["config", "outputs", "out", "figure-prefix", "figures"],
  });
  const configPath = args["config"] ?? env.CODECHECK_CONFIG ?? DEFAULT_CONFIG_PATH;
  return {
    configPath,
    outputsDir:
      args["outputs"] ?? env.CODECHECK_OUTPUTS_DIR ?? path.join(path.dirname(configPath), "outputs"),
    outPath: args["out"] ?? env.CODECHECK_OUT,
    figurePathPrefix: args["figure-prefix"] ?? env.CODECHECK_FIGURE_PREFIX ?? "outputs/",
    includeFigures: parseFlag(args["figures"] ?? env.CODECHECK_FIGURES, true),
  };
}

export interface ManifestCheckConfig {
  configPath: string;
  outputsDir: string;
  copyFrom?: string;
  /** Files were (or are to be) copied to the outputs root under their base names. */
  flatten?: boolean;
  dryRun?: boolean;
}

/** Options of `manifest:check`, with the same precedence as resolveRenderConfig(). */
export function resolveManifestCheckConfig(
  argv: string[],
  env: RenderEnv = process.env,
): ManifestCheckConfig {
  const args = parseCliArgs(argv, {
    values: ["config", "outputs", "copy-from"],
    switches: ["flatten", "dry-run"],
  });
  const configPath = args["config"] ?? env.CODECHECK_CONFIG ?? DEFAULT_CONFIG_PATH;
  return {
    configPath,
    outputsDir:
      args["outputs"] ?? env.CODECHECK_OUTPUTS_DIR ?? path.join(path.dirname(configPath), "outputs"),
    copyFrom: args["copy-from"],
    flatten: args["flatten"] === "true",
    dryRun: args["dry-run"] === "true",
  };
}
