/**
 * Config Loader Tests
 *
 * Verifies:
 * - Valid codecheck.yml loads into a frozen config
 * - ORCID keys are accepted in either case
 * - Missing fields and duplicate files are reported by path
 */

import { describe, it, expect, afterAll } from "vitest";
import { existsSync, rmSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig, parseConfig } from "../src/config/loader.js";
import { ConfigParseError } from "../src/shared/errors.js";
import { SAMPLE_CONFIG, writeCertificateProject } from "./helpers/fixtures.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEMP_ROOT = path.resolve(__dirname, ".tmp_config_test");

afterAll(() => {
  if (existsSync(TEMP_ROOT)) {
    rmSync(TEMP_ROOT, { recursive: true, force: true });
  }
});

function parseError(fn: () => unknown): ConfigParseError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigParseError) return err;
    throw err;
  }
  throw new Error("expected ConfigParseError");
}

describe("parseConfig", () => {
  it("reads every top-level field", () => {
    const conf = parseConfig(SAMPLE_CONFIG);
    expect(conf.certificate).toBe("2024-001");
    expect(conf.report).toBe("https://doi.org/10.5281/zenodo.1234");
    expect(conf.paper.title).toBe("Effects of x_1 on growth");
    expect(conf.paper.reference).toBe("https://doi.org/10.1000/paper.42");
    expect(conf.repository).toBe("https://github.com/example/check-repo");
    expect(conf.summary).toBe("Reproduced all figures.\nMinor 5% differences & rounding.\n");
    expect(conf.manifest).toHaveLength(5);
  });

  it("keeps timestamps as strings", () => {
    const conf = parseConfig(SAMPLE_CONFIG);
    expect(conf.check_time).toBe("2024-03-05T10:30:00");
  });

  it("accepts ORCID and orcid spellings and leaves missing ones absent", () => {
    const conf = parseConfig(SAMPLE_CONFIG);
    expect(conf.paper.authors).toEqual([
      { name: "Ada Lovelace", orcid: "0000-0001-2345-6789" },
      { name: "Alan Turing", orcid: undefined },
    ]);
    expect(conf.codechecker).toEqual({ name: "Grace Hopper", orcid: "0000-0002-0000-0001" });
  });

  it("optional manifest fields default to absent", () => {
    const conf = parseConfig(SAMPLE_CONFIG);
    expect(conf.manifest[2]).toEqual({
      file: "figures/Fig_2.EPS",
      comment: undefined,
      size: undefined,
    });
    expect(conf.manifest[4].size).toBe(99);
  });

  it("returns a frozen record", () => {
    const conf = parseConfig(SAMPLE_CONFIG);
    expect(Object.isFrozen(conf)).toBe(true);
    expect(Object.isFrozen(conf.manifest)).toBe(true);
    expect(Object.isFrozen(conf.paper.authors[0])).toBe(true);
  });

  it("reports missing required fields by path", () => {
    const text = SAMPLE_CONFIG.replace("  title: Effects of x_1 on growth\n", "");
    const err = parseError(() => parseConfig(text, "codecheck.yml"));
    expect(err.source).toBe("codecheck.yml");
    expect(err.issues).toEqual(["paper.title: Required"]);
  });

  it("rejects a missing manifest", () => {
    const text = SAMPLE_CONFIG.slice(0, SAMPLE_CONFIG.indexOf("manifest:"));
    const err = parseError(() => parseConfig(text));
    expect(err.issues).toEqual(["manifest: Required"]);
  });

  it("rejects duplicate manifest entries", () => {
    const text = SAMPLE_CONFIG + "  - file: fig.pdf\n";
    const err = parseError(() => parseConfig(text));
    expect(err.issues).toEqual(['manifest.5.file: duplicate manifest entry "fig.pdf"']);
  });

  it("rejects negative sizes", () => {
    const text = SAMPLE_CONFIG.replace("size: 99", "size: -1");
    const err = parseError(() => parseConfig(text));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^manifest\.4\.size: /);
  });

  it("rejects a check_time without a date", () => {
    const text = SAMPLE_CONFIG.replace("check_time: 2024-03-05T10:30:00", "check_time: soon");
    const err = parseError(() => parseConfig(text));
    expect(err.issues).toEqual([
      "check_time: must start with an ISO-8601 date (YYYY-MM-DD)",
    ]);
  });

  it("wraps YAML syntax errors", () => {
    const err = parseError(() => parseConfig("certificate: [unclosed\n"));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^invalid YAML: /);
  });

  it("rejects an empty document", () => {
    const err = parseError(() => parseConfig(""));
    expect(err.issues).toEqual(["document is empty"]);
  });
});

describe("loadConfig", () => {
  it("loads a file from disk", () => {
    const configPath = writeCertificateProject(TEMP_ROOT);
    const conf = loadConfig(configPath);
    expect(conf.certificate).toBe("2024-001");
  });

  it("fails for a missing file", () => {
    const missing = path.join(TEMP_ROOT, "nope.yml");
    const err = parseError(() => loadConfig(missing));
    expect(err.source).toBe(missing);
    expect(err.issues).toEqual(["file not found"]);
  });
});
