/**
 * Config Loader — reads codecheck.yml into a typed, frozen CodecheckConfig.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { load, CORE_SCHEMA, YAMLException } from "js-yaml";

import { CodecheckConfigSchema } from "./types.js";
import type { CodecheckConfig } from "./types.js";
import { ConfigParseError } from "../shared/errors.js";

export const DEFAULT_CONFIG_PATH = path.join("..", "codecheck.yml");

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse YAML text. `source` names the document in error messages.
 *
 * The core schema keeps timestamps such as `check_time` as strings.
 */
export function parseConfig(text: string, source = "<inline>"): CodecheckConfig {
  let raw: unknown;
  try {
    raw = load(text, { schema: CORE_SCHEMA, filename: source });
  } catch (err: unknown) {
    if (err instanceof YAMLException) {
      throw new ConfigParseError(source, [`invalid YAML: ${err.message}`], { cause: err });
    }
    throw err;
  }

  if (raw === null || raw === undefined) {
    throw new ConfigParseError(source, ["document is empty"]);
  }

  const parsed = CodecheckConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigParseError(
      source,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Load a codecheck.yml file. Defaults to `../codecheck.yml`.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): CodecheckConfig {
  if (!existsSync(configPath)) {
    throw new ConfigParseError(configPath, ["file not found"]);
  }
  const text = readFileSync(configPath, "utf-8");
  return parseConfig(text, configPath);
}
