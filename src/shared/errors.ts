/**
 * Certificate Errors
 *
 * Every failure that stops a certificate from rendering is one of these.
 * None of them is caught inside the library; the caller decides.
 */

export class CertificateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CertificateError";
  }
}

/** Malformed YAML, an unreadable file, or a required field missing. */
export class ConfigParseError extends CertificateError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration ${source}:\n  - ${issues.join("\n  - ")}`, options);
    this.name = "ConfigParseError";
    this.source = source;
    this.issues = issues;
  }
}

/** A manifest entry names a file that is not in the outputs directory. */
export class FileResolutionError extends CertificateError {
  readonly file: string;
  readonly resolvedPath: string;

  constructor(file: string, resolvedPath: string, options?: { cause?: unknown }) {
    super(`Manifest file not found: ${file} (looked for ${resolvedPath})`, options);
    this.name = "FileResolutionError";
    this.file = file;
    this.resolvedPath = resolvedPath;
  }
}

/** A `.csv` manifest entry that cannot be read as tabular data. */
export class DataParseError extends CertificateError {
  readonly file: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not parse ${file} as CSV: ${reason}`, options);
    this.name = "DataParseError";
    this.file = file;
  }
}
