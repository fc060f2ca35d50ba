/**
 * Manifest Processor — resolves manifest entries against the outputs directory.
 *
 * Every entry must exist on disk, declared size or not.
 * Sizes, existence checks, declared-vs-actual comparison, summary counts,
 * path safety, and copying files into the outputs directory.
 */

import { copyFileSync, existsSync, mkdirSync, statSync } from "fs";
import path from "path";

import type { ManifestEntry } from "../config/types.js";
import { FileResolutionError } from "../shared/errors.js";
import { round } from "../analytics/stats.js";

export interface ResolvedManifestEntry {
  file: string;
  comment: string | undefined;
  /** Declared size, or the size read from disk when none was declared. The file exists either way. */
  size: number;
  /** `file`, or its base name when directory names are removed. */
  displayPath: string;
  absolutePath: string;
}

export interface SizeMismatch {
  file: string;
  declared: number;
  actual: number;
  difference: number;
}

export interface ManifestSummary {
  totalFiles: number;
  totalSize: number;
  totalSizeMb: number;
  /** Lower-cased extension (`""` for none) → number of files. */
  fileTypes: Record<string, number>;
  withComments: number;
}

export interface CopiedFile {
  file: string;
  source: string;
  destination: string;
  size: number;
  comment: string;
}

export interface CopyOptions {
  /** Keep directory structure below the outputs directory. Default true. */
  keepFullPath?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
}

/** Lower-cased extension including the dot, `""` when there is none. */
export function fileExtension(file: string): string {
  return path.extname(file).toLowerCase();
}

export class ManifestProcessor {
  readonly outputsDir: string;

  constructor(
    private readonly manifest: readonly ManifestEntry[],
    outputsDir: string,
  ) {
    this.outputsDir = path.resolve(outputsDir);
  }

  pathFor(file: string): string {
    return path.join(this.outputsDir, file);
  }

  /** Absolute path of an entry that must exist on disk. */
  requirePath(entry: ManifestEntry): string {
    const absolutePath = this.pathFor(entry.file);
    if (!existsSync(absolutePath)) {
      throw new FileResolutionError(entry.file, absolutePath);
    }
    return absolutePath;
  }

  /**
   * Where an entry sits in the outputs directory; at its base name when
   * the files were copied in flattened.
   */
  locate(file: string, flatten = false): string {
    return flatten ? path.join(this.outputsDir, path.basename(file)) : this.pathFor(file);
  }

  /**
   * Size of one entry: declared, else read from disk. The file must exist
   * either way; a missing file throws FileResolutionError.
   */
  resolveSize(entry: ManifestEntry): number {
    const absolutePath = this.requirePath(entry);
    if (entry.size !== undefined) return entry.size;
    try {
      return statSync(absolutePath).size;
    } catch (err: unknown) {
      throw new FileResolutionError(entry.file, absolutePath, { cause: err });
    }
  }

  /**
   * Every entry in manifest order. All entries are resolved before
   * anything is returned, so a missing file yields no partial result.
   */
  resolveEntries(opts: { removeDirname?: boolean } = {}): ResolvedManifestEntry[] {
    const removeDirname = opts.removeDirname ?? true;
    return this.manifest.map((entry) => ({
      file: entry.file,
      comment: entry.comment,
      size: this.resolveSize(entry),
      displayPath: removeDirname ? path.basename(entry.file) : entry.file,
      absolutePath: this.pathFor(entry.file),
    }));
  }

  /** Entries whose lower-cased extension is in `extensions`. */
  filterByExtension(extensions: readonly string[]): ManifestEntry[] {
    const wanted = new Set(extensions.map((e) => e.toLowerCase()));
    return this.manifest.filter((e) => wanted.has(fileExtension(e.file)));
  }

  validateOutputFilesExist(opts: { flatten?: boolean } = {}): {
    allExist: boolean;
    missing: string[];
  } {
    const missing = this.manifest
      .filter((e) => !existsSync(this.locate(e.file, opts.flatten)))
      .map((e) => e.file);
    return { allExist: missing.length === 0, missing };
  }

  /** Declared sizes that differ from disk. Undeclared or missing files are skipped. */
  compareSizes(opts: { flatten?: boolean } = {}): SizeMismatch[] {
    const mismatches: SizeMismatch[] = [];
    for (const entry of this.manifest) {
      if (entry.size === undefined) continue;
      const full = this.locate(entry.file, opts.flatten);
      if (!existsSync(full)) continue;
      const actual = statSync(full).size;
      if (actual !== entry.size) {
        mismatches.push({
          file: entry.file,
          declared: entry.size,
          actual,
          difference: actual - entry.size,
        });
      }
    }
    return mismatches;
  }

  /** Counts and total size; sizes resolve like resolveEntries(). */
  summary(): ManifestSummary {
    const fileTypes: Record<string, number> = {};
    let totalSize = 0;
    for (const entry of this.manifest) {
      totalSize += this.resolveSize(entry);
      const ext = fileExtension(entry.file);
      fileTypes[ext] = (fileTypes[ext] ?? 0) + 1;
    }
    return {
      totalFiles: this.manifest.length,
      totalSize,
      totalSizeMb: round(totalSize / (1024 * 1024), 2),
      fileTypes,
      withComments: this.manifest.filter((e) => e.comment).length,
    };
  }

  /** Absolute paths, `..` segments, and paths leaving the outputs directory are unsafe. */
  validatePaths(): { allSafe: boolean; unsafe: string[] } {
    const unsafe: string[] = [];
    for (const entry of this.manifest) {
      const segments = entry.file.split(/[\\/]/);
      if (path.isAbsolute(entry.file) || segments.includes("..")) {
        unsafe.push(entry.file);
        continue;
      }
      const rel = path.relative(this.outputsDir, path.resolve(this.outputsDir, entry.file));
      if (rel.startsWith("..") || path.isAbsolute(rel)) unsafe.push(entry.file);
    }
    return { allSafe: unsafe.length === 0, unsafe };
  }

  /**
   * Copy manifest files from `sourceDir` into the outputs directory.
   * Entries missing from `sourceDir` are skipped.
   */
  copyManifestFiles(sourceDir: string, opts: CopyOptions = {}): CopiedFile[] {
    const keepFullPath = opts.keepFullPath ?? true;
    const overwrite = opts.overwrite ?? true;
    const dryRun = opts.dryRun ?? false;

    if (!dryRun) mkdirSync(this.outputsDir, { recursive: true });

    const copied: CopiedFile[] = [];
    for (const entry of this.manifest) {
      const src = path.join(sourceDir, entry.file);
      if (!existsSync(src)) continue;

      const dst = this.locate(entry.file, !keepFullPath);
      if (existsSync(dst) && !overwrite) continue;

      if (!dryRun) {
        mkdirSync(path.dirname(dst), { recursive: true });
        copyFileSync(src, dst);
      }
      copied.push({
        file: entry.file,
        source: src,
        destination: dst,
        size: statSync(src).size,
        comment: entry.comment ?? "",
      });
    }
    return copied;
  }
}
