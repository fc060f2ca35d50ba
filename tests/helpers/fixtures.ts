/**
 * Shared certificate fixture: a codecheck.yml beside an outputs/ directory.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";

export const SAMPLE_CONFIG = `certificate: "2024-001"
report: https://doi.org/10.5281/zenodo.1234
paper:
  title: Effects of x_1 on growth
  authors:
    - name: Ada Lovelace
      ORCID: 0000-0001-2345-6789
    - name: Alan Turing
  reference: https://doi.org/10.1000/paper.42
repository: https://github.com/example/check-repo
codechecker:
  name: Grace Hopper
  orcid: 0000-0002-0000-0001
check_time: 2024-03-05T10:30:00
summary: |
  Reproduced all figures.
  Minor 5% differences & rounding.
manifest:
  - file: results/table_1.csv
    comment: Main results
  - file: fig.pdf
    comment: Figure 1
  - file: figures/Fig_2.EPS
  - file: fig.png
    comment: Raster version
  - file: notes.txt
    size: 99
`;

/** Output files of SAMPLE_CONFIG; sizes in bytes: 19, 9, 5, 3, 6. */
export const SAMPLE_OUTPUTS: Record<string, string> = {
  "results/table_1.csv": "a,b\n1,10\n2,20\n3,30\n",
  "fig.pdf": "%PDF-1.4\n",
  "figures/Fig_2.EPS": "%!PS\n",
  "fig.png": "PNG",
  "notes.txt": "hello\n",
};

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    mkdirSync(path.dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}

/**
 * Write `codecheck.yml` and `outputs/` under `root`; returns the config path.
 */
export function writeCertificateProject(
  root: string,
  config: string = SAMPLE_CONFIG,
  outputs: Record<string, string> = SAMPLE_OUTPUTS,
): string {
  mkdirSync(root, { recursive: true });
  const configPath = path.join(root, "codecheck.yml");
  writeFileSync(configPath, config);
  writeFiles(path.join(root, "outputs"), outputs);
  return configPath;
}
