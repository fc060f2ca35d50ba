/**
 * codecheck.yml — schema and types.
 */
import { z } from "zod";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

// ── People ───────────────────────────────────────────────────────────

/** Community files spell the key `ORCID`; both spellings are accepted. */
export const PersonSchema = z
  .object({
    name: z.string().min(1),
    orcid: optionalText,
    ORCID: optionalText,
  })
  .transform(({ name, orcid, ORCID }) => ({
    name,
    orcid: orcid ?? ORCID,
  }));

// ── Manifest ─────────────────────────────────────────────────────────

export const ManifestEntrySchema = z.object({
  file: z.string().min(1),
  comment: optionalText,
  size: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((v) => v ?? undefined),
});

// ── Configuration ────────────────────────────────────────────────────

export const CodecheckConfigSchema = z
  .object({
    certificate: z.string().min(1),
    report: z.string().min(1),
    paper: z.object({
      title: z.string().min(1),
      authors: z.array(PersonSchema).min(1),
      reference: z.string().min(1),
    }),
    repository: z.string().min(1),
    codechecker: PersonSchema,
    check_time: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}/, "must start with an ISO-8601 date (YYYY-MM-DD)"),
    summary: z.string(),
    manifest: z.array(ManifestEntrySchema),
  })
  .superRefine((conf, ctx) => {
    const seen = new Set<string>();
    conf.manifest.forEach((entry, i) => {
      if (seen.has(entry.file)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["manifest", i, "file"],
          message: `duplicate manifest entry "${entry.file}"`,
        });
      }
      seen.add(entry.file);
    });
  });

export type Person = z.infer<typeof PersonSchema>;
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type CodecheckConfig = z.infer<typeof CodecheckConfigSchema>;
