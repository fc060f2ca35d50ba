/**
 * Output fragments handed to the document pipeline.
 *
 * `markdown` fragments can sit next to prose; `latex` fragments are raw
 * markup that only the LaTeX/PDF output understands.
 */

export type FragmentFormat = "markdown" | "latex";

export interface OutputFragment {
  format: FragmentFormat;
  content: string;
}

export function markdown(content: string): OutputFragment {
  return { format: "markdown", content };
}

export function latex(content: string): OutputFragment {
  return { format: "latex", content };
}

/** Wrap a LaTeX fragment in a pandoc raw block so it survives inside Markdown. */
export function toMarkdownSource(fragment: OutputFragment): string {
  if (fragment.format === "markdown") return fragment.content;
  return ["```{=latex}", fragment.content, "```"].join("\n");
}
