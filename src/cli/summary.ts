import type { Document } from "../markup/types.js";

/**
 * Plain-text outline printed by --check.
 */
export function summarizeDocument(document: Document): string {
  const lines: string[] = [];
  if (document.title !== undefined) lines.push(`title:  ${document.title}`);
  if (document.author !== undefined) lines.push(`author: ${document.author}`);
  if (document.date !== undefined) lines.push(`date:   ${document.date}`);
  lines.push(`pages:  ${document.pages.length}`);

  document.pages.forEach((page, index) => {
    const kinds = page.blocks.map((block) => block.kind);
    const detail = kinds.length > 0 ? `: ${kinds.join(", ")}` : "";
    const noun = kinds.length === 1 ? "block" : "blocks";
    lines.push(`  ${index + 1}. ${page.name} (${kinds.length} ${noun}${detail})`);
  });

  return lines.join("\n");
}
