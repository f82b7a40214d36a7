/**
 * Templated answers used when the language model is unavailable or returns
 * nothing. Built only from normalized data; never from error text.
 */

import { formatPaper } from "./prompt";
import type { ResearchData } from "./normalize";

function unavailableNote(unavailable: string[]): string[] {
  return unavailable.length > 0
    ? [`Some information could not be retrieved right now: ${unavailable.join(", ")}.`]
    : [];
}

function body(data: ResearchData, limit: number): string[] {
  switch (data.kind) {
    case "papers":
      if (data.papers.length === 0) return ["I couldn't find any papers matching your search."];
      return [
        `I found ${data.papers.length} paper${data.papers.length === 1 ? "" : "s"}:`,
        data.papers.slice(0, limit).map((p, i) => formatPaper(p, i + 1)).join("\n"),
      ];

    case "author": {
      const author = data.authors[0];
      const lines: string[] = [];
      if (author) {
        const stats = [
          author.affiliation,
          author.paperCount !== undefined ? `${author.paperCount} papers` : undefined,
          author.citationCount !== undefined ? `${author.citationCount} citations` : undefined,
          author.hIndex !== undefined ? `h-index ${author.hIndex}` : undefined,
        ].filter((s): s is string => s !== undefined);
        lines.push(stats.length > 0 ? `${author.name} (${stats.join("; ")})` : author.name);
        if (author.researchInterests.length > 0) {
          lines.push(`Research interests: ${author.researchInterests.join(", ")}`);
        }
      }
      if (data.papers.length > 0) {
        lines.push("Papers:", data.papers.slice(0, limit).map((p, i) => formatPaper(p, i + 1)).join("\n"));
      }
      return lines.length > 0 ? lines : ["I couldn't find a matching author."];
    }

    case "citations": {
      const lines: string[] = [];
      if (data.paper) lines.push(`Paper: "${data.paper.title}"`);
      if (data.citingPapers.length > 0) {
        lines.push(
          `Cited by ${data.citingPapers.length} paper${data.citingPapers.length === 1 ? "" : "s"}, including:`,
          data.citingPapers.slice(0, limit).map((p, i) => formatPaper(p, i + 1)).join("\n"),
        );
      }
      if (data.network) {
        lines.push(`Citation network: ${data.network.nodes.length} papers and ${data.network.edges.length} citation links.`);
      }
      return lines.length > 0 ? lines : ["I couldn't find citation data for that paper."];
    }

    case "trends": {
      const lines: string[] = [];
      if (data.papers.length > 0) {
        lines.push(
          `Trending papers${data.timeWindow ? ` (${data.timeWindow})` : ""}:`,
          data.papers.slice(0, limit).map((p, i) => formatPaper(p, i + 1)).join("\n"),
        );
      }
      if (data.keywords.length > 0) {
        lines.push(`Frequent keywords: ${data.keywords.slice(0, 10).map(k => `${k.keyword} (${k.paperCount})`).join(", ")}`);
      }
      return lines.length > 0 ? lines : ["I couldn't find trend data for that field."];
    }

    case "keywords":
      if (data.keywords.length === 0) return ["I couldn't find keyword statistics for that field."];
      return [
        "Top keywords:",
        data.keywords.map((k, i) => `${i + 1}. ${k.keyword}: ${k.paperCount} papers`).join("\n"),
      ];

    case "none":
      return [];
  }
}

export function buildFallbackMessage(
  data: ResearchData,
  options: { unavailable: string[]; clarificationQuestions: string[]; limit: number },
): string {
  if (data.kind === "none") {
    return options.clarificationQuestions.join("\n");
  }
  return [...body(data, options.limit), ...unavailableNote(options.unavailable)].join("\n\n");
}
