import type {
  PersonCard,
  PersonProfile,
  PersonSummary,
  Timeline,
  WorksCollection,
} from "@/lib/biography-schema";

export const SNIPPET_LENGTH = 280;
export const QUOTES_SHOWN = 8;
export const FEATURED_SNIPPET_LENGTH = 180;

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\s*\n\s*/g, " ");
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}…`;
}

export function formatTimelineTable(timeline: Timeline): string {
  if (timeline.events.length === 0) {
    return "No clear date-based events could be extracted.";
  }

  const rows = timeline.events
    .map((event) => `| ${event.year} | ${escapeTableCell(event.text)} |`)
    .join("\n");

  return `| Year | Event |
|------|-------|
${rows}`;
}

export function formatWorks(works: WorksCollection): string {
  if (works.sections.length === 0) {
    return "No works or bibliography sections found.";
  }

  return works.sections
    .map(
      (section) =>
        `#### ${section.heading}\n${section.content || "_No details listed._"}`,
    )
    .join("\n\n");
}

export function formatQuotes(quotes: string[], limit = QUOTES_SHOWN): string {
  if (quotes.length === 0) {
    return "No quotes found on Wikiquote.";
  }

  return quotes
    .slice(0, limit)
    .map((quote) => `> ${quote}`)
    .join("\n>\n");
}

export function formatProfile(profile: PersonProfile): string {
  const link = profile.pageUrl ? `\n\n[Open on Wikipedia](${profile.pageUrl})` : "";
  const portrait = profile.portraitUrl ? `![${profile.name}](${profile.portraitUrl})\n\n` : "";
  const worksBody = profile.worksWarning
    ? `Works could not be read: ${profile.worksWarning}`
    : formatWorks(profile.works);

  return `# ${profile.name}

${portrait}## Snapshot

${profile.summary || "No summary available."}${link}

## Timeline (heuristic)

${formatTimelineTable(profile.timeline)}

## Quotes

${formatQuotes(profile.quotes)}

## Notable Works

${worksBody}
`;
}

export function formatSummaryCard(summary: PersonSummary): string {
  const description = summary.description ? `_${summary.description}_\n\n` : "";
  const link = summary.pageUrl ? `\n\n${summary.pageUrl}` : "";

  return `## ${summary.title}

${description}${summary.extract || "No summary available."}${link}
`;
}

export function formatPersonCards(cards: PersonCard[]): string {
  return cards
    .map((card, index) => {
      const description = card.description
        ? ` - ${truncate(card.description, SNIPPET_LENGTH)}`
        : "";
      const image = card.imageUrl ? `\n   ${card.imageUrl}` : "";
      return `${index + 1}. **${card.name}**${description}${image}`;
    })
    .join("\n");
}

export function formatFeaturedCards(summaries: PersonSummary[]): string {
  if (summaries.length === 0) {
    return "No featured people could be loaded.";
  }

  return summaries
    .map((summary, index) => {
      const snippet = summary.extract
        ? truncate(summary.extract, FEATURED_SNIPPET_LENGTH)
        : "No summary available.";
      return `${index + 1}. **${summary.title}** - ${snippet}
   Open profile: npm run profile -- "${summary.title}"`;
    })
    .join("\n");
}
