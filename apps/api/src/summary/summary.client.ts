import type { AggregateResult } from '../aggregation/aggregate';

export class SummaryFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SummaryFailure';
  }
}

export abstract class SummaryClient {
  abstract summarize(aggregate: AggregateResult): Promise<string>;
}

export function buildSummaryPrompt(aggregate: AggregateResult): string {
  const categoryLines = Object.entries(aggregate.categories).map(([category, score]) => {
    if (score === null) return `- ${category}: no data`;
    const note = aggregate.explanations[category];
    const line = `- ${category}: risk ${score} (${aggregate.categoryStatus[category] ?? 'SAFE'})`;
    return note ? `${line}. ${note}` : line;
  });
  const { total, analyzed, skipped, errored } = aggregate.counts;

  return [
    'You are an AI content safety assistant.',
    '',
    'Given the following moderation results for a creator campaign, produce a short summary',
    'for a non-technical reviewer.',
    '',
    'Requirements:',
    '- Be concise (3-5 sentences)',
    '- Mention any WARNING or REJECTED categories',
    '- Mention media that could not be analyzed, if any',
    '- Clearly state whether the content appears safe for campaign use',
    '',
    `Overall status: ${aggregate.status}`,
    `Overall risk score: ${aggregate.overallScore ?? 'n/a'}`,
    `Media: ${total} total, ${analyzed} analyzed, ${skipped} skipped as known safe, ${errored} failed`,
    'Category risk scores (0 = safe, 1 = certain violation):',
    ...(categoryLines.length > 0 ? categoryLines : ['- none']),
  ].join('\n');
}
