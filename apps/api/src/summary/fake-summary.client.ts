import type { AggregateResult } from '../aggregation/aggregate';
import { SummaryClient } from './summary.client';

export class FakeSummaryClient extends SummaryClient {
  async summarize(aggregate: AggregateResult): Promise<string> {
    if (aggregate.status === 'SAFE' && aggregate.counts.errored === 0) {
      return 'Content appears safe for campaign use. No risk categories were flagged.';
    }
    return (
      `Content was rated ${aggregate.status} overall with ${aggregate.counts.errored} media item(s) not analyzed. ` +
      'Manual review is recommended.'
    );
  }
}
