import type {
  Outcome,
  Report,
  ReportGroup,
  WebhookDomainRecord,
  WebhookUrlRecord,
} from '../types.js';
import { compareStrings } from './domains.js';

/**
 * Freezes the accumulated groups into a report: groups ascending by domain,
 * outcomes ascending by url within each group.
 */
export function buildReport(
  runId: string,
  groups: ReadonlyMap<string, readonly Outcome[]>,
): Report {
  const sorted: ReportGroup[] = [...groups.keys()]
    .sort(compareStrings)
    .map((domain) =>
      Object.freeze({
        domain,
        outcomes: Object.freeze(
          [...(groups.get(domain) ?? [])].sort((a, b) =>
            compareStrings(a.url, b.url),
          ),
        ),
      }),
    );

  return Object.freeze({ runId, groups: Object.freeze(sorted) });
}

export interface PayloadOptions {
  includeFormattedTime?: boolean;
}

export function toWebhookPayload(
  report: Report,
  { includeFormattedTime = true }: PayloadOptions = {},
): WebhookDomainRecord[] {
  return report.groups.map((group) => ({
    domain: group.domain,
    urls: group.outcomes.map((outcome) => {
      const record: WebhookUrlRecord = {
        url: outcome.url,
        status: outcome.status,
        processing_time: outcome.elapsedSeconds,
        error_message: outcome.error,
      };
      if (includeFormattedTime) {
        record.processing_time_formatted = outcome.elapsedFormatted;
      }
      return record;
    }),
  }));
}

export function countByStatus(
  report: Report,
): Record<Outcome['status'], number> {
  const counts = { success: 0, error: 0, timeout: 0 };
  for (const group of report.groups) {
    for (const outcome of group.outcomes) {
      counts[outcome.status] += 1;
    }
  }
  return counts;
}
