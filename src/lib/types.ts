export type OutcomeStatus = 'success' | 'error' | 'timeout';

/**
 * Terminal record of one processed URL. Frozen once created.
 */
export interface Outcome {
  readonly url: string;
  readonly status: OutcomeStatus;
  readonly elapsedSeconds: number | null; // null on timeout
  readonly elapsedFormatted: string | null;
  readonly error: string | null; // set iff status !== 'success'
}

export interface ReportGroup {
  readonly domain: string;
  readonly outcomes: readonly Outcome[];
}

export interface Report {
  readonly runId: string;
  readonly groups: readonly ReportGroup[];
}

// Wire format delivered to the webhook
export interface WebhookUrlRecord {
  url: string;
  status: OutcomeStatus;
  processing_time: number | null;
  processing_time_formatted?: string | null;
  error_message: string | null;
}

export interface WebhookDomainRecord {
  domain: string;
  urls: WebhookUrlRecord[];
}

export interface ConvertedDocument {
  readonly title: string | null;
  readonly markdown: string;
  readonly sourceUrl: string;
  exportToJson(): string;
  toDict(): Record<string, unknown>;
}

export interface DocumentConverter {
  convert(url: string): Promise<ConvertedDocument>;
}

export interface WrittenArtifacts {
  siteDir: string;
  markdownPath: string;
  jsonPath: string;
}

export interface ArtifactWriter {
  write(
    document: ConvertedDocument,
    sourceUrl: string,
    destinationRoot: string,
  ): Promise<WrittenArtifacts>;
}

export interface TaskRunner {
  run(url: string, deadlineMs: number): Promise<Outcome>;
}

export interface Notifier {
  send(report: Report, endpoint: string): Promise<boolean>;
}
