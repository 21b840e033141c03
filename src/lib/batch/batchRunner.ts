import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../errors.js';
import { errorOutcome } from '../jobs/outcomes.js';
import type { Outcome, Report, TaskRunner } from '../types.js';
import { formatDuration, hostOf } from '../utils.js';
import {
  DEFAULT_PRIMARY_DOMAIN_SUFFIX,
  primaryDomain,
  sortWorkItems,
} from './domains.js';
import { buildReport, countByStatus } from './report.js';

export const DEFAULT_DEADLINE_MS = 60_000;

export interface BatchOptions {
  runner: TaskRunner;
  deadlineMs?: number;
  primaryDomainSuffix?: string;
  runId?: string;
}

function summarize(outcome: Outcome): string {
  switch (outcome.status) {
    case 'success':
      return `in ${outcome.elapsedFormatted}`;
    case 'timeout':
      return `with timeout: ${outcome.error}`;
    case 'error':
      return `with error: ${outcome.error}`;
  }
}

/**
 * Converts every URL, one at a time, and returns the grouped report. A failed
 * or timed out URL never stops the batch.
 */
export async function runBatch(
  urls: readonly string[],
  {
    runner,
    deadlineMs = DEFAULT_DEADLINE_MS,
    primaryDomainSuffix = DEFAULT_PRIMARY_DOMAIN_SUFFIX,
    runId = uuidv4(),
  }: BatchOptions,
): Promise<Report> {
  const items = sortWorkItems(urls, primaryDomainSuffix);
  const groups = new Map<string, Outcome[]>();
  const batchStartTime = Date.now();

  console.log(`[Run ${runId}] Starting processing of ${items.length} URL(s).`);

  for (const [index, url] of items.entries()) {
    console.log(
      `[Run ${runId}] Processing URL ${index + 1} of ${items.length}: ${url}`,
    );

    let outcome: Outcome;
    try {
      outcome = await runner.run(url, deadlineMs);
    } catch (error) {
      // A rejecting runner must not stop the batch
      console.error(`[Run ${runId}] Runner failed for ${url}:`, error);
      outcome = errorOutcome(url, null, errorMessage(error));
    }

    if (outcome.status === 'success') {
      console.log(`[Run ${runId}] Finished ${url} ${summarize(outcome)}`);
    } else {
      console.warn(`[Run ${runId}] Finished ${url} ${summarize(outcome)}`);
    }

    const domain = primaryDomain(hostOf(url), primaryDomainSuffix);
    const bucket = groups.get(domain);
    if (bucket) {
      bucket.push(outcome);
    } else {
      groups.set(domain, [outcome]);
    }
  }

  const report = buildReport(runId, groups);
  const counts = countByStatus(report);
  const totalTime = formatDuration((Date.now() - batchStartTime) / 1000);
  console.log(
    `[Run ${runId}] Processing completed for all URLs in ${totalTime}: ` +
      `${counts.success} succeeded, ${counts.error} failed, ` +
      `${counts.timeout} timed out.`,
  );

  return report;
}
