import * as fs from 'fs/promises';
import { runBatch } from './batch/batchRunner.js';
import type { AppConfig } from './config/batch.js';
import { ConfigurationError } from './errors.js';
import type { Notifier, Report, TaskRunner } from './types.js';

export interface AppDependencies {
  runner: TaskRunner;
  notifier: Notifier;
}

/**
 * Reads a line-delimited URL list; blank lines are dropped.
 */
export async function readUrls(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`File '${filePath}' not found.`);
    }
    throw error;
  }

  const urls = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (urls.length === 0) {
    throw new ConfigurationError(`No valid URLs found in '${filePath}'.`);
  }
  return urls;
}

export async function clearUrlsFile(filePath: string): Promise<void> {
  await fs.writeFile(filePath, '', 'utf-8');
  console.log(`File '${filePath}' cleared after processing.`);
}

/**
 * One full run: read the URL list, convert everything, notify, and clear the
 * list in production mode. Resolves with `null` when the run is aborted on a
 * configuration error; nothing is converted or sent in that case.
 */
export async function runConversionJob(
  config: AppConfig,
  { runner, notifier }: AppDependencies,
): Promise<Report | null> {
  await fs.mkdir(config.outputDir, { recursive: true });

  let urls: string[];
  try {
    urls = await readUrls(config.urlsFile);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message} Exiting.`);
      return null;
    }
    throw error;
  }

  const report = await runBatch(urls, {
    runner,
    deadlineMs: config.timeoutMs,
    primaryDomainSuffix: config.primaryDomainSuffix,
  });

  if (config.webhookUrl) {
    console.log('Sending webhook notification...');
    await notifier.send(report, config.webhookUrl);
  } else {
    console.log('Webhook not configured; notification not sent.');
  }

  if (config.mode === 'production') {
    await clearUrlsFile(config.urlsFile);
  } else {
    console.log(`Development mode; '${config.urlsFile}' not cleared.`);
  }

  return report;
}
