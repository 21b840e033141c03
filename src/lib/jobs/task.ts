import { errorMessage } from '../errors.js';
import type { ArtifactWriter, DocumentConverter } from '../types.js';
import { elapsedSince, formatDuration, roundSeconds } from '../utils.js';
import type { WorkerResult } from './protocol.js';

export interface TaskDependencies {
  converter: DocumentConverter;
  writer: ArtifactWriter;
}

/**
 * Converts one URL and writes its artifacts. Never throws: failures come back
 * as an `error` result carrying the time spent up to the failure.
 */
export async function processUrl(
  url: string,
  destinationRoot: string,
  { converter, writer }: TaskDependencies,
): Promise<WorkerResult> {
  const startedAt = process.hrtime.bigint();
  console.log(`Starting conversion for URL: ${url}`);

  try {
    const document = await converter.convert(url);
    const artifacts = await writer.write(document, url, destinationRoot);
    const elapsedSeconds = roundSeconds(elapsedSince(startedAt));
    console.log(
      `Finished processing ${url} in ${formatDuration(elapsedSeconds)}`,
    );
    return { type: 'done', url, elapsedSeconds, ...artifacts };
  } catch (error) {
    const elapsedSeconds = roundSeconds(elapsedSince(startedAt));
    const message = errorMessage(error);
    console.error(`Error processing URL: ${url}. Details: ${message}`);
    return { type: 'error', url, elapsedSeconds, error: message };
  }
}
