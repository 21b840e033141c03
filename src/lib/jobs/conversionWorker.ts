#!/usr/bin/env node
import 'dotenv/config';
import { FileArtifactWriter } from '../artifacts/writer.js';
import {
  HtmlDocumentConverter,
  createPageFetcher,
} from '../convert/documentConverter.js';
import { sendToParent } from './protocol.js';
import { processUrl } from './task.js';

/**
 * Conversion worker - forked once per URL by the ChildProcessRunner.
 *
 * Usage: conversionWorker <url> <destinationRoot> [userAgent]
 */
async function main() {
  const [url, destinationRoot, userAgent] = process.argv.slice(2);
  if (!url || !destinationRoot) {
    console.error(
      'Usage: conversionWorker <url> <destinationRoot> [userAgent]',
    );
    process.exit(1);
  }

  // Nothing may outlive the parent
  process.on('disconnect', () => process.exit(1));

  await sendToParent({ type: 'started', url, pid: process.pid });

  const result = await processUrl(url, destinationRoot, {
    converter: new HtmlDocumentConverter(createPageFetcher(userAgent)),
    writer: new FileArtifactWriter(),
  });

  await sendToParent(result);
  process.exit(result.type === 'done' ? 0 : 1);
}

main().catch((error) => {
  console.error('Conversion worker failed:', error);
  process.exit(1);
});
