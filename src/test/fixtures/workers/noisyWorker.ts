import { sendToParent } from '../../../lib/jobs/protocol.js';

// Sends a malformed message before a valid result
async function main() {
  const [url] = process.argv.slice(2);
  await new Promise<void>((resolve) => {
    if (!process.send) {
      resolve();
      return;
    }
    process.send({ type: 'bogus' }, undefined, {}, () => resolve());
  });
  await sendToParent({
    type: 'done',
    url,
    elapsedSeconds: 1.234,
    siteDir: '/tmp',
    markdownPath: '/tmp/a.md',
    jsonPath: '/tmp/a.json',
  });
  process.exit(0);
}

void main();
