import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readUrls, runConversionJob } from '../lib/app.js';
import type { AppConfig } from '../lib/config/batch.js';
import { ConfigurationError } from '../lib/errors.js';
import { successOutcome } from '../lib/jobs/outcomes.js';
import type { Notifier, Outcome, Report, TaskRunner } from '../lib/types.js';

class RecordingRunner implements TaskRunner {
  readonly urls: string[] = [];

  async run(url: string): Promise<Outcome> {
    this.urls.push(url);
    return successOutcome(url, 2);
  }
}

function recordingNotifier() {
  const send = vi.fn(async (_report: Report, _endpoint: string) => true);
  const notifier: Notifier = { send };
  return { notifier, send };
}

describe('runConversionJob', () => {
  let workDir: string;
  let config: AppConfig;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'url2md-app-'));
    config = {
      outputDir: path.join(workDir, 'out'),
      webhookUrl: null,
      mode: 'development',
      urlsFile: path.join(workDir, 'urls.txt'),
      timeoutMs: 60000,
      primaryDomainSuffix: 'asimov.academy',
      reportFormattedTime: true,
      userAgent: 'url2md-test/1.0',
    };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('aborts without converting when the list has no URLs', async () => {
    await fs.writeFile(config.urlsFile, '\n   \n\t\n');
    const runner = new RecordingRunner();
    const { notifier, send } = recordingNotifier();

    const report = await runConversionJob(
      { ...config, webhookUrl: 'https://hooks.example.test/x' },
      { runner, notifier },
    );

    expect(report).toBeNull();
    expect(runner.urls).toEqual([]);
    expect(send).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      `No valid URLs found in '${config.urlsFile}'. Exiting.`,
    );
  });

  it('aborts when the list file is missing', async () => {
    const runner = new RecordingRunner();
    const { notifier } = recordingNotifier();

    await expect(runConversionJob(config, { runner, notifier })).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      `File '${config.urlsFile}' not found. Exiting.`,
    );
  });

  it('builds the report without notifying when no webhook is set', async () => {
    await fs.writeFile(config.urlsFile, 'https://example.com/a\n');
    const runner = new RecordingRunner();
    const { notifier, send } = recordingNotifier();

    const report = await runConversionJob(config, { runner, notifier });

    expect(report?.groups).toEqual([
      { domain: 'example.com', outcomes: [successOutcome('https://example.com/a', 2)] },
    ]);
    expect(send).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('Webhook not configured; notification not sent.');
  });

  it('sends the report to the configured webhook', async () => {
    await fs.writeFile(config.urlsFile, 'https://example.com/a\nhttps://example.com/b\n');
    const runner = new RecordingRunner();
    const { notifier, send } = recordingNotifier();

    const report = await runConversionJob(
      { ...config, webhookUrl: 'https://hooks.example.test/x' },
      { runner, notifier },
    );

    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(report, 'https://hooks.example.test/x');
  });

  it('creates the output directory', async () => {
    await fs.writeFile(config.urlsFile, 'https://example.com/a\n');
    const { notifier } = recordingNotifier();

    await runConversionJob(config, { runner: new RecordingRunner(), notifier });

    const stat = await fs.stat(config.outputDir);
    expect(stat.isDirectory()).toBe(true);
  });

  it('clears the list in production mode', async () => {
    await fs.writeFile(config.urlsFile, 'https://example.com/a\n');
    const { notifier } = recordingNotifier();

    await runConversionJob(
      { ...config, mode: 'production' },
      { runner: new RecordingRunner(), notifier },
    );

    await expect(fs.readFile(config.urlsFile, 'utf-8')).resolves.toBe('');
  });

  it('keeps the list in development mode', async () => {
    await fs.writeFile(config.urlsFile, 'https://example.com/a\n');
    const { notifier } = recordingNotifier();

    await runConversionJob(config, { runner: new RecordingRunner(), notifier });

    await expect(fs.readFile(config.urlsFile, 'utf-8')).resolves.toBe(
      'https://example.com/a\n',
    );
  });
});

describe('readUrls', () => {
  it('trims lines and keeps duplicates', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'url2md-urls-'));
    const file = path.join(dir, 'urls.txt');
    await fs.writeFile(file, '  https://a.test/x \r\n\r\nhttps://a.test/x\n');

    await expect(readUrls(file)).resolves.toEqual(['https://a.test/x', 'https://a.test/x']);
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('rejects a missing file with a configuration error', async () => {
    await expect(readUrls('/nonexistent/url2md/urls.txt')).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});
