import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_PRIMARY_DOMAIN_SUFFIX } from '../batch/domains.js';
import { DEFAULT_USER_AGENT } from '../convert/documentConverter.js';

export interface AppConfig {
  // Root directory the per-site folders are written under
  outputDir: string;
  webhookUrl: string | null;
  mode: 'production' | 'development';
  urlsFile: string;
  timeoutMs: number;
  primaryDomainSuffix: string;
  reportFormattedTime: boolean;
  // Sent with every page request
  userAgent: string;
}

const envSchema = z.object({
  DIR_SAVE: z.string().optional(),
  WEBHOOK_NOTIFICATION: z.string().optional(),
  MODE: z.string().optional(),
  URLS_FILE: z.string().optional(),
  CONVERSION_TIMEOUT_MS: z.string().optional(),
  PRIMARY_DOMAIN_SUFFIX: z.string().optional(),
  REPORT_FORMATTED_TIME: z.string().optional(),
  USER_AGENT: z.string().optional(),
});

const webhookSchema = z.string().url();
const timeoutSchema = z.coerce.number().int().positive();

/**
 * Strips one leading "/" so the output directory always resolves relative to
 * the working directory.
 */
export function normalizeOutputDir(value: string | undefined): string {
  const trimmed = (value ?? '').trim() || 'scraping_data';
  return trimmed.startsWith('/') ? trimmed.slice(1) : trimmed;
}

/**
 * Load configuration from environment variables (a `.env` file is read by
 * dotenv on import).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = envSchema.parse(env);

  const webhook = vars.WEBHOOK_NOTIFICATION?.trim() ?? '';
  if (webhook && !webhookSchema.safeParse(webhook).success) {
    throw new ConfigurationError(
      `WEBHOOK_NOTIFICATION is not a valid URL: ${webhook}`,
    );
  }

  const rawTimeout = vars.CONVERSION_TIMEOUT_MS?.trim();
  let timeoutMs = 60_000;
  if (rawTimeout) {
    const parsed = timeoutSchema.safeParse(rawTimeout);
    if (!parsed.success) {
      throw new ConfigurationError(
        `CONVERSION_TIMEOUT_MS must be a positive integer, got: ${rawTimeout}`,
      );
    }
    timeoutMs = parsed.data;
  }

  return {
    outputDir: normalizeOutputDir(vars.DIR_SAVE),
    webhookUrl: webhook || null,
    mode:
      (vars.MODE ?? '').trim().toLowerCase() === 'production'
        ? 'production'
        : 'development',
    urlsFile: vars.URLS_FILE?.trim() || 'urls.txt',
    timeoutMs,
    primaryDomainSuffix:
      vars.PRIMARY_DOMAIN_SUFFIX?.trim() || DEFAULT_PRIMARY_DOMAIN_SUFFIX,
    reportFormattedTime:
      (vars.REPORT_FORMATTED_TIME ?? '').trim().toLowerCase() !== 'false',
    userAgent: vars.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
  };
}
