/**
 * Configuration Settings for the translator
 *
 * Reads settings from $HINGLISH_CONFIG or ~/.hinglish-translator/config.json
 * (JSON format). HINGLISH_SERVICE_URL overrides the service URL.
 * Provides defaults for all settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { log } from '../ipc/protocol';
import { errorMessage } from '../core/errors';
import { DEFAULT_PLACEHOLDER_PREFIX } from '../core/termPreserver';

export const DEFAULT_SERVICE_URL = 'https://translate.googleapis.com';

/**
 * Translator settings
 */
export interface TranslatorSettings {
  /** Base URL of the translation endpoint */
  serviceUrl: string;
  /** Prefix of the tokens that stand in for preserved terms */
  placeholderPrefix: string;
  /**
   * Translate the sentences of one input concurrently.
   * Output keeps segmentation order either way.
   */
  parallelSentences: boolean;
}

/**
 * Full config structure
 */
export interface Config {
  translator?: Partial<TranslatorSettings>;
}

const DEFAULT_SETTINGS: TranslatorSettings = {
  serviceUrl: DEFAULT_SERVICE_URL,
  placeholderPrefix: DEFAULT_PLACEHOLDER_PREFIX,
  parallelSentences: false,
};

/**
 * Cached config and last load time
 */
let cachedConfig: Config | null = null;
let lastLoadTime = 0;
const CACHE_TTL_MS = 30000; // Reload config every 30 seconds

/**
 * Config file path
 */
export function getConfigPath(): string {
  return process.env.HINGLISH_CONFIG || path.join(os.homedir(), '.hinglish-translator', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the fields whose types match
 */
function parseConfig(raw: unknown): Config {
  if (!isRecord(raw) || !isRecord(raw.translator)) {
    return {};
  }

  const section = raw.translator;
  const translator: Partial<TranslatorSettings> = {};

  if (typeof section.serviceUrl === 'string') {
    translator.serviceUrl = section.serviceUrl;
  }
  if (typeof section.placeholderPrefix === 'string') {
    translator.placeholderPrefix = section.placeholderPrefix;
  }
  if (typeof section.parallelSentences === 'boolean') {
    translator.parallelSentences = section.parallelSentences;
  }

  return { translator };
}

/**
 * Load config from disk
 */
function loadConfig(): Config {
  const configPath = getConfigPath();
  try {
    if (!fs.existsSync(configPath)) {
      return {};
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    return parseConfig(JSON.parse(content));
  } catch (error) {
    log(`[Config] Failed to load config: ${errorMessage(error)}`);
    return {};
  }
}

/**
 * Get config with caching
 */
function getConfig(): Config {
  const now = Date.now();

  if (cachedConfig && (now - lastLoadTime) < CACHE_TTL_MS) {
    return cachedConfig;
  }

  cachedConfig = loadConfig();
  lastLoadTime = now;

  return cachedConfig;
}

/**
 * Get translator settings with defaults
 */
export function getTranslatorSettings(): TranslatorSettings {
  const config = getConfig();

  return {
    serviceUrl: process.env.HINGLISH_SERVICE_URL
      || config.translator?.serviceUrl
      || DEFAULT_SETTINGS.serviceUrl,
    placeholderPrefix: config.translator?.placeholderPrefix ?? DEFAULT_SETTINGS.placeholderPrefix,
    parallelSentences: config.translator?.parallelSentences ?? DEFAULT_SETTINGS.parallelSentences,
  };
}

/**
 * Force reload config (useful for testing or after config changes)
 */
export function reloadConfig(): void {
  cachedConfig = null;
  lastLoadTime = 0;
}
