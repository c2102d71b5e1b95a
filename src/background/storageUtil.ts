import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  BackfillConfig, Config, CustomEndpoint, Model, RagConfig,
} from '../types/config';
import {
  isRecord, optionalBoolean, optionalNumber, optionalString,
} from '../utils/guards';

// Settings file, relative to the working directory unless NOTES_CONFIG_PATH says otherwise
const CONFIG_PATH_ENV = 'NOTES_CONFIG_PATH';
const DEFAULT_CONFIG_FILE = 'notes.config.json';

export type AppSettings = Config;

export const DEFAULT_RAG_CONFIG: RagConfig = {
  model: 'text-embedding-3-small',
  related_top_k: 5,
  similarity_threshold: 0.7,
};

export const DEFAULT_BACKFILL_CONFIG: BackfillConfig = {
  checkpointInterval: 5,
  retries: 0,
  retryDelay: 1000,
};

export const DEFAULT_APP_SETTINGS: AppSettings = {
  models: [
    { id: 'gpt-4o-mini', host: 'openai' },
    { id: 'text-embedding-3-small', host: 'openai' },
  ],
  selectedModel: 'gpt-4o-mini',
  maxSummaryTokens: 150,
  requestTimeoutMs: 60000,
  storageName: 'notes',
  ragConfig: DEFAULT_RAG_CONFIG,
  backfillConfig: DEFAULT_BACKFILL_CONFIG,
};

const parseModels = (value: unknown): Model[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const models: Model[] = [];

  for (const item of value) {
    if (isRecord(item) && typeof item.id === 'string') {
      models.push({ id: item.id, host: optionalString(item.host), name: optionalString(item.name) });
    }
  }

  return models;
};

const parseCustomEndpoints = (value: unknown): CustomEndpoint[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const endpoints: CustomEndpoint[] = [];

  for (const item of value) {
    if (isRecord(item) && typeof item.id === 'string' && typeof item.endpoint === 'string') {
      endpoints.push({
        id: item.id,
        name: optionalString(item.name) ?? item.id,
        endpoint: item.endpoint,
        apiKey: optionalString(item.apiKey) ?? '',
        connected: optionalBoolean(item.connected) ?? true,
      });
    }
  }

  return endpoints;
};

const parseRagConfig = (value: unknown): RagConfig | undefined => {
  if (!isRecord(value)) return undefined;

  return {
    model: optionalString(value.model) ?? DEFAULT_RAG_CONFIG.model,
    embeddingDimensions: optionalNumber(value.embeddingDimensions),
    related_top_k: optionalNumber(value.related_top_k) ?? DEFAULT_RAG_CONFIG.related_top_k,
    similarity_threshold: optionalNumber(value.similarity_threshold) ?? DEFAULT_RAG_CONFIG.similarity_threshold,
  };
};

const parseBackfillConfig = (value: unknown): Partial<BackfillConfig> | undefined => {
  if (!isRecord(value)) return undefined;

  return {
    checkpointInterval: optionalNumber(value.checkpointInterval),
    retries: optionalNumber(value.retries),
    retryDelay: optionalNumber(value.retryDelay),
  };
};

/**
 * Picks the known settings out of a parsed JSON document, dropping fields of
 * the wrong type. Returns null when the document is not an object.
 */
export function parseAppSettings(value: unknown): AppSettings | null {
  if (!isRecord(value)) return null;

  return {
    models: parseModels(value.models),
    selectedModel: optionalString(value.selectedModel),
    maxSummaryTokens: optionalNumber(value.maxSummaryTokens),
    requestTimeoutMs: optionalNumber(value.requestTimeoutMs),
    storageName: optionalString(value.storageName),
    lmStudioUrl: optionalString(value.lmStudioUrl),
    ollamaUrl: optionalString(value.ollamaUrl),
    groqApiKey: optionalString(value.groqApiKey),
    geminiApiKey: optionalString(value.geminiApiKey),
    openAiApiKey: optionalString(value.openAiApiKey),
    openRouterApiKey: optionalString(value.openRouterApiKey),
    customEndpoints: parseCustomEndpoints(value.customEndpoints),
    ragConfig: parseRagConfig(value.ragConfig),
    backfillConfig: parseBackfillConfig(value.backfillConfig),
  };
}

export const getConfigPath = (env: NodeJS.ProcessEnv = process.env): string =>
  path.resolve(env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_FILE);

/**
 * Reads the settings document from disk.
 *
 * @returns The parsed settings, or null if the file is missing or unreadable.
 */
export async function getStoredAppSettings(env: NodeJS.ProcessEnv = process.env): Promise<AppSettings | null> {
  const configPath = getConfigPath(env);

  try {
    const configString = await readFile(configPath, 'utf8');
    const parsedConfig = parseAppSettings(JSON.parse(configString));

    if (parsedConfig) {
      return parsedConfig;
    }

    console.warn(`[Settings] ${configPath} does not contain a settings object.`);

    return null;
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      console.log(`[Settings] No settings file at ${configPath}, using defaults.`);
    } else {
      console.error(`[Settings] Error reading or parsing ${configPath}:`, error);
    }

    return null;
  }
}

/**
 * Defaults, then the stored document, then secrets and URLs from the environment.
 */
export async function loadAppSettings(env: NodeJS.ProcessEnv = process.env): Promise<AppSettings> {
  const stored = await getStoredAppSettings(env);
  const storedBackfill = stored?.backfillConfig;

  return {
    models: stored?.models ?? DEFAULT_APP_SETTINGS.models,
    selectedModel: stored?.selectedModel ?? DEFAULT_APP_SETTINGS.selectedModel,
    maxSummaryTokens: stored?.maxSummaryTokens ?? DEFAULT_APP_SETTINGS.maxSummaryTokens,
    requestTimeoutMs: stored?.requestTimeoutMs ?? DEFAULT_APP_SETTINGS.requestTimeoutMs,
    storageName: stored?.storageName ?? DEFAULT_APP_SETTINGS.storageName,
    lmStudioUrl: env.LMSTUDIO_URL || stored?.lmStudioUrl,
    ollamaUrl: env.OLLAMA_URL || stored?.ollamaUrl,
    groqApiKey: env.GROQ_API_KEY || stored?.groqApiKey,
    geminiApiKey: env.GEMINI_API_KEY || stored?.geminiApiKey,
    openAiApiKey: env.OPENAI_API_KEY || stored?.openAiApiKey,
    openRouterApiKey: env.OPENROUTER_API_KEY || stored?.openRouterApiKey,
    customEndpoints: stored?.customEndpoints ?? [],
    ragConfig: stored?.ragConfig ?? DEFAULT_RAG_CONFIG,
    backfillConfig: {
      checkpointInterval: storedBackfill?.checkpointInterval ?? DEFAULT_BACKFILL_CONFIG.checkpointInterval,
      retries: storedBackfill?.retries ?? DEFAULT_BACKFILL_CONFIG.retries,
      retryDelay: storedBackfill?.retryDelay ?? DEFAULT_BACKFILL_CONFIG.retryDelay,
    },
  };
}

/**
 * Checkpoint and retry parameters for backfill runs, falling back to defaults
 * for anything missing or out of range.
 */
export function getEffectiveBackfillParams(settings: AppSettings | null): BackfillConfig {
  const backfill = settings?.backfillConfig;

  const interval = backfill?.checkpointInterval;
  const checkpointInterval = interval !== undefined && Number.isInteger(interval) && interval >= 1
    ? interval
    : DEFAULT_BACKFILL_CONFIG.checkpointInterval;

  if (interval !== undefined && interval !== checkpointInterval) {
    console.warn(`[Settings] Ignoring checkpointInterval ${interval}; it must be a positive integer.`);
  }

  const retries = backfill?.retries;
  const retryDelay = backfill?.retryDelay;

  return {
    checkpointInterval,
    retries: retries !== undefined && Number.isInteger(retries) && retries >= 0 ? retries : DEFAULT_BACKFILL_CONFIG.retries,
    retryDelay: retryDelay !== undefined && retryDelay >= 0 ? retryDelay : DEFAULT_BACKFILL_CONFIG.retryDelay,
  };
}

export function getEffectiveRelatedNotesParams(settings: AppSettings | null): { topN: number; similarityThreshold: number } {
  const ragConfig = settings?.ragConfig;

  return {
    topN: ragConfig?.related_top_k ?? DEFAULT_RAG_CONFIG.related_top_k,
    similarityThreshold: ragConfig?.similarity_threshold ?? DEFAULT_RAG_CONFIG.similarity_threshold,
  };
}
