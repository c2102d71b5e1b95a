import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';

import { SUMMARY_MAX_LENGTH, TAGS_MAX_LENGTH } from '../types/noteTypes';
import { isNumberArray } from '../utils/guards';
import { EnrichmentError, errorMessage } from './errors';
import type { AppSettings } from './storageUtil';
import { DEFAULT_APP_SETTINGS, DEFAULT_RAG_CONFIG } from './storageUtil';

export interface EnrichmentClient {
  /** Comma-delimited, cleaned tag string. Never empty. */
  generateTags(title: string, content: string, signal?: AbortSignal): Promise<string>;
  generateEmbedding(title: string, content: string, signal?: AbortSignal): Promise<number[]>;
  generateSummary(content: string, signal?: AbortSignal): Promise<string>;
}

export interface ProviderEndpoint {
  host: string;
  baseURL: string;
  apiKey: string;
  model: string;
}

const KNOWN_HOSTS = ['openai', 'groq', 'openrouter', 'gemini', 'ollama', 'lmStudio'];

const TAG_SYSTEM_PROMPT = 'You are a helpful assistant that generates relevant tags for notes.';
const SUMMARY_SYSTEM_PROMPT = 'You are a helpful assistant that writes short summaries of notes.';

const findHostInId = (modelId: string, settings: AppSettings): string | undefined => {
  const hosts = [...KNOWN_HOSTS, ...(settings.customEndpoints ?? []).map(endpoint => endpoint.id)];

  return hosts.find(host => modelId.startsWith(`${host}_`));
};

const notConfigured = (message: string): EnrichmentError => new EnrichmentError(message, { retryable: false });

/**
 * Works out where a model is served from: the host recorded for it in
 * `settings.models`, else a `<host>_` prefix on the id. The prefix is
 * stripped from the model name sent to the provider.
 */
export const resolveProviderEndpoint = (modelId: string, settings: AppSettings): ProviderEndpoint => {
  const modelInfo = settings.models?.find(m => m.id === modelId);
  let hostId = modelInfo?.host;

  if (!hostId) {
    console.warn(`[Enrichment] Model '${modelId}' not found in settings.models. Falling back to parsing the ID.`);
    hostId = findHostInId(modelId, settings);
  }

  if (!hostId) {
    throw notConfigured(`Unsupported model provider for '${modelId}'`);
  }

  const model = modelId.startsWith(`${hostId}_`) ? modelId.slice(hostId.length + 1) : modelId;

  switch (hostId) {
    case 'ollama':

    case 'lmStudio': {
      const url = hostId === 'ollama' ? settings.ollamaUrl : settings.lmStudioUrl;

      if (!url) throw notConfigured(`${hostId} URL is not configured.`);

      return { host: hostId, baseURL: `${url.replace(/\/+$/, '')}/v1`, apiKey: 'no-key', model };
    }

    case 'openai':
      if (!settings.openAiApiKey) throw notConfigured('OpenAI API key not found.');

      return { host: hostId, baseURL: 'https://api.openai.com/v1', apiKey: settings.openAiApiKey, model };

    case 'groq':
      if (!settings.groqApiKey) throw notConfigured('Groq API key not found.');

      return { host: hostId, baseURL: 'https://api.groq.com/openai/v1', apiKey: settings.groqApiKey, model };

    case 'openrouter':
      if (!settings.openRouterApiKey) throw notConfigured('OpenRouter API key not found.');

      return { host: hostId, baseURL: 'https://openrouter.ai/api/v1', apiKey: settings.openRouterApiKey, model };

    case 'gemini':
      if (!settings.geminiApiKey) throw notConfigured('Gemini API key not found.');

      return {
        host: hostId,
        baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai',
        apiKey: settings.geminiApiKey,
        model,
      };

    default: {
      const customEndpoint = settings.customEndpoints?.find(e => e.id === hostId);

      if (customEndpoint) {
        if (!customEndpoint.connected) {
          throw notConfigured(`Custom endpoint '${customEndpoint.name}' is not connected.`);
        }

        return {
          host: hostId,
          baseURL: `${customEndpoint.endpoint.replace(/\/+$/, '')}/v1`,
          apiKey: customEndpoint.apiKey || 'no-key',
          model,
        };
      }

      throw notConfigured(`Unsupported provider or unknown custom endpoint ID: ${hostId}`);
    }
  }
};

/**
 * Normalises raw model output into a tag string: reasoning blocks, quotes and
 * `#` removed, lowercased, de-duplicated, joined with ", ". Whole tags are
 * dropped from the end until the result fits the tags column.
 */
export const cleanTags = (raw: string): string => {
  const text = raw.replace(/<think>[\s\S]*?<\/think>/gi, '').replace(/["`#]/g, '');
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const part of text.split(',')) {
    const tag = part.trim().replace(/^'+|'+$/g, '').trim().toLowerCase();

    if (tag && !seen.has(tag)) {
      seen.add(tag);
      tags.push(tag);
    }
  }

  while (tags.length > 0 && tags.join(', ').length > TAGS_MAX_LENGTH) {
    tags.pop();
  }

  return tags.join(', ');
};

/**
 * Maps anything the SDK throws onto the EnrichmentError contract.
 */
export const toEnrichmentError = (error: unknown, signal?: AbortSignal): EnrichmentError => {
  if (error instanceof EnrichmentError) return error;

  if (error instanceof APIUserAbortError || signal?.aborted) {
    return new EnrichmentError('aborted', { retryable: false, cause: error });
  }

  if (error instanceof APIConnectionTimeoutError) {
    return new EnrichmentError('timeout', { retryable: true, cause: error });
  }

  if (error instanceof APIConnectionError) {
    return new EnrichmentError(`connection error: ${error.message}`, { retryable: true, cause: error });
  }

  if (error instanceof APIError) {
    const status = error.status;
    const retryable = status === 429 || (status !== undefined && status >= 500);

    return new EnrichmentError(`service error: ${error.message}`, { retryable, cause: error });
  }

  return new EnrichmentError(errorMessage(error), { retryable: false, cause: error });
};

export interface OpenAIEnrichmentClientOptions {
  timeoutMs?: number;
}

/**
 * Enrichment over any OpenAI-compatible API. The SDK's own retries are off;
 * retrying is the caller's decision.
 */
export class OpenAIEnrichmentClient implements EnrichmentClient {
  private readonly clients = new Map<string, OpenAI>();
  private readonly timeoutMs: number;

  constructor(private readonly settings: AppSettings, options: OpenAIEnrichmentClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? settings.requestTimeoutMs ?? DEFAULT_APP_SETTINGS.requestTimeoutMs ?? 60000;
  }

  async generateTags(title: string, content: string, signal?: AbortSignal): Promise<string> {
    const text = await this.complete(
      [
        { role: 'system', content: TAG_SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Generate 3-5 relevant, specific tags for the following note. Return them as a comma-separated list, lowercase.\n\nTitle: ${title}\n\nContent: ${content}`,
        },
      ],
      { maxTokens: 50, temperature: 0.3 },
      signal,
    );

    const tags = cleanTags(text);

    if (!tags) {
      throw new EnrichmentError('malformed response: no tags returned', { retryable: false });
    }

    return tags;
  }

  async generateSummary(content: string, signal?: AbortSignal): Promise<string> {
    const text = await this.complete(
      [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: `Summarize the following note in 2-3 sentences.\n\n${content}` },
      ],
      { maxTokens: this.settings.maxSummaryTokens ?? DEFAULT_APP_SETTINGS.maxSummaryTokens ?? 150, temperature: 0.5 },
      signal,
    );

    const summary = text.trim();

    if (!summary) {
      throw new EnrichmentError('malformed response: empty summary', { retryable: false });
    }

    return summary.slice(0, SUMMARY_MAX_LENGTH);
  }

  async generateEmbedding(title: string, content: string, signal?: AbortSignal): Promise<number[]> {
    const ragConfig = this.settings.ragConfig ?? DEFAULT_RAG_CONFIG;

    try {
      const endpoint = resolveProviderEndpoint(ragConfig.model, this.settings);
      const response = await this.clientFor(endpoint).embeddings.create(
        { model: endpoint.model, input: `${title}\n\n${content}` },
        { signal },
      );
      const embedding: unknown = response.data?.[0]?.embedding;

      if (!isNumberArray(embedding) || embedding.length === 0) {
        throw new EnrichmentError('malformed response: no embedding returned', { retryable: false });
      }

      const expected = ragConfig.embeddingDimensions;

      if (expected !== undefined && embedding.length !== expected) {
        throw new EnrichmentError(
          `malformed response: expected ${expected} embedding dimensions, got ${embedding.length}`,
          { retryable: false },
        );
      }

      return embedding;
    } catch (error) {
      throw toEnrichmentError(error, signal);
    }
  }

  private async complete(
    messages: OpenAI.Chat.ChatCompletionMessageParam[],
    params: { maxTokens: number; temperature: number },
    signal?: AbortSignal,
  ): Promise<string> {
    const modelId = this.settings.selectedModel ?? DEFAULT_APP_SETTINGS.selectedModel;

    try {
      if (!modelId) {
        throw new EnrichmentError('No model is selected for completions.', { retryable: false });
      }

      const endpoint = resolveProviderEndpoint(modelId, this.settings);
      const response = await this.clientFor(endpoint).chat.completions.create(
        {
          model: endpoint.model,
          messages,
          max_tokens: params.maxTokens,
          temperature: params.temperature,
        },
        { signal },
      );
      const text: unknown = response.choices?.[0]?.message?.content;

      if (typeof text !== 'string') {
        throw new EnrichmentError('malformed response: no completion content', { retryable: false });
      }

      return text;
    } catch (error) {
      throw toEnrichmentError(error, signal);
    }
  }

  private clientFor(endpoint: ProviderEndpoint): OpenAI {
    const key = `${endpoint.baseURL}|${endpoint.apiKey}`;
    let client = this.clients.get(key);

    if (!client) {
      client = new OpenAI({
        apiKey: endpoint.apiKey,
        baseURL: endpoint.baseURL,
        maxRetries: 0,
        timeout: this.timeoutMs,
      });
      this.clients.set(key, client);
    }

    return client;
  }
}
