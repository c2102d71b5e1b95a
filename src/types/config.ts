export interface Model {
  id: string;
  host?: 'groq' | 'ollama' | 'gemini' | 'lmStudio' | 'openai' | 'openrouter' | 'custom' | string;
  name?: string;
}

export interface CustomEndpoint {
  id: string;
  name: string;
  endpoint: string;
  apiKey: string;
  connected: boolean;
}

export interface RagConfig {
  model: string; // embedding model id
  embeddingDimensions?: number;
  related_top_k: number;
  similarity_threshold: number;
}

export interface BackfillConfig {
  checkpointInterval: number;
  retries: number;
  retryDelay: number;
}

export interface Config {
  models?: Model[];
  selectedModel?: string;
  maxSummaryTokens?: number;
  requestTimeoutMs?: number;
  storageName?: string;

  lmStudioUrl?: string;
  ollamaUrl?: string;
  groqApiKey?: string;
  geminiApiKey?: string;
  openAiApiKey?: string;
  openRouterApiKey?: string;
  customEndpoints?: CustomEndpoint[];

  ragConfig?: RagConfig;
  backfillConfig?: Partial<BackfillConfig>;
}
