// Runtime configuration read from Vite env variables (see .env.example).
// Empty strings are treated as "not configured".

const readEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export interface ProviderConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export interface RoadmapConfig {
  gemini: ProviderConfig;
  openai: ProviderConfig;
}

export interface MarketConfig {
  feedUrl?: string;
  timeoutMs: number;
}

export interface AppConfig {
  amplitudeApiKey?: string;
  roadmap: RoadmapConfig;
  market: MarketConfig;
}

export const APP_CONFIG: AppConfig = {
  amplitudeApiKey: readEnv(import.meta.env.VITE_AMPLITUDE_API_KEY),
  roadmap: {
    gemini: {
      apiKey: readEnv(import.meta.env.VITE_GEMINI_API_KEY),
      model: readEnv(import.meta.env.VITE_GEMINI_MODEL) ?? 'gemini-1.5-flash',
      timeoutMs: 60000
    },
    openai: {
      apiKey: readEnv(import.meta.env.VITE_OPENAI_API_KEY),
      model: readEnv(import.meta.env.VITE_OPENAI_MODEL) ?? 'gpt-4',
      timeoutMs: 30000
    }
  },
  market: {
    feedUrl: readEnv(import.meta.env.VITE_MARKET_FEED_URL),
    timeoutMs: 10000
  }
};
