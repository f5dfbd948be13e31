// Six-month learning roadmap for a career category.
// Providers are tried in order (Gemini, then OpenAI) when their keys are configured;
// if none succeeds the roadmap is filled in from a bundled Markdown template.

import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import redTeamPrompt from '../data/prompts/redTeam.md?raw';
import genericPrompt from '../data/prompts/generic.md?raw';
import redTeamRoadmap from '../data/roadmaps/redTeam.md?raw';
import genericRoadmap from '../data/roadmaps/generic.md?raw';
import { APP_CONFIG, ProviderConfig, RoadmapConfig } from '../config/appConfig';
import { CATEGORY_DETAILS } from '../config/categories';
import { CategoryId } from '../types/quiz';
import { certificationNames, MarketData, skillNames } from './marketIntel';
import { RoadmapCache, roadmapCache } from './roadmapCache';
import { withTimeout } from './timeout';

export const MAX_PROMPT_SKILLS = 10;
export const MAX_PROMPT_CERTIFICATIONS = 8;
const TEMPERATURE = 0.7;
const MAX_OUTPUT_TOKENS = 3000;
const OPENAI_URL = 'https://api.openai.com/v1/chat/completions';
const SYSTEM_PROMPT =
  'You are an expert cyber security career advisor who creates detailed, actionable learning roadmaps.';
const RATE_LIMIT_KEY = 'roadmap';

export type ProviderId = 'gemini' | 'openai';
export type RoadmapSource = ProviderId | 'template';

export interface RoadmapProvider {
  id: ProviderId;
  generate: (prompt: string) => Promise<string>;
}

export interface ProviderFailure {
  provider: ProviderId;
  message: string;
}

export interface RoadmapResult {
  domain: CategoryId;
  markdown: string;
  source: RoadmapSource;
  generatedAt: string;
  cached: boolean;
  failures: ProviderFailure[];
  retryAfter?: number; // seconds, set when provider calls were rate limited
}

export class RoadmapProviderError extends Error {
  readonly provider: ProviderId;

  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoadmapProviderError';
    this.provider = provider;
  }
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const fillTemplate = (template: string, values: Record<string, string>): string =>
  template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);

const bulletList = (items: string[]): string => items.map((item) => `- ${item}`).join('\n');

const templateValues = (domain: CategoryId, market: MarketData): Record<string, string> => ({
  domain: CATEGORY_DETAILS[domain].label,
  skills: bulletList(skillNames(market).slice(0, MAX_PROMPT_SKILLS)),
  certifications: bulletList(certificationNames(market).slice(0, MAX_PROMPT_CERTIFICATIONS))
});

/**
 * Prompt sent to the AI provider. Red Team gets its own detailed outline;
 * every other category shares the generic one.
 */
export const buildPrompt = (domain: CategoryId, market: MarketData): string =>
  fillTemplate(domain === 'RedTeam' ? redTeamPrompt : genericPrompt, templateValues(domain, market));

/**
 * Roadmap used when no AI provider is available.
 */
export const buildFallbackRoadmap = (domain: CategoryId, market: MarketData): string =>
  fillTemplate(domain === 'RedTeam' ? redTeamRoadmap : genericRoadmap, templateValues(domain, market));

type KeyedProviderConfig = ProviderConfig & { apiKey: string };

export const createGeminiProvider = (config: KeyedProviderConfig): RoadmapProvider => {
  const ai = new GoogleGenAI({ apiKey: config.apiKey });

  return {
    id: 'gemini',
    generate: async (prompt) => {
      try {
        const response = await withTimeout(
          ai.models.generateContent({
            model: config.model,
            contents: [{ parts: [{ text: prompt }] }],
            config: {
              temperature: TEMPERATURE,
              maxOutputTokens: MAX_OUTPUT_TOKENS
            }
          }),
          config.timeoutMs,
          'Gemini request'
        );
        const text = response.text;
        if (!text) {
          throw new RoadmapProviderError('gemini', 'Unexpected response format from Gemini API');
        }
        return text;
      } catch (error) {
        if (error instanceof RoadmapProviderError) throw error;
        throw new RoadmapProviderError('gemini', `Error calling Gemini API: ${errorMessage(error)}`, { cause: error });
      }
    }
  };
};

const openAiResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().min(1) })
  })).min(1)
});

export const createOpenAIProvider = (config: KeyedProviderConfig): RoadmapProvider => ({
  id: 'openai',
  generate: async (prompt) => {
    let res: Response;
    try {
      res = await withTimeout(
        fetch(OPENAI_URL, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${config.apiKey}`,
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({
            model: config.model,
            messages: [
              { role: 'system', content: SYSTEM_PROMPT },
              { role: 'user', content: prompt }
            ],
            temperature: TEMPERATURE,
            max_tokens: MAX_OUTPUT_TOKENS
          })
        }),
        config.timeoutMs,
        'OpenAI request'
      );
    } catch (error) {
      throw new RoadmapProviderError('openai', `Error calling OpenAI API: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      throw new RoadmapProviderError('openai', `Error calling OpenAI API: HTTP ${res.status}`);
    }

    const parsed = openAiResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new RoadmapProviderError('openai', 'Unexpected response format from OpenAI API');
    }
    return parsed.data.choices[0].message.content;
  }
});

/**
 * Providers whose API keys are present, in preference order.
 */
export const createConfiguredProviders = (config: RoadmapConfig): RoadmapProvider[] => {
  const providers: RoadmapProvider[] = [];
  const { gemini, openai } = config;
  if (gemini.apiKey) providers.push(createGeminiProvider({ ...gemini, apiKey: gemini.apiKey }));
  if (openai.apiKey) providers.push(createOpenAIProvider({ ...openai, apiKey: openai.apiKey }));
  return providers;
};

export interface GenerateRoadmapOptions {
  config?: RoadmapConfig;
  providers?: RoadmapProvider[];
  cache?: RoadmapCache;
}

/**
 * Generates a roadmap for the category. Never rejects: provider failures are
 * logged, recorded in `failures`, and the template roadmap is returned.
 */
export const generateRoadmap = async (
  domain: CategoryId,
  market: MarketData,
  options: GenerateRoadmapOptions = {}
): Promise<RoadmapResult> => {
  const providers = options.providers ?? createConfiguredProviders(options.config ?? APP_CONFIG.roadmap);
  const cache = options.cache ?? roadmapCache;
  const prompt = buildPrompt(domain, market);
  const failures: ProviderFailure[] = [];
  let retryAfter: number | undefined;

  const result = (markdown: string, source: RoadmapSource, cached: boolean): RoadmapResult => ({
    domain,
    markdown,
    source,
    generatedAt: new Date().toISOString(),
    cached,
    failures,
    ...(retryAfter !== undefined ? { retryAfter } : {})
  });

  for (const provider of providers) {
    const cacheKey = `${provider.id}:${prompt}`;
    const hit = cache.get(cacheKey);
    if (hit !== null) {
      return result(hit, provider.id, true);
    }

    const limit = cache.checkRateLimit(RATE_LIMIT_KEY);
    if (!limit.allowed) {
      retryAfter = limit.retryAfter;
      // eslint-disable-next-line no-console
      console.warn(`Roadmap generation rate limited, retry in ${retryAfter}s`);
      break;
    }

    try {
      const markdown = await provider.generate(prompt);
      cache.set(cacheKey, markdown);
      return result(markdown, provider.id, false);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`Roadmap provider ${provider.id} failed:`, error);
      failures.push({ provider: provider.id, message: errorMessage(error) });
    }
  }

  return result(buildFallbackRoadmap(domain, market), 'template', false);
};
