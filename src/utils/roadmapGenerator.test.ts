import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getCuratedTrends, MarketData } from './marketIntel';
import { RoadmapCache } from './roadmapCache';
import {
  buildFallbackRoadmap,
  buildPrompt,
  createConfiguredProviders,
  createGeminiProvider,
  createOpenAIProvider,
  generateRoadmap,
  RoadmapProvider,
  RoadmapProviderError
} from './roadmapGenerator';

const mocks = vi.hoisted(() => ({
  generateContentMock: vi.fn()
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = {
      generateContent: mocks.generateContentMock
    };
  }
}));

const market = (skills: string[], certifications: string[]): MarketData => ({
  trendingSkills: skills.map((skill, i) => ({ rank: i + 1, skill, category: '2026 Market Trend' })),
  certifications: certifications.map((certification, i) => ({ rank: i + 1, certification, year: '2026 Standard' })),
  source: 'feed'
});

const fakeProvider = (id: 'gemini' | 'openai', generate: (prompt: string) => Promise<string>): RoadmapProvider => ({
  id,
  generate: vi.fn(generate)
});

const providerConfig = { apiKey: 'test-key', model: 'test-model', timeoutMs: 1000 };

describe('roadmapGenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    mocks.generateContentMock.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  describe('buildPrompt', () => {
    it('uses the dedicated outline for Red Team', () => {
      const prompt = buildPrompt('RedTeam', market(['Skill one'], ['Cert one']));
      expect(prompt.startsWith('Create a highly detailed 6-month offensive security (Red Team) learning roadmap for 2026.')).toBe(true);
      expect(prompt).toContain('- Skill one');
      expect(prompt).toContain('- Cert one');
    });

    it('names the category in the generic outline', () => {
      const prompt = buildPrompt('CloudSecurity', market(['Skill one'], ['Cert one']));
      expect(prompt.split('\n')[0]).toBe(
        'Create a highly detailed 6-month cyber security learning roadmap for the Cloud Security domain in 2026.'
      );
    });

    it('lists at most ten skills and eight certifications', () => {
      const skills = Array.from({ length: 12 }, (_, i) => `Skill ${i + 1}`);
      const certs = Array.from({ length: 10 }, (_, i) => `Cert ${i + 1}`);
      const lines = buildPrompt('GRC', market(skills, certs)).split('\n');

      expect(lines.filter((line) => line.startsWith('- Skill '))).toHaveLength(10);
      expect(lines.filter((line) => line.startsWith('- Cert '))).toHaveLength(8);
      expect(lines).toContain('- Skill 10');
      expect(lines).not.toContain('- Skill 11');
    });

    it('leaves no placeholders behind', () => {
      const prompt = buildPrompt('BlueTeam', getCuratedTrends('BlueTeam'));
      expect(prompt).not.toMatch(/\{(domain|skills|certifications)\}/);
    });
  });

  describe('buildFallbackRoadmap', () => {
    it('titles the generic roadmap with the category label', () => {
      const roadmap = buildFallbackRoadmap('AppSec', market(['Threat modeling'], ['CSSLP']));
      const lines = roadmap.split('\n');
      expect(lines[0]).toBe('# 6-Month AppSec Learning Roadmap');
      expect(lines).toContain('- Threat modeling');
      expect(lines).toContain('- CSSLP');
    });

    it('uses the Red Team template for Red Team', () => {
      const roadmap = buildFallbackRoadmap('RedTeam', getCuratedTrends('RedTeam'));
      expect(roadmap.split('\n')[0]).toBe('# 6-Month Offensive Security (Red Team) Roadmap');
      expect(roadmap).not.toContain('{skills}');
      expect(roadmap).toContain('- AI-driven social engineering');
    });
  });

  describe('createGeminiProvider', () => {
    it('returns the generated text', async () => {
      mocks.generateContentMock.mockResolvedValue({ text: '# Gemini roadmap' });
      const provider = createGeminiProvider(providerConfig);

      await expect(provider.generate('prompt text')).resolves.toBe('# Gemini roadmap');
      expect(mocks.generateContentMock).toHaveBeenCalledWith({
        model: 'test-model',
        contents: [{ parts: [{ text: 'prompt text' }] }],
        config: { temperature: 0.7, maxOutputTokens: 3000 }
      });
    });

    it('rejects an empty response', async () => {
      mocks.generateContentMock.mockResolvedValue({ text: undefined });
      const provider = createGeminiProvider(providerConfig);

      await expect(provider.generate('prompt')).rejects.toThrow('Unexpected response format from Gemini API');
    });

    it('wraps API errors', async () => {
      mocks.generateContentMock.mockRejectedValue(new Error('quota exceeded'));
      const provider = createGeminiProvider(providerConfig);

      const error = await provider.generate('prompt').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RoadmapProviderError);
      expect(error).toMatchObject({ provider: 'gemini', message: 'Error calling Gemini API: quota exceeded' });
    });
  });

  describe('createOpenAIProvider', () => {
    it('posts a chat completion request', async () => {
      const fetchMock = vi.fn(async () => ({
        ok: true,
        status: 200,
        json: async () => ({ choices: [{ message: { content: '# OpenAI roadmap' } }] })
      }));
      vi.stubGlobal('fetch', fetchMock);
      const provider = createOpenAIProvider(providerConfig);

      await expect(provider.generate('prompt text')).resolves.toBe('# OpenAI roadmap');
      expect(fetchMock).toHaveBeenCalledWith('https://api.openai.com/v1/chat/completions', {
        method: 'POST',
        headers: {
          Authorization: 'Bearer test-key',
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          model: 'test-model',
          messages: [
            {
              role: 'system',
              content: 'You are an expert cyber security career advisor who creates detailed, actionable learning roadmaps.'
            },
            { role: 'user', content: 'prompt text' }
          ],
          temperature: 0.7,
          max_tokens: 3000
        })
      });
    });

    it('rejects an HTTP error', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => ({ ok: false, status: 429, json: async () => ({}) })));
      const provider = createOpenAIProvider(providerConfig);

      await expect(provider.generate('prompt')).rejects.toThrow('Error calling OpenAI API: HTTP 429');
    });

    it('rejects a body without choices', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => ({ ok: true, status: 200, json: async () => ({ choices: [] }) })));
      const provider = createOpenAIProvider(providerConfig);

      await expect(provider.generate('prompt')).rejects.toThrow('Unexpected response format from OpenAI API');
    });

    it('wraps network failures', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => {
        throw new TypeError('Failed to fetch');
      }));
      const provider = createOpenAIProvider(providerConfig);

      await expect(provider.generate('prompt')).rejects.toThrow('Error calling OpenAI API: Failed to fetch');
    });
  });

  describe('createConfiguredProviders', () => {
    it('includes only providers with keys, Gemini first', () => {
      const both = createConfiguredProviders({ gemini: providerConfig, openai: providerConfig });
      expect(both.map((p) => p.id)).toEqual(['gemini', 'openai']);

      const openAiOnly = createConfiguredProviders({
        gemini: { model: 'test-model', timeoutMs: 1000 },
        openai: providerConfig
      });
      expect(openAiOnly.map((p) => p.id)).toEqual(['openai']);
    });

    it('returns nothing when no keys are set', () => {
      const none = createConfiguredProviders({
        gemini: { model: 'test-model', timeoutMs: 1000 },
        openai: { model: 'test-model', timeoutMs: 1000 }
      });
      expect(none).toEqual([]);
    });
  });

  describe('generateRoadmap', () => {
    const data = market(['Skill one'], ['Cert one']);
    let cache: RoadmapCache;

    beforeEach(() => {
      cache = new RoadmapCache();
    });

    it('returns the first provider that succeeds', async () => {
      const gemini = fakeProvider('gemini', async () => '# From Gemini');
      const openai = fakeProvider('openai', async () => '# From OpenAI');

      const result = await generateRoadmap('BlueTeam', data, { providers: [gemini, openai], cache });

      expect(result).toMatchObject({
        domain: 'BlueTeam',
        markdown: '# From Gemini',
        source: 'gemini',
        cached: false,
        failures: []
      });
      expect(openai.generate).not.toHaveBeenCalled();
    });

    it('falls through to the next provider on failure', async () => {
      const gemini = fakeProvider('gemini', async () => {
        throw new Error('boom');
      });
      const openai = fakeProvider('openai', async () => '# From OpenAI');

      const result = await generateRoadmap('GRC', data, { providers: [gemini, openai], cache });

      expect(result.source).toBe('openai');
      expect(result.markdown).toBe('# From OpenAI');
      expect(result.failures).toEqual([{ provider: 'gemini', message: 'boom' }]);
    });

    it('uses the template when every provider fails', async () => {
      const gemini = fakeProvider('gemini', async () => {
        throw new Error('gemini down');
      });
      const openai = fakeProvider('openai', async () => {
        throw new Error('openai down');
      });

      const result = await generateRoadmap('AppSec', data, { providers: [gemini, openai], cache });

      expect(result.source).toBe('template');
      expect(result.markdown).toBe(buildFallbackRoadmap('AppSec', data));
      expect(result.failures).toEqual([
        { provider: 'gemini', message: 'gemini down' },
        { provider: 'openai', message: 'openai down' }
      ]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it('uses the template when no provider is configured', async () => {
      const result = await generateRoadmap('CloudSecurity', data, {
        config: {
          gemini: { model: 'test-model', timeoutMs: 1000 },
          openai: { model: 'test-model', timeoutMs: 1000 }
        },
        cache
      });

      expect(result.source).toBe('template');
      expect(result.failures).toEqual([]);
      expect(result.markdown.split('\n')[0]).toBe('# 6-Month Cloud Security Learning Roadmap');
    });

    it('reuses a cached roadmap for the same prompt', async () => {
      const gemini = fakeProvider('gemini', async () => '# From Gemini');

      await generateRoadmap('RedTeam', data, { providers: [gemini], cache });
      const second = await generateRoadmap('RedTeam', data, { providers: [gemini], cache });

      expect(second.cached).toBe(true);
      expect(second.markdown).toBe('# From Gemini');
      expect(gemini.generate).toHaveBeenCalledTimes(1);
    });

    it('does not cache template roadmaps', async () => {
      const gemini = fakeProvider('gemini', async () => {
        throw new Error('down');
      });

      await generateRoadmap('RedTeam', data, { providers: [gemini], cache });
      await generateRoadmap('RedTeam', data, { providers: [gemini], cache });

      expect(gemini.generate).toHaveBeenCalledTimes(2);
    });

    it('falls back with a retry hint when rate limited', async () => {
      vi.useFakeTimers();
      const strict = new RoadmapCache({ maxRequestsPerWindow: 1 });
      const gemini = fakeProvider('gemini', async () => '# From Gemini');

      await generateRoadmap('RedTeam', data, { providers: [gemini], cache: strict });
      vi.advanceTimersByTime(15 * 1000);
      const limited = await generateRoadmap('BlueTeam', data, { providers: [gemini], cache: strict });
      vi.useRealTimers();

      expect(limited.source).toBe('template');
      expect(limited.retryAfter).toBe(45);
      expect(gemini.generate).toHaveBeenCalledTimes(1);
    });

    it('stamps the generation time', async () => {
      const result = await generateRoadmap('GRC', data, { providers: [], cache });
      expect(Number.isNaN(Date.parse(result.generatedAt))).toBe(false);
    });
  });
});
