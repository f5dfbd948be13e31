import { act, renderHook } from '@testing-library/react';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  EXPORT_VERSION,
  MARKET_KEY,
  missingQuestions,
  QuizStateProvider,
  RESPONSES_KEY,
  RESULT_KEY,
  ROADMAP_KEY,
  SubmitOutcome,
  useQuizState
} from './QuizStateContext';
import { fetchMarketTrends, getCuratedTrends, type MarketData } from '../utils/marketIntel';
import type { RoadmapResult } from '../utils/roadmapGenerator';

const mocks = vi.hoisted(() => ({
  generateRoadmapMock: vi.fn()
}));

vi.mock('../utils/roadmapGenerator', () => ({
  generateRoadmap: mocks.generateRoadmapMock
}));

vi.mock('../utils/marketIntel', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/marketIntel')>();
  return {
    ...actual,
    fetchMarketTrends: vi.fn(async (domain: string) => actual.getCuratedTrends(domain))
  };
});

vi.mock('../utils/analytics', () => ({
  trackEvent: vi.fn(),
  trackImport: vi.fn(),
  trackQuizAnswer: vi.fn(),
  trackQuizComplete: vi.fn(),
  trackRoadmap: vi.fn()
}));

const renderQuizState = () => renderHook(() => useQuizState(), { wrapper: QuizStateProvider });

type QuizHook = ReturnType<typeof renderQuizState>['result'];

const answerAll = (hook: QuizHook, choice: 'A' | 'B' | 'C' | 'D') => {
  act(() => {
    for (let q = 1; q <= 10; q++) {
      hook.current.setResponse(q, choice);
    }
  });
};

const submit = async (hook: QuizHook): Promise<SubmitOutcome> => {
  let outcome: SubmitOutcome = { ok: false, missing: [] };
  await act(async () => {
    outcome = await hook.current.submitQuiz();
  });
  return outcome;
};

describe('QuizStateContext', () => {
  beforeEach(() => {
    localStorage.clear();
    vi.clearAllMocks();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    mocks.generateRoadmapMock.mockImplementation(async (domain: string) => ({
      domain,
      markdown: '# Test roadmap',
      source: 'template',
      generatedAt: '2026-01-01T00:00:00.000Z',
      cached: false,
      failures: []
    }));
  });

  it('starts with an empty quiz', () => {
    const { result } = renderQuizState();

    expect(result.current.questions).toHaveLength(10);
    expect(result.current.responses).toEqual(Array(10).fill(null));
    expect(result.current.currentQuestion).toBe(1);
    expect(result.current.result).toBeUndefined();
    expect(result.current.hasData).toBe(false);
    expect(result.current.roadmapStatus).toBe('idle');
  });

  it('stores and persists a response', () => {
    const { result } = renderQuizState();

    act(() => result.current.setResponse(3, 'C'));

    expect(result.current.responses[2]).toBe('C');
    expect(result.current.hasData).toBe(true);
    expect(JSON.parse(localStorage.getItem(RESPONSES_KEY) ?? '[]')[2]).toBe('C');
  });

  it('ignores out-of-range questions', () => {
    const { result } = renderQuizState();

    act(() => result.current.setResponse(11, 'A'));

    expect(result.current.responses).toEqual(Array(10).fill(null));
  });

  it('clamps navigation to the quiz', () => {
    const { result } = renderQuizState();

    act(() => result.current.goToQuestion(12));
    expect(result.current.currentQuestion).toBe(10);

    act(() => result.current.goToQuestion(0));
    expect(result.current.currentQuestion).toBe(1);
  });

  it('lists unanswered questions on submit', async () => {
    const { result } = renderQuizState();
    act(() => result.current.setResponse(1, 'A'));

    const outcome = await submit(result);

    expect(outcome).toEqual({ ok: false, missing: [2, 3, 4, 5, 6, 7, 8, 9, 10] });
    expect(result.current.result).toBeUndefined();
  });

  it('classifies a complete quiz and loads market data', async () => {
    const { result } = renderQuizState();
    answerAll(result, 'A');

    const outcome = await submit(result);

    expect(outcome.ok).toBe(true);
    expect(result.current.result).toEqual({
      domain: 'RedTeam',
      fullName: 'Red Team (Offensive)',
      scores: { RedTeam: 42, BlueTeam: 18, AppSec: 31, GRC: 3, CloudSecurity: 21 },
      confidence: 61
    });
    expect(result.current.marketData?.trendingSkills[0].skill).toBe('AI-driven social engineering');
    expect(localStorage.getItem(RESULT_KEY)).not.toBeNull();
    expect(localStorage.getItem(MARKET_KEY)).not.toBeNull();
  });

  it('generates and clears a roadmap', async () => {
    const { result } = renderQuizState();
    answerAll(result, 'B');
    await submit(result);

    await act(async () => {
      await result.current.requestRoadmap();
    });

    expect(mocks.generateRoadmapMock).toHaveBeenCalledWith('BlueTeam', result.current.marketData);
    expect(result.current.roadmapStatus).toBe('ready');
    expect(result.current.roadmap?.markdown).toBe('# Test roadmap');
    expect(localStorage.getItem(ROADMAP_KEY)).not.toBeNull();

    act(() => result.current.clearRoadmap());

    expect(result.current.roadmap).toBeUndefined();
    expect(result.current.roadmapStatus).toBe('idle');
    expect(localStorage.getItem(ROADMAP_KEY)).toBeNull();
  });

  it('does not request a roadmap before the quiz is submitted', async () => {
    const { result } = renderQuizState();

    let roadmap: unknown = 'unset';
    await act(async () => {
      roadmap = await result.current.requestRoadmap();
    });

    expect(roadmap).toBeUndefined();
    expect(mocks.generateRoadmapMock).not.toHaveBeenCalled();
  });

  it('resets everything on retake', async () => {
    const { result } = renderQuizState();
    answerAll(result, 'C');
    await submit(result);
    act(() => result.current.goToQuestion(7));

    act(() => result.current.resetQuiz());

    expect(result.current.responses).toEqual(Array(10).fill(null));
    expect(result.current.result).toBeUndefined();
    expect(result.current.marketData).toBeUndefined();
    expect(result.current.currentQuestion).toBe(1);
    expect(result.current.hasData).toBe(false);
    expect(localStorage.getItem(RESPONSES_KEY)).toBeNull();
    expect(localStorage.getItem(RESULT_KEY)).toBeNull();
    expect(localStorage.getItem(MARKET_KEY)).toBeNull();
  });

  it('restores a session and recomputes its scores', () => {
    localStorage.setItem(RESPONSES_KEY, JSON.stringify(Array(10).fill('B')));
    localStorage.setItem(RESULT_KEY, JSON.stringify({ domain: 'GRC', scores: { GRC: 999 }, confidence: 100 }));

    const { result } = renderQuizState();

    expect(result.current.result?.domain).toBe('BlueTeam');
    expect(result.current.result?.confidence).toBe(60);
    expect(result.current.marketData?.source).toBe('curated');
  });

  it('ignores unreadable stored responses', () => {
    localStorage.setItem(RESPONSES_KEY, '{not json');

    const { result } = renderQuizState();

    expect(result.current.responses).toEqual(Array(10).fill(null));
  });

  describe('export and import', () => {
    it('exports the session', async () => {
      const { result } = renderQuizState();
      answerAll(result, 'D');
      await submit(result);

      const exported = JSON.parse(result.current.exportJSON());

      expect(exported.version).toBe(EXPORT_VERSION);
      expect(exported.responses).toEqual(Array(10).fill('D'));
      expect(exported.result.domain).toBe('GRC');
      expect(exported.marketData.source).toBe('curated');
      expect(exported.roadmap).toBeNull();
    });

    it('imports a session, recomputing the result', () => {
      const { result } = renderQuizState();
      const json = JSON.stringify({
        responses: Array(10).fill('d'),
        result: { domain: 'RedTeam', confidence: 100 },
        roadmap: { domain: 'GRC', markdown: '# Imported', source: 'openai', generatedAt: '2026-02-01T00:00:00.000Z' }
      });

      let imported = false;
      act(() => {
        imported = result.current.importJSON(json);
      });

      expect(imported).toBe(true);
      expect(result.current.responses).toEqual(Array(10).fill('D'));
      expect(result.current.result?.domain).toBe('GRC');
      expect(result.current.result?.confidence).toBe(78);
      expect(result.current.roadmap).toEqual({
        domain: 'GRC',
        markdown: '# Imported',
        source: 'openai',
        generatedAt: '2026-02-01T00:00:00.000Z',
        cached: false,
        failures: []
      });
      expect(result.current.roadmapStatus).toBe('ready');
    });

    it('drops a roadmap written for another category', () => {
      const { result } = renderQuizState();
      const json = JSON.stringify({
        responses: Array(10).fill('A'),
        roadmap: { domain: 'GRC', markdown: '# Other' }
      });

      act(() => {
        result.current.importJSON(json);
      });

      expect(result.current.result?.domain).toBe('RedTeam');
      expect(result.current.roadmap).toBeUndefined();
    });

    it('imports a partial session without a result', () => {
      const { result } = renderQuizState();
      const responses = Array(10).fill(null);
      responses[0] = 'A';

      act(() => {
        result.current.importJSON(JSON.stringify({ responses }));
      });

      expect(result.current.responses[0]).toBe('A');
      expect(result.current.result).toBeUndefined();
      expect(localStorage.getItem(RESULT_KEY)).toBeNull();
    });

    it('rejects an invalid document', () => {
      const { result } = renderQuizState();

      let imported = true;
      act(() => {
        imported = result.current.importJSON(JSON.stringify({ responses: ['A'] }));
      });

      expect(imported).toBe(false);
      expect(result.current.responses).toEqual(Array(10).fill(null));
    });
  });

  describe('work that finishes after the session changed', () => {
    const redTeamRoadmap: RoadmapResult = {
      domain: 'RedTeam',
      markdown: '# Red Team plan',
      source: 'gemini',
      generatedAt: '2026-01-01T00:00:00.000Z',
      cached: false,
      failures: []
    };

    const holdRoadmap = () => {
      let finish: (value: RoadmapResult) => void = () => {};
      mocks.generateRoadmapMock.mockImplementationOnce(
        () => new Promise<RoadmapResult>((resolve) => {
          finish = resolve;
        })
      );
      return (value: RoadmapResult) => finish(value);
    };

    it('drops a roadmap for the previous result after a resubmit', async () => {
      const finish = holdRoadmap();
      const { result } = renderQuizState();
      answerAll(result, 'A');
      await submit(result);

      let pending: Promise<RoadmapResult | undefined> = Promise.resolve(undefined);
      act(() => {
        pending = result.current.requestRoadmap();
      });
      expect(result.current.roadmapStatus).toBe('loading');

      answerAll(result, 'D');
      await submit(result);

      let late: RoadmapResult | undefined = redTeamRoadmap;
      await act(async () => {
        finish(redTeamRoadmap);
        late = await pending;
      });

      expect(late).toBeUndefined();
      expect(result.current.result?.domain).toBe('GRC');
      expect(result.current.roadmap).toBeUndefined();
      expect(result.current.roadmapStatus).toBe('idle');
      expect(localStorage.getItem(ROADMAP_KEY)).toBeNull();
    });

    it('drops a roadmap that finishes after a reset', async () => {
      const finish = holdRoadmap();
      const { result } = renderQuizState();
      answerAll(result, 'A');
      await submit(result);

      let pending: Promise<RoadmapResult | undefined> = Promise.resolve(undefined);
      act(() => {
        pending = result.current.requestRoadmap();
      });
      act(() => result.current.resetQuiz());

      await act(async () => {
        finish(redTeamRoadmap);
        await pending;
      });

      expect(result.current.result).toBeUndefined();
      expect(result.current.roadmap).toBeUndefined();
      expect(result.current.roadmapStatus).toBe('idle');
      expect(localStorage.getItem(ROADMAP_KEY)).toBeNull();
    });

    it('drops market data that arrives after a reset', async () => {
      let deliver: (value: MarketData) => void = () => {};
      vi.mocked(fetchMarketTrends).mockImplementationOnce(
        () => new Promise<MarketData>((resolve) => {
          deliver = resolve;
        })
      );
      const { result } = renderQuizState();
      answerAll(result, 'A');

      let pending: Promise<SubmitOutcome> = Promise.resolve({ ok: false, missing: [] });
      act(() => {
        pending = result.current.submitQuiz();
      });
      act(() => result.current.resetQuiz());

      await act(async () => {
        deliver(getCuratedTrends('RedTeam'));
        await pending;
      });

      expect(result.current.result).toBeUndefined();
      expect(result.current.marketData).toBeUndefined();
      expect(localStorage.getItem(MARKET_KEY)).toBeNull();
    });
  });

  it('lists missing questions', () => {
    expect(missingQuestions(['A', null, 'B', null, 'C', 'D', 'A', 'B', 'C', null])).toEqual([2, 4, 10]);
  });

  it('throws outside the provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useQuizState())).toThrow('useQuizState must be used within a QuizStateProvider');
  });
});
