import React, { createContext, useContext, useEffect, useRef, useState } from 'react';
import * as amplitude from '@amplitude/analytics-browser';
import { z } from 'zod';
import { APP_CONFIG } from '../config/appConfig';
import { CategoryId, Choice, ClassificationResult, QUESTION_COUNT, QuizQuestion } from '../types/quiz';
import { classify, isChoice, normalizeChoice, QuizValidationError } from '../utils/classifier';
import { QUIZ_QUESTIONS } from '../utils/quizContent';
import { fetchMarketTrends, getCuratedTrends, MarketData, marketDataSchema } from '../utils/marketIntel';
import { generateRoadmap, RoadmapResult } from '../utils/roadmapGenerator';
import { validateImportJSON } from '../utils/importValidation';
import { trackEvent, trackImport, trackQuizAnswer, trackQuizComplete, trackRoadmap } from '../utils/analytics';

export type Responses = Array<Choice | null>;

export type RoadmapStatus = 'idle' | 'loading' | 'ready';

export type SubmitOutcome =
  | { ok: true; result: ClassificationResult }
  | { ok: false; missing: number[] }
  | { ok: false; error: string };

interface QuizStateContextValue {
  questions: QuizQuestion[];
  responses: Responses;
  currentQuestion: number;
  setResponse: (question: number, choice: Choice) => void;
  goToQuestion: (question: number) => void;
  submitQuiz: () => Promise<SubmitOutcome>;
  result?: ClassificationResult;
  marketData?: MarketData;
  roadmap?: RoadmapResult;
  roadmapStatus: RoadmapStatus;
  requestRoadmap: () => Promise<RoadmapResult | undefined>;
  clearRoadmap: () => void;
  hasData: boolean;
  resetQuiz: () => void;
  exportJSON: () => string;
  importJSON: (json: string) => boolean;
}

export type { QuizStateContextValue };

const QuizStateContext = createContext<QuizStateContextValue | undefined>(undefined);

export const RESPONSES_KEY = 'career_quiz_responses_v1';
export const RESULT_KEY = 'career_quiz_result_v1';
export const MARKET_KEY = 'career_quiz_market_v1';
export const ROADMAP_KEY = 'career_quiz_roadmap_v1';
export const EXPORT_VERSION = 1;

// Unknown tokens in stored data become unanswered questions.
const responsesSchema = z.array(z.string().nullable()).length(QUESTION_COUNT).transform((items): Responses =>
  items.map((item) => {
    if (item === null) return null;
    const choice = normalizeChoice(item);
    return isChoice(choice) ? choice : null;
  })
);

const storedRoadmapSchema = z.object({
  domain: z.string().optional(),
  markdown: z.string(),
  source: z.enum(['gemini', 'openai', 'template']).optional(),
  generatedAt: z.string().optional()
});

type StoredRoadmap = z.infer<typeof storedRoadmapSchema>;

const loadStored = <S extends z.ZodTypeAny>(key: string, schema: S): z.output<S> | undefined => {
  try {
    const raw = localStorage.getItem(key);
    if (!raw) return undefined;
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
};

const persist = (key: string, value: unknown): void => {
  try {
    localStorage.setItem(key, JSON.stringify(value));
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`Could not save ${key} to localStorage:`, error);
  }
};

const emptyResponses = (): Responses => Array.from({ length: QUESTION_COUNT }, () => null);

const isComplete = (responses: Responses): responses is Choice[] => responses.every((r) => r !== null);

export const missingQuestions = (responses: Responses): number[] =>
  responses.flatMap((r, index) => (r === null ? [index + 1] : []));

const restoreRoadmap = (domain: CategoryId, stored: StoredRoadmap | undefined): RoadmapResult | undefined => {
  // A roadmap written for another category no longer matches the result.
  if (!stored || (stored.domain !== undefined && stored.domain !== domain)) return undefined;
  return {
    domain,
    markdown: stored.markdown,
    source: stored.source ?? 'template',
    generatedAt: stored.generatedAt ?? new Date().toISOString(),
    cached: false,
    failures: []
  };
};

interface SessionState {
  responses: Responses;
  result?: ClassificationResult;
  marketData?: MarketData;
  roadmap?: RoadmapResult;
}

// Scores are always recomputed from the responses, never read back from storage.
const restoreSession = (
  responses: Responses,
  marketData: MarketData | undefined,
  roadmap: StoredRoadmap | undefined
): SessionState => {
  if (!isComplete(responses)) {
    return { responses };
  }
  const result = classify(responses);
  return {
    responses,
    result,
    marketData: marketData ?? getCuratedTrends(result.domain),
    roadmap: restoreRoadmap(result.domain, roadmap)
  };
};

const loadSession = (): SessionState => {
  const responses = loadStored(RESPONSES_KEY, responsesSchema) ?? emptyResponses();
  if (localStorage.getItem(RESULT_KEY) === null) {
    return { responses };
  }
  return restoreSession(
    responses,
    loadStored(MARKET_KEY, marketDataSchema),
    loadStored(ROADMAP_KEY, storedRoadmapSchema)
  );
};

const optional = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> | undefined => {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

export const QuizStateProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const [questions] = useState<QuizQuestion[]>(QUIZ_QUESTIONS);
  const [initial] = useState<SessionState>(loadSession);
  const [responses, setResponses] = useState<Responses>(initial.responses);
  const [currentQuestion, setCurrentQuestion] = useState(1);
  const [result, setResult] = useState<ClassificationResult | undefined>(initial.result);
  const [marketData, setMarketData] = useState<MarketData | undefined>(initial.marketData);
  const [roadmap, setRoadmap] = useState<RoadmapResult | undefined>(initial.roadmap);
  const [roadmapStatus, setRoadmapStatus] = useState<RoadmapStatus>(initial.roadmap ? 'ready' : 'idle');
  // Bumped whenever the session is replaced; async work started under an older
  // value must not write its result back.
  const sessionToken = useRef(0);

  useEffect(() => {
    if (APP_CONFIG.amplitudeApiKey) {
      amplitude.init(APP_CONFIG.amplitudeApiKey, undefined, { defaultTracking: true });
    }
  }, []);

  const setResponse = (question: number, choice: Choice) => {
    if (question < 1 || question > QUESTION_COUNT) return;
    setResponses((prev) => {
      const updated = [...prev];
      updated[question - 1] = choice;
      persist(RESPONSES_KEY, updated);
      return updated;
    });
    trackQuizAnswer(question, choice);
  };

  const goToQuestion = (question: number) => {
    setCurrentQuestion(Math.min(QUESTION_COUNT, Math.max(1, question)));
  };

  const storeRoadmap = (next: RoadmapResult | undefined) => {
    setRoadmap(next);
    setRoadmapStatus(next ? 'ready' : 'idle');
    if (next) {
      persist(ROADMAP_KEY, next);
    } else {
      localStorage.removeItem(ROADMAP_KEY);
    }
  };

  const storeSession = (session: SessionState) => {
    setResponses(session.responses);
    persist(RESPONSES_KEY, session.responses);
    setResult(session.result);
    setMarketData(session.marketData);
    if (session.result) {
      persist(RESULT_KEY, session.result);
    } else {
      localStorage.removeItem(RESULT_KEY);
    }
    if (session.marketData) {
      persist(MARKET_KEY, session.marketData);
    } else {
      localStorage.removeItem(MARKET_KEY);
    }
    storeRoadmap(session.roadmap);
  };

  const submitQuiz = async (): Promise<SubmitOutcome> => {
    if (!isComplete(responses)) {
      return { ok: false, missing: missingQuestions(responses) };
    }

    let classification: ClassificationResult;
    try {
      classification = classify(responses);
    } catch (error) {
      if (error instanceof QuizValidationError) {
        return { ok: false, error: error.message };
      }
      throw error;
    }

    const token = ++sessionToken.current;
    setResult(classification);
    persist(RESULT_KEY, classification);
    storeRoadmap(undefined);
    trackQuizComplete(classification.domain, classification.confidence);

    const market = await fetchMarketTrends(classification.domain);
    if (sessionToken.current !== token) {
      return { ok: true, result: classification };
    }
    setMarketData(market);
    persist(MARKET_KEY, market);

    return { ok: true, result: classification };
  };

  // Resolves to undefined when there is no result yet, or when the quiz was
  // reset, re-submitted or imported while the roadmap was being generated.
  const requestRoadmap = async (): Promise<RoadmapResult | undefined> => {
    if (!result || !marketData) return undefined;
    const token = sessionToken.current;
    setRoadmapStatus('loading');
    const generated = await generateRoadmap(result.domain, marketData);
    if (sessionToken.current !== token) {
      return undefined;
    }
    storeRoadmap(generated);
    trackRoadmap(result.domain, generated.source, {
      cached: generated.cached,
      failures: generated.failures.length
    });
    return generated;
  };

  const clearRoadmap = () => {
    storeRoadmap(undefined);
  };

  const resetQuiz = () => {
    sessionToken.current++;
    storeSession({ responses: emptyResponses() });
    localStorage.removeItem(RESPONSES_KEY);
    setCurrentQuestion(1);
    trackEvent('quiz_reset');
  };

  const exportJSON = () => JSON.stringify({
    version: EXPORT_VERSION,
    exportedAt: new Date().toISOString(),
    responses,
    result: result ?? null,
    marketData: marketData ?? null,
    roadmap: roadmap ?? null
  }, null, 2);

  const importJSON = (json: string): boolean => {
    const validation = validateImportJSON(json);
    if (!validation.isValid) {
      // eslint-disable-next-line no-console
      console.warn('Import rejected:', validation.error);
      trackImport('json', false, { error: validation.error });
      return false;
    }

    const doc = z.object({
      responses: responsesSchema,
      marketData: z.unknown(),
      roadmap: z.unknown()
    }).safeParse(JSON.parse(json));
    if (!doc.success) {
      trackImport('json', false, { error: 'unreadable responses' });
      return false;
    }

    const session = restoreSession(
      doc.data.responses,
      optional(marketDataSchema, doc.data.marketData),
      optional(storedRoadmapSchema, doc.data.roadmap)
    );
    sessionToken.current++;
    storeSession(session);
    setCurrentQuestion(1);
    trackImport('json', true, { complete: session.result !== undefined });
    return true;
  };

  const hasData = result !== undefined || responses.some((r) => r !== null);

  return (
    <QuizStateContext.Provider
      value={{
        questions,
        responses,
        currentQuestion,
        setResponse,
        goToQuestion,
        submitQuiz,
        result,
        marketData,
        roadmap,
        roadmapStatus,
        requestRoadmap,
        clearRoadmap,
        hasData,
        resetQuiz,
        exportJSON,
        importJSON
      }}
    >
      {children}
    </QuizStateContext.Provider>
  );
};

export const useQuizState = () => {
  const ctx = useContext(QuizStateContext);
  if (!ctx) throw new Error('useQuizState must be used within a QuizStateProvider');
  return ctx;
};
