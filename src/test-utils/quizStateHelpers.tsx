// Helpers for component tests that mock useQuizState.
// Mock the context module with vi.mock and return createMockQuizState(...) from useQuizState.

import React from 'react';
import { render, RenderOptions } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';
import { vi } from 'vitest';
import type { QuizStateContextValue } from '../context/QuizStateContext';
import { classify } from '../utils/classifier';
import { getCuratedTrends } from '../utils/marketIntel';
import { QUIZ_QUESTIONS } from '../utils/quizContent';
import type { Choice, ClassificationResult } from '../types/quiz';
import type { RoadmapResult } from '../utils/roadmapGenerator';

export const createMockQuizState = (overrides: Partial<QuizStateContextValue> = {}): QuizStateContextValue => ({
  questions: QUIZ_QUESTIONS,
  responses: Array.from({ length: 10 }, () => null),
  currentQuestion: 1,
  setResponse: vi.fn(),
  goToQuestion: vi.fn(),
  submitQuiz: vi.fn(async () => ({ ok: false as const, missing: [] })),
  roadmapStatus: 'idle',
  requestRoadmap: vi.fn(async () => undefined),
  clearRoadmap: vi.fn(),
  hasData: false,
  resetQuiz: vi.fn(),
  exportJSON: vi.fn(() => '{}'),
  importJSON: vi.fn(() => true),
  ...overrides
});

// Every answer the same letter gives a known result, e.g. all A is Red Team at 61%.
export const createSampleResult = (choice: Choice = 'A'): ClassificationResult =>
  classify(Array.from({ length: 10 }, () => choice));

export const createSampleRoadmap = (overrides: Partial<RoadmapResult> = {}): RoadmapResult => ({
  domain: 'RedTeam',
  markdown: '# 6-Month Plan\n\n- Learn Linux',
  source: 'gemini',
  generatedAt: '2026-01-01T00:00:00.000Z',
  cached: false,
  failures: [],
  ...overrides
});

export const createCompletedQuizState = (overrides: Partial<QuizStateContextValue> = {}): QuizStateContextValue => {
  const result = createSampleResult('A');
  return createMockQuizState({
    responses: Array.from({ length: 10 }, (): Choice => 'A'),
    currentQuestion: 10,
    result,
    marketData: getCuratedTrends(result.domain),
    hasData: true,
    ...overrides
  });
};

export const renderWithRouter = (
  ui: React.ReactElement,
  { route = '/', ...options }: Omit<RenderOptions, 'wrapper'> & { route?: string } = {}
) => {
  const Wrapper: React.FC<{ children: React.ReactNode }> = ({ children }) => (
    <MemoryRouter initialEntries={[route]}>{children}</MemoryRouter>
  );
  return render(ui, { wrapper: Wrapper, ...options });
};
