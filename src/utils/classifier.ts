import { z } from 'zod';
import weightTableData from '../data/weightTable.json';
import { CATEGORY_DETAILS } from '../config/categories';
import {
  CATEGORY_IDS,
  CHOICES,
  CategoryId,
  Choice,
  ClassificationResult,
  QUESTION_COUNT,
  RankedCategory,
  ScoreVector,
  WeightTable
} from '../types/quiz';

// Gap between the top two scores that maps to 100% confidence.
export const MAX_CONFIDENCE_GAP = 50;

export type QuizValidationDetails =
  | { kind: 'length'; expected: number; actual: number }
  | { kind: 'choice'; question: number; token: string };

const describeValidation = (details: QuizValidationDetails): string => {
  if (details.kind === 'length') {
    return `Expected ${details.expected} responses, got ${details.actual}`;
  }
  return `Invalid answer '${details.token}' for question ${details.question}. Must be A, B, C, or D.`;
};

/**
 * Raised when the caller hands in a malformed answer sheet.
 */
export class QuizValidationError extends Error {
  readonly details: QuizValidationDetails;

  constructor(details: QuizValidationDetails) {
    super(describeValidation(details));
    this.name = 'QuizValidationError';
    this.details = details;
  }
}

/**
 * Raised when the weight table is malformed or incomplete. This is a
 * programming error, not something a user can cause.
 */
export class WeightTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WeightTableError';
  }
}

export const normalizeChoice = (raw: string): string => raw.trim().toUpperCase();

export const isChoice = (value: string): value is Choice => CHOICES.some((c) => c === value);

export const isCategoryId = (value: string): value is CategoryId => CATEGORY_IDS.some((id) => id === value);

const pointsSchema = z.number().int().nonnegative();

const scoreVectorSchema = z.object({
  RedTeam: pointsSchema,
  BlueTeam: pointsSchema,
  AppSec: pointsSchema,
  GRC: pointsSchema,
  CloudSecurity: pointsSchema
}).strict();

const rawWeightTableSchema = z.record(z.string(), z.record(z.string(), scoreVectorSchema));

type RawWeightRow = Record<string, ScoreVector>;

const requireWeights = (row: RawWeightRow, question: number, choice: Choice): Readonly<ScoreVector> => {
  const weights = row[choice];
  if (!weights) {
    throw new WeightTableError(`Weight table has no entry for question ${question}, choice ${choice}`);
  }
  return Object.freeze({ ...weights });
};

/**
 * Validates raw weight-table JSON and turns it into an ordered, frozen table.
 * Every (question, choice) pair from 1..10 x A..D must be present.
 */
export const buildWeightTable = (raw: unknown): WeightTable => {
  const parsed = rawWeightTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new WeightTableError(`Malformed weight table${where}: ${issue ? issue.message : 'unknown error'}`);
  }

  const validQuestionKeys = Array.from({ length: QUESTION_COUNT }, (_, i) => String(i + 1));
  for (const key of Object.keys(parsed.data)) {
    if (!validQuestionKeys.includes(key)) {
      throw new WeightTableError(`Weight table has unexpected question key '${key}'`);
    }
    for (const choice of Object.keys(parsed.data[key])) {
      if (!isChoice(choice)) {
        throw new WeightTableError(`Weight table has unexpected choice '${choice}' for question ${key}`);
      }
    }
  }

  const rows = validQuestionKeys.map((key, index) => {
    const question = index + 1;
    const row = parsed.data[key];
    if (!row) {
      throw new WeightTableError(`Weight table has no entry for question ${question}`);
    }
    return Object.freeze({
      A: requireWeights(row, question, 'A'),
      B: requireWeights(row, question, 'B'),
      C: requireWeights(row, question, 'C'),
      D: requireWeights(row, question, 'D')
    });
  });

  return Object.freeze(rows);
};

// Checked once when the module loads; a broken table stops the app at start-up.
export const WEIGHT_TABLE: WeightTable = buildWeightTable(weightTableData);

export const emptyScores = (): ScoreVector => ({
  RedTeam: 0,
  BlueTeam: 0,
  AppSec: 0,
  GRC: 0,
  CloudSecurity: 0
});

// First category in declaration order wins a tie.
const pickPrimary = (scores: ScoreVector): CategoryId => {
  let best: CategoryId = CATEGORY_IDS[0];
  for (const id of CATEGORY_IDS) {
    if (scores[id] > scores[best]) best = id;
  }
  return best;
};

export const computeConfidence = (scores: ScoreVector): number => {
  const sorted = CATEGORY_IDS.map((id) => scores[id]).sort((a, b) => b - a);
  const gap = sorted[0] - sorted[1];
  const confidence = Math.min(100, 50 + (gap / MAX_CONFIDENCE_GAP) * 50);
  return Math.round(confidence * 10) / 10;
};

/**
 * Scores ten answers against the weight table and picks the best-fitting
 * career category.
 *
 * @throws QuizValidationError when the sheet does not hold exactly ten A-D answers
 */
export const classify = (responses: readonly string[], table: WeightTable = WEIGHT_TABLE): ClassificationResult => {
  if (responses.length !== QUESTION_COUNT) {
    throw new QuizValidationError({ kind: 'length', expected: QUESTION_COUNT, actual: responses.length });
  }

  const scores = emptyScores();

  responses.forEach((raw, index) => {
    const question = index + 1;
    const token = normalizeChoice(raw);
    if (!isChoice(token)) {
      throw new QuizValidationError({ kind: 'choice', question, token });
    }

    const weights = table[index]?.[token];
    if (!weights) {
      throw new WeightTableError(`Weight table has no entry for question ${question}, choice ${token}`);
    }
    for (const id of CATEGORY_IDS) {
      scores[id] += weights[id];
    }
  });

  const domain = pickPrimary(scores);

  return {
    domain,
    fullName: CATEGORY_DETAILS[domain].fullName,
    scores,
    confidence: computeConfidence(scores)
  };
};

// Highest score first; equal scores keep declaration order (Array#sort is stable).
export const rankCategories = (scores: ScoreVector): RankedCategory[] =>
  CATEGORY_IDS.map((id) => ({ id, score: scores[id] })).sort((a, b) => b.score - a.score);
