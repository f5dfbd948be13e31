// Declaration order matters: ties between categories go to the earliest entry.
export const CATEGORY_IDS = ['RedTeam', 'BlueTeam', 'AppSec', 'GRC', 'CloudSecurity'] as const;
export type CategoryId = typeof CATEGORY_IDS[number];

export const CHOICES = ['A', 'B', 'C', 'D'] as const;
export type Choice = typeof CHOICES[number];

export const QUESTION_COUNT = 10;

export type ScoreVector = Record<CategoryId, number>;

// Index 0 holds question 1.
export type WeightTable = ReadonlyArray<Readonly<Record<Choice, Readonly<ScoreVector>>>>;

export interface RawQuizQuestion {
  id: number;
  text: string;
  theme?: string;
  options?: Partial<Record<Choice, string>>;
}

export interface QuizOption {
  value: Choice;
  label: string;
}

export interface QuizQuestion {
  id: number; // 1-indexed position in the quiz
  text: string;
  theme: string;
  options: QuizOption[];
}

export interface ClassificationResult {
  domain: CategoryId;
  fullName: string;
  scores: ScoreVector; // all five categories, declaration order
  confidence: number; // 50.0 - 100.0, one decimal
}

export interface RankedCategory {
  id: CategoryId;
  score: number;
}
