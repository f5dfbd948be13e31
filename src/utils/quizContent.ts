import { z } from 'zod';
import quizQuestionsData from '../data/quizQuestions.json';
import { CHOICES, QuizQuestion } from '../types/quiz';

const rawQuestionSchema = z.object({
  id: z.number().int().positive(),
  text: z.string().min(1),
  theme: z.string().optional(),
  options: z.object({
    A: z.string().optional(),
    B: z.string().optional(),
    C: z.string().optional(),
    D: z.string().optional()
  }).optional()
});

const rawQuizSchema = z.object({
  questions: z.array(rawQuestionSchema)
});

/**
 * Maps raw question JSON into quiz questions ordered by number, with options
 * listed A to D.
 */
export const loadQuizQuestions = (raw: unknown): QuizQuestion[] => {
  const { questions } = rawQuizSchema.parse(raw);
  return [...questions]
    .sort((a, b) => a.id - b.id)
    .map((q) => ({
      id: q.id,
      text: q.text,
      theme: q.theme ?? '',
      options: CHOICES.flatMap((value) => {
        const label = q.options?.[value];
        return label ? [{ value, label }] : [];
      })
    }));
};

export const QUIZ_QUESTIONS: QuizQuestion[] = loadQuizQuestions(quizQuestionsData);
