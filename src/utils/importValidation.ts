/**
 * Validation for imported quiz sessions.
 * Checks size and nesting before looking at the responses and roadmap, so a
 * hostile file cannot stall the page.
 */

import { QUESTION_COUNT } from '../types/quiz';
import { isChoice, normalizeChoice } from './classifier';

export const MAX_IMPORT_BYTES = 5 * 1024 * 1024;
export const MAX_ROADMAP_LENGTH = 200000;

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const VALID: ValidationResult = { isValid: true };

const invalid = (error: string): ValidationResult => ({ isValid: false, error });

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Limits nesting depth, total key count, array length and key length.
 */
export const validateJSONComplexity = (
  obj: unknown,
  maxDepth: number = 10,
  maxKeys: number = 1000,
  currentDepth: number = 0,
  keyCount: { count: number } = { count: 0 }
): ValidationResult => {
  if (currentDepth > maxDepth) {
    return invalid(`JSON structure too deep (max depth: ${maxDepth})`);
  }

  if (keyCount.count > maxKeys) {
    return invalid(`JSON structure too complex (max ${maxKeys} keys)`);
  }

  if (Array.isArray(obj)) {
    if (obj.length > 1000) {
      return invalid('Array too large (max 1000 items)');
    }
    for (const item of obj) {
      const result = validateJSONComplexity(item, maxDepth, maxKeys, currentDepth + 1, keyCount);
      if (!result.isValid) return result;
    }
    return VALID;
  }

  // Null and primitives are fine
  if (!isRecord(obj)) {
    return VALID;
  }

  const entries = Object.entries(obj);
  keyCount.count += entries.length;

  if (entries.length > 100) {
    return invalid('Object has too many keys (max 100 per object)');
  }

  for (const [key, value] of entries) {
    if (key.length > 100) {
      return invalid('Object key too long (max 100 characters)');
    }
    const result = validateJSONComplexity(value, maxDepth, maxKeys, currentDepth + 1, keyCount);
    if (!result.isValid) return result;
  }

  return VALID;
};

const validateResponses = (responses: unknown): ValidationResult => {
  if (!Array.isArray(responses)) {
    return invalid('JSON must contain a responses array');
  }

  if (responses.length !== QUESTION_COUNT) {
    return invalid(`Expected ${QUESTION_COUNT} responses, got ${responses.length}`);
  }

  for (const [index, response] of responses.entries()) {
    // null marks an unanswered question
    if (response === null) continue;
    if (typeof response !== 'string' || !isChoice(normalizeChoice(response))) {
      return invalid(`Invalid answer for question ${index + 1}. Must be A, B, C, D or null.`);
    }
  }

  return VALID;
};

const validateRoadmap = (roadmap: unknown): ValidationResult => {
  if (roadmap === undefined || roadmap === null) {
    return VALID;
  }

  if (!isRecord(roadmap)) {
    return invalid('Invalid roadmap format (must be an object)');
  }

  if (typeof roadmap.markdown !== 'string') {
    return invalid('roadmap must have a markdown string');
  }

  if (roadmap.markdown.length > MAX_ROADMAP_LENGTH) {
    return invalid(`Roadmap too long (max ${MAX_ROADMAP_LENGTH} characters)`);
  }

  return VALID;
};

/**
 * Validate an exported session before it is loaded back into the app
 */
export const validateImportJSON = (jsonString: string): ValidationResult => {
  if (new Blob([jsonString]).size > MAX_IMPORT_BYTES) {
    return invalid('JSON file too large (max 5MB)');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch {
    return invalid('Invalid JSON format');
  }

  if (!isRecord(parsed)) {
    return invalid('JSON must be an object');
  }

  const complexity = validateJSONComplexity(parsed);
  if (!complexity.isValid) {
    return complexity;
  }

  const responses = validateResponses(parsed.responses);
  if (!responses.isValid) {
    return responses;
  }

  return validateRoadmap(parsed.roadmap);
};
