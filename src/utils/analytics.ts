import * as amplitude from '@amplitude/analytics-browser';
import { CategoryId } from '../types/quiz';

/**
 * Analytics utility for tracking user interactions
 * Sends events to both Amplitude and Google Analytics (gtag)
 */

export interface EventProperties {
  [key: string]: string | number | boolean | undefined;
}

/**
 * Track a custom event
 */
export const trackEvent = (eventName: string, properties?: EventProperties): void => {
  amplitude.logEvent(eventName, properties);

  if (typeof window !== 'undefined' && window.gtag) {
    window.gtag('event', eventName, properties);
  }
};

/**
 * Track button click events
 */
export const trackButtonClick = (buttonName: string, properties?: EventProperties): void => {
  trackEvent('button_click', {
    button_name: buttonName,
    ...properties
  });
};

export const trackQuizAnswer = (questionId: number, answer: string): void => {
  trackEvent('quiz_answer', {
    question_id: questionId,
    answer
  });
};

/**
 * Track a finished quiz with its classification
 */
export const trackQuizComplete = (domain: CategoryId, confidence: number): void => {
  trackEvent('quiz_complete', {
    domain,
    confidence
  });
};

/**
 * Track where a roadmap came from (AI provider or template)
 */
export const trackRoadmap = (domain: CategoryId, source: string, properties?: EventProperties): void => {
  trackEvent('roadmap_generated', {
    domain,
    source,
    ...properties
  });
};

export type RoadmapRating = 'up' | 'down';

/**
 * Track a thumbs up/down rating of a generated roadmap
 */
export const trackRoadmapFeedback = (domain: CategoryId, rating: RoadmapRating, source: string): void => {
  trackEvent('roadmap_feedback', {
    domain,
    rating,
    source
  });
};

/**
 * Track export/download events
 */
export const trackExport = (exportType: string, properties?: EventProperties): void => {
  trackEvent('export', {
    export_type: exportType,
    ...properties
  });
};

/**
 * Track import events
 */
export const trackImport = (importType: string, success: boolean, properties?: EventProperties): void => {
  trackEvent('import', {
    import_type: importType,
    success,
    ...properties
  });
};
