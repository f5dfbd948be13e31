import React, { useState } from 'react';
import { Link } from 'react-router-dom';
import { useQuizState } from '../../context/QuizStateContext';
import { CATEGORY_DETAILS, describeCategory } from '../../config/categories';
import { QUESTION_COUNT } from '../../types/quiz';
import { rankCategories } from '../../utils/classifier';
import { buildResultsMarkdown, downloadText } from '../../utils/exportReport';
import type { RoadmapResult } from '../../utils/roadmapGenerator';
import { trackExport, trackRoadmapFeedback, type RoadmapRating } from '../../utils/analytics';
import DomainRadarChart from '../DomainRadarChart';
import MarketIntelPanel from '../MarketIntelPanel';
import { TrackedButton } from '../TrackedButton';
import { Toast, type ToastType } from '../Toast';

export interface ToastState {
  message: string;
  type: ToastType;
}

/**
 * Notice shown when a roadmap came from the template instead of an AI provider.
 * Returns null for provider roadmaps.
 */
export const fallbackNotice = (roadmap: RoadmapResult): ToastState | null => {
  if (roadmap.source !== 'template') return null;
  if (roadmap.retryAfter !== undefined) {
    return {
      message: `AI rate limit reached, showing the template roadmap. Try again in ${roadmap.retryAfter}s.`,
      type: 'warning'
    };
  }
  if (roadmap.failures.length > 0) {
    const providers = roadmap.failures.map((f) => f.provider).join(', ');
    return { message: `AI generation failed (${providers}), showing the template roadmap.`, type: 'warning' };
  }
  return { message: 'No AI provider configured, showing the template roadmap.', type: 'info' };
};

const exportDate = () => new Date().toISOString().split('T')[0];

const Results: React.FC = () => {
  const { result, marketData, roadmap, roadmapStatus, requestRoadmap, clearRoadmap, exportJSON } = useQuizState();
  const [toast, setToast] = useState<ToastState | null>(null);
  const [roadmapError, setRoadmapError] = useState<string | null>(null);
  const [rating, setRating] = useState<RoadmapRating | null>(null);

  if (!result) {
    return (
      <div className='panel results-panel'>
        <h2>🎯 Your Career DNA Results</h2>
        <p className='empty-state'>
          No results yet. <Link to='/quiz'>Take the quiz</Link> to discover your cyber security domain.
        </p>
      </div>
    );
  }

  const onGenerate = async () => {
    setRoadmapError(null);
    try {
      const generated = await requestRoadmap();
      if (!generated) {
        setRoadmapError('Please complete the quiz first.');
        return;
      }
      setToast(fallbackNotice(generated));
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('Error generating roadmap:', error);
      setRoadmapError(`Error generating roadmap: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  const onRate = (value: RoadmapRating) => {
    if (!roadmap) return;
    setRating(value);
    trackRoadmapFeedback(result.domain, value, roadmap.source);
  };

  const onRegenerate = () => {
    setRating(null);
    clearRoadmap();
  };

  const onExportJSON = () => {
    downloadText(exportJSON(), `career-quiz-${exportDate()}.json`, 'application/json');
    trackExport('json', { domain: result.domain });
  };

  const onExportMarkdown = () => {
    downloadText(
      buildResultsMarkdown({ result, marketData, roadmap }),
      `career-results-${exportDate()}.md`,
      'text/markdown'
    );
    trackExport('markdown', { domain: result.domain, has_roadmap: roadmap !== undefined });
  };

  return (
    <div className='panel results-panel'>
      <h2>🎯 Your Career DNA Results</h2>

      <section className='results-summary'>
        <div className='results-primary'>
          <h3>Your Primary Domain: <strong>{result.fullName}</strong></h3>
          <p className='results-confidence'><strong>Confidence:</strong> {result.confidence}%</p>
          <p className='results-description'>{describeCategory(result.fullName)}</p>
        </div>
        <div className='results-stats'>
          <div className='stat'>
            <span className='stat-label'>Total Questions</span>
            <span className='stat-value'>{QUESTION_COUNT}</span>
          </div>
          <div className='stat'>
            <span className='stat-label'>Completed</span>
            <span className='stat-value'>✅</span>
          </div>
        </div>
      </section>

      <section className='results-chart'>
        <h3>📊 Domain Score Breakdown</h3>
        <DomainRadarChart scores={result.scores} />
      </section>

      <section className='results-scores'>
        <h3>📈 Detailed Scores</h3>
        <table className='score-table'>
          <thead>
            <tr>
              <th>Domain</th>
              <th>Score</th>
            </tr>
          </thead>
          <tbody>
            {rankCategories(result.scores).map((c) => (
              <tr key={c.id} className={c.id === result.domain ? 'primary-row' : undefined}>
                <td>{CATEGORY_DETAILS[c.id].fullName}</td>
                <td>{c.score}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </section>

      {marketData && <MarketIntelPanel marketData={marketData} domainName={result.fullName} />}

      <section className='roadmap-section'>
        {roadmap ? (
          <>
            <h3>🗺️ Your Personalized Learning Roadmap</h3>
            <pre className='roadmap-markdown'>{roadmap.markdown}</pre>
            <div className='roadmap-feedback'>
              {rating ? (
                <span>Thanks for your feedback!</span>
              ) : (
                <>
                  <span>Was this roadmap helpful?</span>
                  <button type='button' aria-label='Helpful' onClick={() => onRate('up')}>👍</button>
                  <button type='button' aria-label='Not helpful' onClick={() => onRate('down')}>👎</button>
                </>
              )}
            </div>
            <TrackedButton
              trackingName='regenerate_roadmap'
              trackingProperties={{ domain: result.domain, source: roadmap.source }}
              className='btn-secondary'
              onClick={onRegenerate}
            >
              🔄 Regenerate Roadmap
            </TrackedButton>
          </>
        ) : (
          <TrackedButton
            trackingName='generate_roadmap'
            trackingProperties={{ domain: result.domain }}
            className='btn-primary'
            disabled={roadmapStatus === 'loading'}
            onClick={onGenerate}
          >
            {roadmapStatus === 'loading'
              ? '🤖 Generating your personalized roadmap... This may take a moment.'
              : '🗺️ Generate Roadmap'}
          </TrackedButton>
        )}
        {roadmapError && <p className='warning'>{roadmapError}</p>}
      </section>

      <div className='export-actions'>
        <TrackedButton trackingName='export_results_json' onClick={onExportJSON}>
          Export JSON
        </TrackedButton>
        <TrackedButton trackingName='export_results_markdown' onClick={onExportMarkdown}>
          Export Markdown
        </TrackedButton>
      </div>

      {toast && (
        <Toast
          message={toast.message}
          type={toast.type}
          onClose={() => setToast(null)}
        />
      )}
    </div>
  );
};

export default Results;
