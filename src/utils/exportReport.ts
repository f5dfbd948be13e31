import { CATEGORY_DETAILS } from '../config/categories';
import { ClassificationResult } from '../types/quiz';
import { rankCategories } from './classifier';
import { MarketData } from './marketIntel';

export interface ResultsReport {
  result: ClassificationResult;
  marketData?: MarketData;
  roadmap?: { markdown: string } | null;
}

// Pipes would break a Markdown table cell.
const cell = (value: string | number): string => String(value).replace(/\|/g, '\\|');

const table = (headers: string[], rows: Array<Array<string | number>>): string[] => [
  `| ${headers.join(' | ')} |`,
  `| ${headers.map(() => '---').join(' | ')} |`,
  ...rows.map((row) => `| ${row.map(cell).join(' | ')} |`)
];

/**
 * Markdown report of a finished quiz: classification, ranked scores and, when
 * available, market intelligence and the learning roadmap.
 */
export const buildResultsMarkdown = ({ result, marketData, roadmap }: ResultsReport): string => {
  const lines: string[] = [
    '# Cyber Security Career Assessment',
    '',
    `**Primary domain:** ${result.fullName}`,
    '',
    `**Confidence:** ${result.confidence}%`,
    '',
    CATEGORY_DETAILS[result.domain].description,
    '',
    '## Domain Scores',
    '',
    ...table(
      ['Rank', 'Domain', 'Score'],
      rankCategories(result.scores).map((entry, i) => [i + 1, CATEGORY_DETAILS[entry.id].fullName, entry.score])
    )
  ];

  if (marketData) {
    lines.push(
      '',
      '## Trending Skills',
      '',
      ...table(
        ['Rank', 'Skill', 'Category'],
        marketData.trendingSkills.map((s) => [s.rank, s.skill, s.category])
      ),
      '',
      '## Top Certifications',
      '',
      ...table(
        ['Rank', 'Certification', 'Year'],
        marketData.certifications.map((c) => [c.rank, c.certification, c.year])
      )
    );
  }

  if (roadmap) {
    lines.push('', '## Learning Roadmap', '', roadmap.markdown.trim());
  }

  return `${lines.join('\n')}\n`;
};

/**
 * Offers text content as a file download through a temporary object URL.
 */
export const downloadText = (content: string, filename: string, mime: string): void => {
  const blob = new Blob([content], { type: mime });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
};
