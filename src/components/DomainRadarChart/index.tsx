import React, { useEffect, useState } from 'react';
import { PolarAngleAxis, PolarGrid, PolarRadiusAxis, Radar, RadarChart, ResponsiveContainer, Tooltip } from 'recharts';
import { CATEGORY_DETAILS } from '../../config/categories';
import { CATEGORY_IDS, ScoreVector } from '../../types/quiz';
import { getChartTheme } from '../../utils/theme';

interface DomainRadarChartProps {
  scores: ScoreVector;
}

export interface DomainChartPoint {
  category: string;
  score: number;
  fullName: string;
}

// Exported for testability: one point per category, in declaration order.
export const buildChartData = (scores: ScoreVector): DomainChartPoint[] => CATEGORY_IDS.map((id) => ({
  category: CATEGORY_DETAILS[id].label,
  score: scores[id],
  fullName: CATEGORY_DETAILS[id].fullName
}));

// Leaves headroom above the best score; an all-zero chart still gets a usable scale.
export const radiusDomain = (scores: ScoreVector): [number, number] => {
  const max = Math.max(...CATEGORY_IDS.map((id) => scores[id]));
  return max > 0 ? [0, max + 5] : [0, 10];
};

interface TooltipProps {
  active?: boolean;
  payload?: Array<{ payload: DomainChartPoint }>;
}

export const CustomTooltip: React.FC<TooltipProps> = ({ active, payload }) => {
  if (active && payload && payload.length) {
    return (
      <div className='radar-tooltip'>
        <p className='radar-tooltip-title'>{payload[0].payload.fullName}</p>
        <p className='radar-tooltip-score'>{payload[0].payload.score} pts</p>
      </div>
    );
  }
  return null;
};

const DomainRadarChart: React.FC<DomainRadarChartProps> = ({ scores }) => {
  const [darkMode, setDarkMode] = useState(false);

  useEffect(() => {
    const checkDarkMode = () => {
      setDarkMode(document.documentElement.classList.contains('dark'));
    };

    checkDarkMode();

    const observer = new MutationObserver(checkDarkMode);
    observer.observe(document.documentElement, {
      attributes: true,
      attributeFilter: ['class']
    });

    return () => observer.disconnect();
  }, []);

  // Colours come from CSS variables (--accent, --lightgray, --text-primary);
  // the dark class on <html> swaps the variable set, so re-read on toggle.
  const theme = getChartTheme();
  const grid = darkMode
    ? getComputedStyle(document.documentElement).getPropertyValue('--card-bg').trim() || theme.grid
    : theme.grid;

  return (
    <div className='radar-chart-container' data-dark={darkMode}>
      <ResponsiveContainer width="100%" height="100%">
        <RadarChart data={buildChartData(scores)}>
          <PolarGrid stroke={grid} />
          <PolarAngleAxis dataKey="category" tick={{ fill: theme.text, fontSize: 12 }} />
          <PolarRadiusAxis angle={90} domain={radiusDomain(scores)} tick={{ fill: theme.text, fontSize: 11 }} />
          <Radar
            name="Score"
            dataKey="score"
            stroke={theme.stroke}
            fill={theme.fill}
            fillOpacity={0.6}
            strokeWidth={2}
          />
          <Tooltip content={<CustomTooltip />} />
        </RadarChart>
      </ResponsiveContainer>
    </div>
  );
};

export default DomainRadarChart;
