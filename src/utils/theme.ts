// Reads chart colours from the CSS variables in styles.css so the radar chart
// follows light and dark mode instead of hardcoding hex codes.

export interface ChartTheme {
  stroke: string;
  fill: string;
  grid: string;
  text: string;
}

const VAR_MAP: Record<keyof ChartTheme, string> = {
  stroke: '--accent',
  fill: '--accent',
  grid: '--lightgray',
  text: '--text-primary'
};

const DEFAULT_THEME: ChartTheme = {
  stroke: '#2E8B57',
  fill: '#2E8B57',
  grid: '#E3E6EA',
  text: '#1B1F24'
};

// Reads a CSS variable from :root. Falls back to provided default.
const readVar = (varName: string, fallback: string): string => {
  if (typeof window === 'undefined' || !window.document?.documentElement) return fallback;
  const value = getComputedStyle(document.documentElement).getPropertyValue(varName).trim();
  return value || fallback;
};

export const getChartTheme = (): ChartTheme => ({
  stroke: readVar(VAR_MAP.stroke, DEFAULT_THEME.stroke),
  fill: readVar(VAR_MAP.fill, DEFAULT_THEME.fill),
  grid: readVar(VAR_MAP.grid, DEFAULT_THEME.grid),
  text: readVar(VAR_MAP.text, DEFAULT_THEME.text)
});
