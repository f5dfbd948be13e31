// Market intelligence for a career category: trending skills and certifications.
// Curated data ships with the app; a remote feed can override it when configured.

import { z } from 'zod';
import marketTrendsData from '../data/marketTrends.json';
import { APP_CONFIG, MarketConfig } from '../config/appConfig';
import { CategoryId } from '../types/quiz';
import { isCategoryId } from './classifier';
import { withTimeout } from './timeout';

export const SKILL_TAG = '2026 Market Trend';
export const CERTIFICATION_TAG = '2026 Standard';

export interface TrendingSkill {
  rank: number;
  skill: string;
  category: string;
}

export interface Certification {
  rank: number;
  certification: string;
  year: string;
}

export type MarketDataSource = 'curated' | 'feed';

export interface MarketData {
  trendingSkills: TrendingSkill[];
  certifications: Certification[];
  source: MarketDataSource;
}

interface MarketLists {
  trendingSkills: string[];
  certifications: string[];
}

const feedSchema = z.object({
  trendingSkills: z.array(z.string().min(1)).min(1),
  certifications: z.array(z.string().min(1)).min(1)
});

// Shape of market data persisted in localStorage or an exported session.
export const marketDataSchema = z.object({
  trendingSkills: z.array(z.object({ rank: z.number(), skill: z.string(), category: z.string() })),
  certifications: z.array(z.object({ rank: z.number(), certification: z.string(), year: z.string() })),
  source: z.enum(['curated', 'feed'])
});

const toMarketData = (lists: MarketLists, source: MarketDataSource): MarketData => ({
  trendingSkills: lists.trendingSkills.map((skill, i) => ({ rank: i + 1, skill, category: SKILL_TAG })),
  certifications: lists.certifications.map((certification, i) => ({
    rank: i + 1,
    certification,
    year: CERTIFICATION_TAG
  })),
  source
});

/**
 * Curated market data for a category. Unknown categories get the generic
 * three-item lists.
 */
export const getCuratedTrends = (domain: string): MarketData => {
  const lists: MarketLists = isCategoryId(domain) ? marketTrendsData[domain] : marketTrendsData.default;
  return toMarketData(lists, 'curated');
};

const fetchFeed = async (domain: CategoryId, feedUrl: string): Promise<MarketLists> => {
  const res = await fetch(`${feedUrl.replace(/\/+$/, '')}/${encodeURIComponent(domain)}`, {
    headers: { Accept: 'application/json' }
  });
  if (!res.ok) {
    throw new Error(`Market feed responded with HTTP ${res.status}`);
  }
  return feedSchema.parse(await res.json());
};

/**
 * Market data for a category. Falls back to the curated lists whenever the
 * feed is not configured or cannot be used; never rejects.
 */
export const fetchMarketTrends = async (
  domain: CategoryId,
  config: MarketConfig = APP_CONFIG.market
): Promise<MarketData> => {
  if (!config.feedUrl) {
    return getCuratedTrends(domain);
  }

  try {
    const lists = await withTimeout(fetchFeed(domain, config.feedUrl), config.timeoutMs, 'Market feed');
    return toMarketData(lists, 'feed');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`Market feed unavailable for ${domain}, using curated data:`, error);
    return getCuratedTrends(domain);
  }
};

export const skillNames = (market: MarketData): string[] => market.trendingSkills.map((s) => s.skill);

export const certificationNames = (market: MarketData): string[] =>
  market.certifications.map((c) => c.certification);
