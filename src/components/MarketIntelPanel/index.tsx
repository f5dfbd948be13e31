import React from 'react';
import type { MarketData } from '../../utils/marketIntel';

interface MarketIntelPanelProps {
  marketData: MarketData;
  domainName: string;
}

const MarketIntelPanel: React.FC<MarketIntelPanelProps> = ({ marketData, domainName }) => (
  <section className='market-intel'>
    <h3>Market Intelligence: {domainName}</h3>
    <p className='market-source'>
      {marketData.source === 'feed' ? 'Live market feed' : 'Curated 2026 market data'}
    </p>

    <div className='market-tables'>
      <div className='market-table'>
        <h4>🔥 Trending Skills</h4>
        <table>
          <thead>
            <tr>
              <th>Rank</th>
              <th>Skill</th>
              <th>Category</th>
            </tr>
          </thead>
          <tbody>
            {marketData.trendingSkills.map((s) => (
              <tr key={s.rank}>
                <td>{s.rank}</td>
                <td>{s.skill}</td>
                <td>{s.category}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className='market-table'>
        <h4>🎓 Top Certifications</h4>
        <table>
          <thead>
            <tr>
              <th>Rank</th>
              <th>Certification</th>
              <th>Year</th>
            </tr>
          </thead>
          <tbody>
            {marketData.certifications.map((c) => (
              <tr key={c.rank}>
                <td>{c.rank}</td>
                <td>{c.certification}</td>
                <td>{c.year}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  </section>
);

export default MarketIntelPanel;
