import { describe, it, expect } from 'vitest';
import { FakeTransport } from '../../__tests__/fake-transport.js';
import { getLeadFunnelAnalysis } from '../lead-funnel.js';

function seededTransport(): FakeTransport {
  return new FakeTransport()
    .onQuery('GROUP BY LeadSource, Status', [
      { LeadSource: 'Web', Status: 'Open', expr0: 7 },
      { LeadSource: 'Web', Status: 'Qualified', expr0: 3 },
    ])
    .onQuery('GROUP BY LeadSource ORDER BY COUNT(Id) DESC', [
      { LeadSource: 'Web', expr0: 10 },
      { LeadSource: 'Phone', expr0: 4 },
      { LeadSource: null, expr0: 2 },
    ])
    .onQuery('IsConverted = true GROUP BY LeadSource', [
      { LeadSource: 'Web', expr0: 3 },
    ])
    .onQuery('GROUP BY LeadSource, Rating', [
      { LeadSource: 'Web', Rating: 'Hot', expr0: 2 },
    ])
    .onQuery('ConvertedOpportunityId != null', [
      { Id: '00QA', Name: 'Lee Park', LeadSource: 'Web', ConvertedOpportunity: { Amount: 25000 } },
    ]);
}

describe('getLeadFunnelAnalysis', () => {
  it('merges converted counts into per-source totals', async () => {
    const result = await getLeadFunnelAnalysis(seededTransport());

    expect(result.funnelMetrics).toEqual([
      { source: 'Web', totalLeads: 10, convertedLeads: 3, conversionRate: 30 },
      { source: 'Phone', totalLeads: 4, convertedLeads: 0, conversionRate: 0 },
      { source: null, totalLeads: 2, convertedLeads: 0, conversionRate: 0 },
    ]);
    expect(result.overall).toEqual({ totalLeads: 16, convertedLeads: 3, conversionRate: 18.75 });
  });

  it('reports volume, quality and top converted opportunities', async () => {
    const result = await getLeadFunnelAnalysis(seededTransport());

    expect(result.leadVolume).toEqual([
      { source: 'Web', status: 'Open', count: 7 },
      { source: 'Web', status: 'Qualified', count: 3 },
    ]);
    expect(result.qualityAnalysis).toEqual([{ source: 'Web', rating: 'Hot', count: 2 }]);
    expect(result.topOpportunities).toHaveLength(1);
    expect(result.conversionStage).toBe('Opportunity');
  });

  it('issues the expected queries for a source filter', async () => {
    const transport = new FakeTransport();

    const result = await getLeadFunnelAnalysis(transport, { source: 'Web', timeframe: 'LAST_MONTH' });

    const base = "CreatedDate = LAST_MONTH AND LeadSource = 'Web'";
    expect(transport.callsOf('query')).toEqual([
      `SELECT LeadSource, Status, COUNT(Id) FROM Lead WHERE ${base} GROUP BY LeadSource, Status ORDER BY LeadSource, Status LIMIT 200`,
      `SELECT LeadSource, COUNT(Id) FROM Lead WHERE ${base} GROUP BY LeadSource ORDER BY COUNT(Id) DESC LIMIT 200`,
      `SELECT LeadSource, COUNT(Id) FROM Lead WHERE ${base} AND IsConverted = true GROUP BY LeadSource LIMIT 200`,
      "SELECT LeadSource, Rating, COUNT(Id) FROM Lead WHERE CreatedDate = LAST_MONTH AND Rating != null AND LeadSource = 'Web' " +
        'GROUP BY LeadSource, Rating ORDER BY LeadSource, Rating LIMIT 200',
      'SELECT Id, Name, LeadSource, ConvertedAccount.Name, ConvertedOpportunity.Amount, ' +
        'ConvertedOpportunity.StageName, ConvertedOpportunity.CloseDate FROM Lead ' +
        `WHERE ${base} AND IsConverted = true AND ConvertedOpportunityId != null ` +
        'ORDER BY ConvertedOpportunity.Amount DESC NULLS LAST LIMIT 20',
    ]);
    expect(result.queries).toEqual(transport.callsOf('query'));
    expect(result.overall).toEqual({ totalLeads: 0, convertedLeads: 0, conversionRate: 0 });
  });
});
