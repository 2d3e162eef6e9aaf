import { describe, it, expect } from 'vitest';
import { FakeTransport } from '../../__tests__/fake-transport.js';
import { getCaseInsights } from '../case-insights.js';

describe('getCaseInsights', () => {
  it('issues five scoped aggregate queries', async () => {
    const transport = new FakeTransport();

    await getCaseInsights(transport, { priority: 'High' });

    const f = "CreatedDate = THIS_MONTH AND Priority = 'High'";
    expect(transport.callsOf('query')).toEqual([
      `SELECT Status, Priority, COUNT(Id) FROM Case WHERE ${f} GROUP BY Status, Priority ORDER BY Priority, Status LIMIT 200`,
      `SELECT COUNT(Id) FROM Case WHERE ${f} LIMIT 1`,
      `SELECT COUNT(Id) FROM Case WHERE ${f} AND IsEscalated = true LIMIT 1`,
      `SELECT Account.Type, COUNT(Id) FROM Case WHERE ${f} AND Account.Type != null GROUP BY Account.Type ORDER BY COUNT(Id) DESC LIMIT 50`,
      `SELECT Owner.Name, COUNT(Id) FROM Case WHERE ${f} GROUP BY Owner.Name ORDER BY COUNT(Id) DESC LIMIT 10`,
    ]);
  });

  it('derives the escalation rate and reads relationship groupings', async () => {
    const transport = new FakeTransport()
      .onQuery('GROUP BY Status, Priority', [{ Status: 'New', Priority: 'High', expr0: 8 }])
      .onQuery('IsEscalated = true', [{ expr0: 2 }])
      .onQuery(/^SELECT COUNT\(Id\) FROM Case/, [{ expr0: 8 }])
      .onQuery('GROUP BY Account.Type', [{ Type: 'Customer', expr0: 5 }])
      .onQuery('GROUP BY Owner.Name', [{ Name: 'Dana', expr0: 6 }]);

    const result = await getCaseInsights(transport, { status: 'New', timeframe: 'LAST_WEEK' });

    expect(result.filters).toEqual({ priority: null, status: 'New' });
    expect(result.volumeMetrics).toEqual([{ status: 'New', priority: 'High', count: 8 }]);
    expect(result.escalationMetrics).toEqual({ totalCases: 8, escalatedCases: 2, escalationRate: 25 });
    expect(result.channelBreakdown).toEqual([{ accountType: 'Customer', count: 5 }]);
    expect(result.ownerPerformance).toEqual([{ owner: 'Dana', casesHandled: 6 }]);
  });

  it('reports a zero escalation rate when there are no cases', async () => {
    const result = await getCaseInsights(new FakeTransport());

    expect(result.escalationMetrics).toEqual({ totalCases: 0, escalatedCases: 0, escalationRate: 0 });
  });
});
