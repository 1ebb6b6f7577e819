import { Logger } from '@nestjs/common';
import { MockIncidentEnricher } from '../../../src/modules/incidents/enrichment/mock-incident-enricher';
import { IncidentSeverity } from '../../../src/modules/incidents/models/incident-severity';

describe('MockIncidentEnricher', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('should classify, tag and summarize the description', async () => {
    const enricher = new MockIncidentEnricher({ minDelayMs: 0, maxDelayMs: 0 });

    const result = await enricher.enrich('Database outage in production', 'corr-enrich');

    expect(result).toEqual({
      structuredSummary: '[MOCK AI SUMMARY] Severity: Critical. Issue: Database outage in production',
      severity: IncidentSeverity.Critical,
      tags: ['database', 'production'],
      processingDuration: expect.any(Number),
      confidenceScore: 0.85,
    });
  });

  it('should wait within the configured latency', async () => {
    const enricher = new MockIncidentEnricher({ minDelayMs: 60, maxDelayMs: 80 });

    const result = await enricher.enrich('Slow page loads', 'corr-latency');

    expect(result.processingDuration).toBeGreaterThanOrEqual(55);
    expect(result.processingDuration).toBeLessThan(1000);
  });

  it('should stop waiting as soon as the signal aborts', async () => {
    const enricher = new MockIncidentEnricher({ minDelayMs: 10_000, maxDelayMs: 10_000 });
    const controller = new AbortController();
    const startedAt = Date.now();

    const pending = enricher.enrich('Login is broken', 'corr-abort', controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('should reject immediately with an already aborted signal', async () => {
    const enricher = new MockIncidentEnricher({ minDelayMs: 0, maxDelayMs: 0 });

    await expect(
      enricher.enrich('Login is broken', 'corr-aborted', AbortSignal.abort()),
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});
