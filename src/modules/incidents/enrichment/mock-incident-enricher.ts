import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import type { EnrichmentResult, IncidentEnricher } from './incident-enricher.interface';
import { classifySeverity, extractTags, summarize, KEYWORD_RULES } from './keyword-rules';
import { severityName } from '../models/incident-severity';

export interface EnrichmentLatency {
  minDelayMs: number;
  maxDelayMs: number;
}

export const ENRICHMENT_LATENCY = Symbol('ENRICHMENT_LATENCY');

/**
 * Mock enrichment: keyword classification behind a simulated model latency
 *
 * The wait is a timer, so the event loop keeps serving other requests while
 * an enrichment is pending, and it rejects as soon as `signal` aborts.
 */
@Injectable()
export class MockIncidentEnricher implements IncidentEnricher {
  private readonly logger = new Logger(MockIncidentEnricher.name);

  constructor(@Inject(ENRICHMENT_LATENCY) private readonly latency: EnrichmentLatency) {}

  async enrich(
    description: string,
    correlationId: string,
    signal?: AbortSignal,
  ): Promise<EnrichmentResult> {
    const startedAt = Date.now();

    this.logger.log('Mock enrichment started', {
      correlationId,
      descriptionLength: description.length,
    });

    await sleep(this.pickDelay(), undefined, { signal });

    const severity = classifySeverity(description);
    const tags = extractTags(description);
    const processingDuration = Date.now() - startedAt;

    this.logger.log('Mock enrichment completed', {
      correlationId,
      severity: severityName(severity),
      tags,
      durationMs: processingDuration,
    });

    return {
      structuredSummary: summarize(description, severity),
      severity,
      tags,
      processingDuration,
      confidenceScore: KEYWORD_RULES.confidenceScore,
    };
  }

  private pickDelay(): number {
    const { minDelayMs, maxDelayMs } = this.latency;
    if (maxDelayMs <= minDelayMs) {
      return minDelayMs;
    }
    return minDelayMs + Math.floor(Math.random() * (maxDelayMs - minDelayMs));
  }
}
