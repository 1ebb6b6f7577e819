import { IncidentSeverity } from '../models/incident-severity';

/**
 * Result of triaging an incident description
 */
export interface EnrichmentResult {
  structuredSummary: string;
  severity: IncidentSeverity;
  tags: string[];
  /** Wall-clock time spent enriching, in milliseconds */
  processingDuration: number;
  /** 0..1 */
  confidenceScore: number;
}

/**
 * Enrichment collaborator
 *
 * Implementations must stop promptly when `signal` aborts (client gone or
 * request deadline reached) by rejecting with the signal's abort error.
 */
export interface IncidentEnricher {
  enrich(description: string, correlationId: string, signal?: AbortSignal): Promise<EnrichmentResult>;
}

export const INCIDENT_ENRICHER = Symbol('INCIDENT_ENRICHER');
