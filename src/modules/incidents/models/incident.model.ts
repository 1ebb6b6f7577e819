import { IncidentSeverity } from './incident-severity';

/**
 * Incident ticket. Immutable once created; there is no update operation.
 */
export interface Incident {
  readonly id: string;
  readonly userDescription: string;
  readonly structuredSummary: string | null;
  readonly severity: IncidentSeverity;
  readonly tags: readonly string[];
  readonly createdAt: Date;
  /** Correlation ID of the request that created the incident */
  readonly correlationId: string;
}

export interface IncidentFilter {
  severity?: IncidentSeverity;
}
