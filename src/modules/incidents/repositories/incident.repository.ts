import type { Incident, IncidentFilter } from '../models/incident.model';

/**
 * Incident store
 *
 * The only shared mutable resource of the service. Implementations must
 * serialize access so concurrent requests never observe a partial write.
 */
export interface IncidentRepository {
  add(incident: Incident): Promise<void>;
  findById(id: string): Promise<Incident | undefined>;
  list(filter?: IncidentFilter): Promise<Incident[]>;
  count(): Promise<number>;
}

export const INCIDENT_REPOSITORY = Symbol('INCIDENT_REPOSITORY');
