import { Injectable } from '@nestjs/common';
import { BusinessException } from '../../../common/exceptions/business-exceptions';
import type { Incident, IncidentFilter } from '../models/incident.model';
import type { IncidentRepository } from './incident.repository';

/**
 * Process-lifetime incident store
 *
 * Every operation runs through one promise-chain lock, so reads and writes
 * from concurrent requests are applied one at a time in arrival order.
 * Nothing survives a restart.
 */
@Injectable()
export class InMemoryIncidentRepository implements IncidentRepository {
  private readonly incidents: Incident[] = [];
  private tail: Promise<void> = Promise.resolve();

  add(incident: Incident): Promise<void> {
    return this.exclusive(() => {
      if (this.incidents.some((existing) => existing.id === incident.id)) {
        throw BusinessException.operationNotAllowed(`Incident ${incident.id} already exists`);
      }
      this.incidents.push(Object.freeze({ ...incident, tags: Object.freeze([...incident.tags]) }));
    });
  }

  findById(id: string): Promise<Incident | undefined> {
    const normalizedId = id.toLowerCase();
    return this.exclusive(() =>
      this.incidents.find((incident) => incident.id.toLowerCase() === normalizedId),
    );
  }

  list(filter: IncidentFilter = {}): Promise<Incident[]> {
    return this.exclusive(() =>
      this.incidents.filter(
        (incident) => filter.severity === undefined || incident.severity === filter.severity,
      ),
    );
  }

  count(): Promise<number> {
    return this.exclusive(() => this.incidents.length);
  }

  private exclusive<T>(operation: () => T): Promise<T> {
    const result = this.tail.then(operation);
    // The next operation waits for this one whatever its outcome;
    // the caller still receives the rejection through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
