import { BusinessException } from '../../../src/common/exceptions/business-exceptions';
import type { Incident } from '../../../src/modules/incidents/models/incident.model';
import { IncidentSeverity } from '../../../src/modules/incidents/models/incident-severity';
import { InMemoryIncidentRepository } from '../../../src/modules/incidents/repositories/in-memory-incident.repository';

function incident(id: string, severity = IncidentSeverity.Low): Incident {
  return {
    id,
    userDescription: `Incident ${id} description`,
    structuredSummary: null,
    severity,
    tags: ['general'],
    createdAt: new Date('2026-01-15T10:00:00.000Z'),
    correlationId: `corr-${id}`,
  };
}

describe('InMemoryIncidentRepository', () => {
  let repository: InMemoryIncidentRepository;

  beforeEach(() => {
    repository = new InMemoryIncidentRepository();
  });

  it('should store and find incidents by ID, case-insensitively', async () => {
    await repository.add(incident('AB-1'));

    expect(await repository.findById('ab-1')).toMatchObject({ id: 'AB-1' });
    expect(await repository.findById('missing')).toBeUndefined();
  });

  it('should reject a duplicate ID and keep serving afterwards', async () => {
    await repository.add(incident('dup'));

    await expect(repository.add(incident('dup'))).rejects.toBeInstanceOf(BusinessException);
    await expect(repository.add(incident('dup'))).rejects.toMatchObject({
      kind: 'OperationNotAllowed',
    });
    expect(await repository.count()).toBe(1);
  });

  it('should filter by severity', async () => {
    await repository.add(incident('1', IncidentSeverity.High));
    await repository.add(incident('2', IncidentSeverity.Low));
    await repository.add(incident('3', IncidentSeverity.High));

    const high = await repository.list({ severity: IncidentSeverity.High });

    expect(high.map((stored) => stored.id)).toEqual(['1', '3']);
    expect(await repository.list()).toHaveLength(3);
  });

  it('should store frozen copies', async () => {
    const original = incident('frozen');
    await repository.add(original);

    const stored = await repository.findById('frozen');

    expect(stored).not.toBe(original);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.tags)).toBe(true);
  });

  it('should apply concurrent writes in call order without losing any', async () => {
    await Promise.all(Array.from({ length: 100 }, (_, i) => repository.add(incident(`c-${i}`))));

    const all = await repository.list();

    expect(all).toHaveLength(100);
    expect(all.map((stored) => stored.id)).toEqual(
      Array.from({ length: 100 }, (_, i) => `c-${i}`),
    );
  });
});
