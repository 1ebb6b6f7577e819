import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Environment } from '../../config/environment.schema';
import { IncidentsController } from './controllers/incidents.controller';
import { IncidentsService } from './services/incidents.service';
import { INCIDENT_REPOSITORY } from './repositories/incident.repository';
import { InMemoryIncidentRepository } from './repositories/in-memory-incident.repository';
import { INCIDENT_ENRICHER } from './enrichment/incident-enricher.interface';
import {
  ENRICHMENT_LATENCY,
  MockIncidentEnricher,
  type EnrichmentLatency,
} from './enrichment/mock-incident-enricher';

/**
 * Incidents Module
 *
 * - IncidentsController: create / get / list
 * - IncidentsService: enrichment + storage
 * - INCIDENT_REPOSITORY: in-memory store (process lifetime)
 * - INCIDENT_ENRICHER: mock keyword enricher; swap the provider to plug in a
 *   real model without touching the controller or service
 */
@Module({
  controllers: [IncidentsController],
  providers: [
    IncidentsService,
    {
      provide: INCIDENT_REPOSITORY,
      useClass: InMemoryIncidentRepository,
    },
    {
      provide: ENRICHMENT_LATENCY,
      useFactory: (config: ConfigService<Environment, true>): EnrichmentLatency => ({
        minDelayMs: config.get('APP_ENRICHMENT_MIN_DELAY_MS', { infer: true }),
        maxDelayMs: config.get('APP_ENRICHMENT_MAX_DELAY_MS', { infer: true }),
      }),
      inject: [ConfigService],
    },
    {
      provide: INCIDENT_ENRICHER,
      useClass: MockIncidentEnricher,
    },
  ],
  exports: [INCIDENT_REPOSITORY],
})
export class IncidentsModule {}
