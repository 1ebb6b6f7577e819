import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp, closeTestApp } from '../helpers/test-app-setup';
import type { IncidentRepository } from '../../src/modules/incidents/repositories/incident.repository';
import {
  VALIDATION_PROBLEM_TITLE,
  VALIDATION_PROBLEM_TYPE,
} from '../../src/schemas/error-envelope.schema';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

describe('Incidents Integration Tests', () => {
  let app: INestApplication;
  let repository: IncidentRepository;

  beforeAll(async () => {
    ({ app, repository } = await createTestApp());
  });

  afterAll(async () => {
    await closeTestApp(app);
  });

  describe('POST /incidents', () => {
    it('should classify a critical outage and echo the supplied correlation ID', async () => {
      const description = 'Critical outage: payment API is down for all customers';

      const response = await request(app.getHttpServer())
        .post('/incidents')
        .set('X-Correlation-Id', 'incident-test-001')
        .send({ userDescription: description })
        .expect(201);

      expect(response.headers['x-correlation-id']).toBe('incident-test-001');
      expect(response.body).toMatchObject({
        userDescription: description,
        severity: 'Critical',
        tags: ['general'],
        correlationId: 'incident-test-001',
        structuredSummary: `[MOCK AI SUMMARY] Severity: Critical. Issue: ${description}`,
      });
      expect(response.body.id).toMatch(UUID_PATTERN);
      expect(response.headers.location).toBe(`/incidents/${response.body.id}`);
      expect(new Date(response.body.createdAt).toISOString()).toBe(response.body.createdAt);
    });

    it('should let manualSeverity override the enrichment severity', async () => {
      const response = await request(app.getHttpServer())
        .post('/incidents')
        .send({ userDescription: 'Database query is slow on staging', manualSeverity: 4 })
        .expect(201);

      expect(response.body.severity).toBe('Critical');
      expect(response.body.tags).toEqual(['database', 'performance', 'staging']);
      expect(response.body.structuredSummary).toBe(
        '[MOCK AI SUMMARY] Severity: Low. Issue: Database query is slow on staging',
      );
    });

    it('should reject a too-short description without storing anything', async () => {
      const countBefore = await repository.count();

      const response = await request(app.getHttpServer())
        .post('/incidents')
        .send({ userDescription: 'short' })
        .expect(400);

      expect(response.headers['content-type']).toContain('application/problem+json');
      expect(response.body).toMatchObject({
        type: VALIDATION_PROBLEM_TYPE,
        title: VALIDATION_PROBLEM_TITLE,
        status: 400,
        instance: '/incidents',
        errors: {
          userDescription: ['Description must be between 10 and 5000 characters.'],
        },
      });
      expect(response.body.detail).toContain('10');
      expect(response.body.correlationId).toBe(response.headers['x-correlation-id']);
      expect(await repository.count()).toBe(countBefore);
    });

    it('should report every violated field at once', async () => {
      const countBefore = await repository.count();

      const response = await request(app.getHttpServer())
        .post('/incidents')
        .send({ manualSeverity: 9, reporter: 'someone' })
        .expect(400);

      expect(Object.keys(response.body.errors).sort()).toEqual([
        'manualSeverity',
        'reporter',
        'userDescription',
      ]);
      expect(response.body.errors.manualSeverity).toEqual([
        'Manual severity must be 1 (Low), 2 (Medium), 3 (High) or 4 (Critical).',
      ]);
      expect(response.body.errors.reporter).toEqual(['property reporter should not exist']);
      expect(response.body.errors.userDescription).toEqual(['User description is required.']);
      expect(await repository.count()).toBe(countBefore);
    });
  });

  describe('GET /incidents/:id', () => {
    it('should return a stored incident', async () => {
      const created = await request(app.getHttpServer())
        .post('/incidents')
        .send({ userDescription: 'Login page rejects valid passwords' })
        .expect(201);

      const response = await request(app.getHttpServer())
        .get(`/incidents/${created.body.id}`)
        .expect(200);

      expect(response.body).toEqual(created.body);
    });

    it('should return 404 with the request correlation ID for an unknown incident', async () => {
      const id = '0b9f6c52-7a1e-4d5b-8f3a-1c2d3e4f5a6b';

      const response = await request(app.getHttpServer())
        .get(`/incidents/${id}`)
        .set('X-Correlation-Id', 'lookup-404')
        .expect(404);

      expect(response.headers['x-correlation-id']).toBe('lookup-404');
      expect(response.body).toMatchObject({
        status: 404,
        title: 'Resource Not Found',
        detail: `No incident exists with ID: ${id}`,
        instance: `/incidents/${id}`,
        correlationId: 'lookup-404',
      });
    });

    it('should generate a correlation ID for a 404 when none is supplied', async () => {
      const response = await request(app.getHttpServer())
        .get('/incidents/5d4c3b2a-1f0e-4d9c-8b7a-6f5e4d3c2b1a')
        .expect(404);

      expect(response.headers['x-correlation-id']).toMatch(UUID_PATTERN);
      expect(response.body.correlationId).toBe(response.headers['x-correlation-id']);
    });

    it('should reject an ID that is not a UUID', async () => {
      const response = await request(app.getHttpServer()).get('/incidents/not-a-uuid').expect(400);

      expect(response.body).toMatchObject({
        status: 400,
        title: 'Invalid Input',
        detail: 'Validation failed (uuid is expected)',
      });
    });
  });

  describe('GET /incidents', () => {
    beforeAll(async () => {
      await request(app.getHttpServer())
        .post('/incidents')
        .send({ userDescription: 'Urgent: network connection drops every hour' })
        .expect(201);
    });

    it('should filter by severity name, case-insensitively', async () => {
      const response = await request(app.getHttpServer())
        .get('/incidents')
        .query({ severity: 'high' })
        .expect(200);

      expect(response.body.length).toBeGreaterThan(0);
      for (const incident of response.body) {
        expect(incident.severity).toBe('High');
      }
    });

    it('should not filter on an unknown severity name', async () => {
      const total = await repository.count();

      const response = await request(app.getHttpServer())
        .get('/incidents')
        .query({ severity: 'catastrophic' })
        .expect(200);

      expect(response.body).toHaveLength(total);
    });

    it('should list every incident without a filter', async () => {
      const total = await repository.count();

      const response = await request(app.getHttpServer()).get('/incidents').expect(200);

      expect(response.body).toHaveLength(total);
    });
  });
});
