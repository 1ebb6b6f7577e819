import { INestApplication, Type } from '@nestjs/common';
import { DocumentBuilder, OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import { DiagnosticsModule } from '../modules/diagnostics/diagnostics.module';
import { HealthModule } from '../modules/health/health.module';
import { IncidentsModule } from '../modules/incidents/incidents.module';
import { OrdersV1Module } from '../modules/orders/orders-v1.module';
import { OrdersV2Module } from '../modules/orders/orders-v2.module';
import { CORRELATION_ID_HEADER } from '../modules/common/utils/correlation-id.utils';
import { API_VERSION_HEADER } from '../modules/common/versioning/api-version';
import { API_VERSIONS, type ApiVersion } from '../modules/common/versioning/versioned-resources';

export const SWAGGER_BASE_PATH = 'api/docs';

interface ApiDocumentSpec {
  version: ApiVersion;
  tags: ReadonlyArray<[name: string, description: string]>;
  modules: Type<unknown>[];
}

/**
 * One OpenAPI document per API version
 *
 * V1 and V2 order controllers share their routes, so a single document would
 * keep only one of them. Unversioned modules appear in every document.
 */
const API_DOCUMENTS: readonly ApiDocumentSpec[] = [
  {
    version: API_VERSIONS.V1,
    tags: [
      ['Incidents', 'Incident reporting'],
      ['Orders V1', 'Order placement, version 1.0'],
    ],
    modules: [IncidentsModule, OrdersV1Module],
  },
  {
    version: API_VERSIONS.V2,
    tags: [['Orders V2', 'Order placement, version 2.0']],
    modules: [OrdersV2Module],
  },
];

const UNVERSIONED_TAGS: ReadonlyArray<[string, string]> = [
  ['Diagnostics', 'Event-loop behaviour demonstrations'],
  ['Health', 'Health check endpoints'],
];
const UNVERSIONED_MODULES: Type<unknown>[] = [DiagnosticsModule, HealthModule];

export interface ApiDocument {
  version: ApiVersion;
  /** Mount path of the Swagger UI, relative to the server root */
  path: string;
  document: OpenAPIObject;
}

export function createApiDocuments(app: INestApplication, serverUrl: string): ApiDocument[] {
  return API_DOCUMENTS.map(({ version, tags, modules }) => {
    const builder = new DocumentBuilder()
      .setTitle(`Incident Pipeline API v${version}`)
      .setDescription(
        'Incident reporting with mock enrichment and versioned orders, served through an ordered request pipeline ' +
          '(exception boundary, identity, correlation, API versioning, validation). ' +
          `Select version ${version} with the /v${version.split('.')[0]}/ path segment or ` +
          `"${API_VERSION_HEADER}: ${version}"; send ${CORRELATION_ID_HEADER} to propagate a correlation ID.`,
      )
      .setVersion(version)
      .addBearerAuth()
      .addServer(serverUrl);

    for (const [name, description] of [...tags, ...UNVERSIONED_TAGS]) {
      builder.addTag(name, description);
    }

    const document = SwaggerModule.createDocument(app, builder.build(), {
      include: [...modules, ...UNVERSIONED_MODULES],
    });

    return { version, path: `${SWAGGER_BASE_PATH}/v${version.split('.')[0]}`, document };
  });
}

/**
 * Mount the Swagger UI of every API version; returns the mount paths
 */
export function setupSwagger(app: INestApplication, serverUrl: string): string[] {
  return createApiDocuments(app, serverUrl).map(({ version, path, document }) => {
    SwaggerModule.setup(path, app, document, {
      customSiteTitle: `Incident Pipeline API v${version} Documentation`,
      swaggerOptions: {
        persistAuthorization: true,
        displayRequestDuration: true,
        docExpansion: 'list',
      },
    });
    return path;
  });
}
