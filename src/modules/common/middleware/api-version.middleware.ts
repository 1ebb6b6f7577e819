import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { BusinessException } from '../../../common/exceptions/business-exceptions';
import { requireRequestContext } from '../context/request-context';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { readHeader } from '../utils/header.utils';
import {
  API_VERSION_HEADER,
  SUPPORTED_VERSIONS_HEADER,
  resolveApiVersion,
  splitVersionedPath,
} from '../versioning/api-version';
import { supportedVersionsFor } from '../versioning/versioned-resources';

/**
 * API Version Middleware (route resolver)
 *
 * Selects exactly one API version for requests to a versioned resource and
 * stores it in the RequestContext; the router's custom version extractor
 * reads it from there to pick the controller. Requests to resources outside
 * the registry pass through untouched.
 *
 * A version that is malformed or not registered for the resource fails with
 * 400 Invalid Input.
 */
@Injectable()
export class ApiVersionMiddleware implements NestMiddleware {
  constructor(@Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const context = requireRequestContext(req);
    const { version: pathVersion, resource } = splitVersionedPath(req.originalUrl);

    const supported = supportedVersionsFor(resource);
    if (!supported) {
      next();
      return;
    }

    res.setHeader(SUPPORTED_VERSIONS_HEADER, supported.join(', '));

    const headerVersion = readHeader(req, API_VERSION_HEADER);
    const resolution = resolveApiVersion(
      { path: pathVersion, header: headerVersion },
      supported,
      this.options.defaultVersion,
      this.options.precedence,
    );

    const logger = context.getLogger(ApiVersionMiddleware.name);

    if (!resolution.ok) {
      logger.warn('API version could not be resolved', {
        resource,
        pathVersion,
        headerVersion,
        supportedVersions: supported,
      });
      throw BusinessException.invalidInput(resolution.reason, {
        resource,
        supportedVersions: supported,
      });
    }

    context.apiVersion = resolution.version;
    logger.debug('API version resolved', {
      resource,
      version: resolution.version,
      source: resolution.source,
    });

    next();
  }
}
