import { HelmetOptions } from 'helmet';

type CspDirectives = Record<string, string[]>;

/**
 * Content Security Policy for JSON responses
 *
 * Nothing is rendered by a browser except Swagger UI, so everything outside
 * same-origin is blocked.
 */
const RESTRICTIVE_CSP_DIRECTIVES: CspDirectives = {
  defaultSrc: ["'self'"],
  scriptSrc: ["'self'"],
  styleSrc: ["'self'"],
  imgSrc: ["'self'", 'data:'],
  connectSrc: ["'self'"],
  objectSrc: ["'none'"],
  frameSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'self'"],
  baseUri: ["'self'"],
};

/**
 * Swagger UI needs inline scripts and styles
 */
const SWAGGER_CSP_DIRECTIVES: CspDirectives = {
  defaultSrc: ["'self'"],
  scriptSrc: ["'self'", "'unsafe-inline'"],
  styleSrc: ["'self'", "'unsafe-inline'"],
  imgSrc: ["'self'", 'data:', 'https:'],
  fontSrc: ["'self'", 'data:'],
  connectSrc: ["'self'"],
  frameAncestors: ["'none'"],
  baseUri: ["'self'"],
  formAction: ["'self'"],
};

export const HELMET_CONFIG: HelmetOptions = {
  contentSecurityPolicy: {
    directives: RESTRICTIVE_CSP_DIRECTIVES,
  },
  crossOriginOpenerPolicy: { policy: 'same-origin' },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
};

/**
 * Helmet configuration, with the relaxed CSP when Swagger UI is served
 */
export function getHelmetConfig(swaggerEnabled: boolean): HelmetOptions {
  if (swaggerEnabled) {
    return {
      ...HELMET_CONFIG,
      contentSecurityPolicy: {
        directives: SWAGGER_CSP_DIRECTIVES,
      },
    };
  }

  return HELMET_CONFIG;
}
