/**
 * Validation thresholds for incident payloads
 */
export const INCIDENT_DESCRIPTION_MIN_LENGTH = 10;
export const INCIDENT_DESCRIPTION_MAX_LENGTH = 5000;
