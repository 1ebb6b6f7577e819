/**
 * Incident severity, numerically ordered from least to most severe
 */
export enum IncidentSeverity {
  Low = 1,
  Medium = 2,
  High = 3,
  Critical = 4,
}

export const SEVERITY_NAMES = ['Low', 'Medium', 'High', 'Critical'] as const;

export type SeverityName = (typeof SEVERITY_NAMES)[number];

export const SEVERITY_VALUES: readonly IncidentSeverity[] = [
  IncidentSeverity.Low,
  IncidentSeverity.Medium,
  IncidentSeverity.High,
  IncidentSeverity.Critical,
];

const SEVERITY_BY_NAME: Record<SeverityName, IncidentSeverity> = {
  Low: IncidentSeverity.Low,
  Medium: IncidentSeverity.Medium,
  High: IncidentSeverity.High,
  Critical: IncidentSeverity.Critical,
};

export function severityName(severity: IncidentSeverity): SeverityName {
  return SEVERITY_NAMES[severity - 1];
}

export function severityFromName(name: SeverityName): IncidentSeverity {
  return SEVERITY_BY_NAME[name];
}

/**
 * Parse a severity filter: a name in any casing ("critical") or its number ("4")
 *
 * @returns undefined when the value names no severity
 */
export function parseSeverity(value: string): IncidentSeverity | undefined {
  const normalized = value.trim().toLowerCase();

  const byName = SEVERITY_NAMES.find((name) => name.toLowerCase() === normalized);
  if (byName !== undefined) {
    return SEVERITY_BY_NAME[byName];
  }

  return SEVERITY_VALUES.find((severity) => String(severity) === normalized);
}
