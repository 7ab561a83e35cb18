import { ModelError } from '../errors/errors';
import type { QualifiedName } from './model.types';

export const ORGANIZATION_SEPARATOR = '/';

/**
 * `organization/name`, or just `name` when the project has no organization.
 */
export function formatQualifiedName(name: string, organization: string | null): string {
  return organization ? `${organization}${ORGANIZATION_SEPARATOR}${name}` : name;
}

/**
 * Splits on the first separator only, so project names may contain it.
 *
 * @example
 * splitQualifiedName('acme/web/api') // { organization: 'acme', name: 'web/api' }
 */
export function splitQualifiedName(qualifiedName: string): QualifiedName {
  const index = qualifiedName.indexOf(ORGANIZATION_SEPARATOR);
  if (index < 0) {
    return { organization: null, name: qualifiedName };
  }
  const organization = qualifiedName.slice(0, index);
  const name = qualifiedName.slice(index + 1);
  if (!organization || !name) {
    throw new ModelError(`Malformed project reference: "${qualifiedName}"`, 'MALFORMED_REFERENCE');
  }
  return { organization, name };
}

/**
 * Loose form of a metric name used for lookups:
 * "Compile_Time", "compile  time" and "Compile Time" all match.
 */
export function normalizeMetricName(name: string): string {
  return name.toLowerCase().replace(/_/g, ' ').replace(/\s+/g, ' ').trim();
}
