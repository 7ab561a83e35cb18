import { randomUUID } from 'crypto';

/**
 * Generates a stable identity for a project, metric, task or histogram entry.
 * Names can change (normalization, renames); ids never do.
 */
export function generateId(): string {
  return randomUUID();
}
