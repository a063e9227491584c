import type { EnvelopeStatus } from '../types.js';

const STATUS_MAP: ReadonlyMap<string, EnvelopeStatus> = new Map<string, EnvelopeStatus>([
  ['PENDING', 'DRAFT'],
  ['DRAFT', 'DRAFT'],
  ['SENT', 'SENT'],
  ['IN_PROGRESS', 'SENT'],
  ['COMPLETED', 'COMPLETED'],
  ['SIGNED', 'COMPLETED'],
  ['CANCELLED', 'VOIDED'],
  ['VOIDED', 'VOIDED'],
  ['EXPIRED', 'EXPIRED'],
]);

/**
 * Map a Logalty request status to the canonical envelope status.
 * Case-insensitive; unknown or missing values fall back to DRAFT.
 */
export function normalizeStatus(status: string | null | undefined): EnvelopeStatus {
  if (!status) return 'DRAFT';
  return STATUS_MAP.get(status.trim().toUpperCase()) ?? 'DRAFT';
}
