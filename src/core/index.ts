/**
 * Core Module Public API
 *
 * Types and services shared by every resolver family.
 */

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { referencesEqual } from './types.js';
export type { SecretReference, AuditEntry } from './types.js';
