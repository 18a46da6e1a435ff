import { FieldIssue, ValidationError } from '../common/errors';
import { InstanceKey, InstanceRegistration, Metadata, Mode, MODES } from '../types';

const METADATA_KEYS = new Set(['environment', 'region', 'version', 'developer', 'experimental']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMode(value: unknown): value is Mode {
  return typeof value === 'string' && MODES.some(mode => mode === value);
}

function requireText(source: Record<string, unknown>, field: string, path: string, issues: FieldIssue[]): string {
  const value = source[field];
  if (typeof value !== 'string' || value.trim() === '') {
    issues.push({ field: path, message: 'is required' });
    return '';
  }
  return value;
}

function validateMetadata(value: unknown, issues: FieldIssue[]): Metadata | null {
  if (!isRecord(value)) {
    issues.push({ field: 'metadata', message: 'is required' });
    return null;
  }

  for (const key of Object.keys(value)) {
    if (!METADATA_KEYS.has(key)) {
      issues.push({ field: `metadata.${key}`, message: 'is not a known metadata field' });
    }
  }

  const environment = value.environment;
  if (!isMode(environment)) {
    issues.push({ field: 'metadata.environment', message: `must be one of: ${MODES.join(', ')}` });
  }

  const region = requireText(value, 'region', 'metadata.region', issues);

  const version = value.version;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 0) {
    issues.push({ field: 'metadata.version', message: 'must be a non-negative integer' });
  }

  const metadata: Metadata = {
    environment: isMode(environment) ? environment : 'dev',
    region,
    version: typeof version === 'number' ? version : 0
  };

  if (value.developer !== undefined) {
    if (typeof value.developer !== 'string') {
      issues.push({ field: 'metadata.developer', message: 'must be a string' });
    } else {
      metadata.developer = value.developer;
    }
  }

  if (value.experimental !== undefined) {
    if (typeof value.experimental !== 'boolean') {
      issues.push({ field: 'metadata.experimental', message: 'must be a boolean' });
    } else {
      metadata.experimental = value.experimental;
    }
  }

  return metadata;
}

/**
 * Check a registration body and return a clean copy of it. Server-assigned
 * fields (`health`, `lastHeartbeat`) are dropped here; the store sets them.
 */
export function validateRegistration(body: unknown): InstanceRegistration {
  if (!isRecord(body)) {
    throw new ValidationError([{ field: 'body', message: 'must be a JSON object' }]);
  }

  const issues: FieldIssue[] = [];
  const serviceName = requireText(body, 'serviceName', 'serviceName', issues);
  const id = requireText(body, 'id', 'id', issues);
  const host = requireText(body, 'host', 'host', issues);

  const port = body.port;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    issues.push({ field: 'port', message: 'must be an integer between 1 and 65535' });
  }

  const mode = body.mode;
  if (!isMode(mode)) {
    issues.push({ field: 'mode', message: `must be one of: ${MODES.join(', ')}` });
  }

  const metadata = validateMetadata(body.metadata, issues);

  if (issues.length > 0 || metadata === null || !isMode(mode) || typeof port !== 'number') {
    throw new ValidationError(issues);
  }

  return { serviceName, id, host, port, mode, metadata };
}

/**
 * Heartbeat and deregister bodies carry only the instance key.
 */
export function validateInstanceKey(body: unknown): InstanceKey {
  if (!isRecord(body)) {
    throw new ValidationError([{ field: 'body', message: 'must be a JSON object' }]);
  }

  const issues: FieldIssue[] = [];
  const serviceName = requireText(body, 'serviceName', 'serviceName', issues);
  const id = requireText(body, 'id', 'id', issues);

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return { serviceName, id };
}
