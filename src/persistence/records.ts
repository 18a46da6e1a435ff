import { HEALTH_UP, Instance, InstanceKey, InstanceRegistration } from '../types';

export function storageKey(key: InstanceKey): string {
  return `${key.serviceName}\u0000${key.id}`;
}

export function cloneInstance(instance: Instance): Instance {
  return { ...instance, metadata: { ...instance.metadata } };
}

/**
 * Full record for an upsert: caller fields plus the server-assigned
 * health and heartbeat, whatever the caller sent for those two.
 */
export function stampRegistration(registration: InstanceRegistration, now: number): Instance {
  return {
    serviceName: registration.serviceName,
    id: registration.id,
    host: registration.host,
    port: registration.port,
    mode: registration.mode,
    metadata: { ...registration.metadata },
    health: HEALTH_UP,
    lastHeartbeat: new Date(now).toISOString()
  };
}

export function stampHeartbeat(instance: Instance, now: number): Instance {
  return {
    ...cloneInstance(instance),
    health: HEALTH_UP,
    lastHeartbeat: new Date(now).toISOString()
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isInstanceKey(value: unknown): value is InstanceKey {
  return isRecord(value) && typeof value.serviceName === 'string' && typeof value.id === 'string';
}

/**
 * Structural check for records read back from disk.
 */
export function isInstance(value: unknown): value is Instance {
  if (!isInstanceKey(value) || !isRecord(value)) return false;
  const metadata = value.metadata;
  return typeof value.host === 'string'
    && typeof value.port === 'number'
    && (value.mode === 'dev' || value.mode === 'staging' || value.mode === 'prod')
    && typeof value.health === 'string'
    && typeof value.lastHeartbeat === 'string'
    && isRecord(metadata)
    && typeof metadata.environment === 'string'
    && typeof metadata.region === 'string'
    && typeof metadata.version === 'number';
}
