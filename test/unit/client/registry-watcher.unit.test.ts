import { parseRegistryEvent } from '../../../src/client/RegistryWatcher';
import { makeRegistration } from '../../fixtures/instances';

const service = {
  ...makeRegistration(),
  health: 'UP',
  lastHeartbeat: '2026-01-01T00:00:00.000Z'
};

describe('parseRegistryEvent', () => {
  it('parses a well-formed event', () => {
    expect(parseRegistryEvent(JSON.stringify({ action: 'heartbeat', service }))).toEqual({ action: 'heartbeat', service });
  });

  it('rejects unknown actions', () => {
    expect(parseRegistryEvent(JSON.stringify({ action: 'update', service }))).toBeNull();
  });

  it('rejects events without a full instance', () => {
    expect(parseRegistryEvent(JSON.stringify({ action: 'register', service: { serviceName: 'payments' } }))).toBeNull();
  });

  it('rejects text that is not JSON', () => {
    expect(parseRegistryEvent('ping')).toBeNull();
    expect(parseRegistryEvent('null')).toBeNull();
  });
});
