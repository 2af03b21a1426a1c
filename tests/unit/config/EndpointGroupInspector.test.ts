import { describe, test, expect } from '@jest/globals';
import { inspectEndpointGroups, isTLSEnabled } from '../../../config/endpoint/index.js';
import { EndpointMode, type EndpointGroup } from '../../../types/EndpointGroup.type.js';

function group(overrides: Partial<EndpointGroup> = {}): EndpointGroup {
  return {
    name: 'g1',
    tlsConfig: {},
    endpoints: ['a:1'],
    endpointsDiscovery: [],
    mode: EndpointMode.DEFAULT,
    ...overrides,
  };
}

describe('inspectEndpointGroups', () => {
  test('has no warnings for well formed groups', () => {
    const groups = [
      group({ tlsConfig: { certFile: '/c.crt', keyFile: '/c.key', caFile: '/ca.crt' } }),
      group({ name: 'g2', endpoints: [], endpointsDiscovery: [{ files: ['/sd/*.json'], refreshInterval: '5m' }] }),
      group({ name: 'g3', endpoints: ['b:2'], tlsConfig: { serverName: 'store.internal' } }),
    ];

    expect(inspectEndpointGroups(groups)).toEqual({ warnings: [] });
  });

  test('warns about groups with nothing to connect to', () => {
    const groups = [group(), group({ name: '', endpoints: [] })];

    expect(inspectEndpointGroups(groups).warnings).toEqual([
      'Endpoint group #1 has neither endpoints nor sd-files configured',
    ]);
  });

  test('warns about a client certificate without its key and the reverse', () => {
    const groups = [
      group({ name: 'cert-only', tlsConfig: { certFile: '/c.crt' } }),
      group({ name: 'key-only', endpoints: ['b:2'], tlsConfig: { certFile: '', keyFile: '/c.key' } }),
    ];

    expect(inspectEndpointGroups(groups).warnings).toEqual([
      'Endpoint group "cert-only" sets cert_file without key_file',
      'Endpoint group "key-only" sets key_file without cert_file',
    ]);
  });

  test('does not check group names for uniqueness', () => {
    const groups = [group({ name: 'dup' }), group({ name: 'dup', endpoints: ['b:2'] })];

    expect(inspectEndpointGroups(groups).warnings).toEqual([]);
  });
});

describe('isTLSEnabled', () => {
  test('is off when no TLS material is set', () => {
    expect(isTLSEnabled({})).toBe(false);
    expect(isTLSEnabled({ certFile: '', serverName: '' })).toBe(false);
  });

  test('is on when any TLS field is set', () => {
    expect(isTLSEnabled({ caFile: '/ca.crt' })).toBe(true);
    expect(isTLSEnabled({ serverName: 'store.internal' })).toBe(true);
  });
});
