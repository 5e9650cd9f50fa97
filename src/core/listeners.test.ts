import { describe, expect, it } from 'vitest';

import { createScriptedRunner } from '../exec/index.js';
import { deriveToolPaths } from '../host/index.js';
import type { Scan, Vip } from '../schema/index.js';
import { createStubHost } from '../test/fixtures.js';
import { createFactsContext } from './context.js';
import { MalformedRecordError } from './errors.js';
import { resolveLocalListeners, toListener, toScanListener } from './listeners.js';

const VIP: Vip = {
  networkId: '1',
  name: 'node1-vip',
  fqdn: 'node1-vip.example.com',
  ipv4: '10.0.0.11',
  ipv6: 'fd00::11',
};

const SCAN: Scan = {
  networkId: '1',
  name: 'rac-scan',
  fqdn: 'rac-scan.example.com',
  ipv4: ['10.0.0.21', '10.0.0.22'],
  ipv6: [],
};

describe('toListener', () => {
  it('copies VIP address fields when the network resolves', () => {
    const listener = toListener(
      'LISTENER',
      { name: 'LISTENER', type: 'Database Listener', networkId: '1', endpoints: 'TCP:1521', protocolPorts: { tcp: '1521' } },
      new Map([['1', VIP]]),
    );

    expect(listener.address).toBe('node1-vip.example.com');
    expect(listener.ipv4).toBe('10.0.0.11');
    expect(listener.ipv6).toBe('fd00::11');
  });

  it('leaves address fields unset when the network has no VIP', () => {
    const listener = toListener(
      'LISTENER_DG',
      { networkId: '3', endpoints: 'TCP:1525', protocolPorts: { tcp: '1525' } },
      new Map([['1', VIP]]),
    );

    expect(listener).toEqual({
      name: 'LISTENER_DG',
      type: '',
      networkId: '3',
      endpoints: 'TCP:1525',
      protocolPorts: { tcp: '1525' },
    });
    expect('address' in listener).toBe(false);
  });
});

describe('toScanListener', () => {
  it('takes addresses from the SCAN of the network', () => {
    expect(toScanListener('1', 'TCP:1521/TCPS:1522', SCAN)).toEqual({
      networkId: '1',
      scanAddress: 'rac-scan.example.com',
      endpoints: 'TCP:1521/TCPS:1522',
      protocolPorts: { tcp: '1521', tcps: '1522' },
      ipv4: ['10.0.0.21', '10.0.0.22'],
      ipv6: [],
    });
  });

  it('rejects an endpoint without a port', () => {
    expect(() => toScanListener('1', 'TCP', SCAN)).toThrow(MalformedRecordError);
  });
});

describe('resolveLocalListeners', () => {
  it('keeps the other enabled listeners when one status line is unreadable', async () => {
    const runner = createScriptedRunner({
      '/grid/bin/srvctl status listener -n node1':
        'Listener LISTENER is enabled\nService is enabled\nListener LISTENER_DG is enabled\n',
      '/grid/bin/srvctl config listener -l LISTENER': 'Name: LISTENER\nEnd points: TCP:1521\n',
      '/grid/bin/srvctl config listener -l LISTENER_DG': 'Name: LISTENER_DG\nEnd points: TCP:1525\n',
    });
    const ctx = createFactsContext({
      tools: deriveToolPaths('/grid'),
      runner,
      host: createStubHost(),
      isCrs: true,
    });

    const resolved = await resolveLocalListeners(ctx);

    expect(resolved.value.map((l) => l.name)).toEqual(['LISTENER', 'LISTENER_DG']);
    expect(resolved.issues).toEqual([
      {
        entity: 'listener',
        command: '/grid/bin/srvctl status listener -n node1',
        line: 'Service is enabled',
        message: 'Enabled listener without a name',
      },
    ]);
  });
});
