import { describe, expect, it } from 'vitest';
import { parse as parseYaml } from 'yaml';

import type { ClusterFacts } from '../schema/index.js';
import { jsonOutputSchema } from '../schema/index.js';
import { generateJSON, generateText, renderFacts, serializeJSON } from './reporter.js';

const FACTS: ClusterFacts = {
  clusterName: 'rac-cluster',
  versions: { version: '19.0.0.0.0' },
  vips: [{ networkId: '1', name: 'node1-vip', fqdn: 'node1-vip.example.com', ipv4: '10.0.0.11' }],
  networks: [{ id: '1', ipv4Subnet: '10.0.0.0/255.255.255.0/eth0, static' }],
  scans: [
    {
      networkId: '1',
      name: 'rac-scan',
      fqdn: 'rac-scan.example.com',
      ipv4: ['10.0.0.21'],
      ipv6: [],
    },
  ],
  localListeners: [
    {
      name: 'LISTENER',
      type: 'Database Listener',
      networkId: '1',
      endpoints: 'TCP:1521',
      protocolPorts: { tcp: '1521' },
      address: 'node1-vip.example.com',
      ipv4: '10.0.0.11',
    },
  ],
  scanListeners: [
    {
      networkId: '1',
      scanAddress: 'rac-scan.example.com',
      endpoints: 'TCP:1521',
      protocolPorts: { tcp: '1521' },
      ipv4: ['10.0.0.21'],
      ipv6: [],
    },
  ],
  databases: ['ORCL'],
  crsHome: '/grid',
  isCrs: true,
  hostname: 'node1',
  issues: [],
};

describe('generateJSON', () => {
  it('produces the snake_case fact document', () => {
    const output = generateJSON(FACTS);

    expect(jsonOutputSchema.parse(output)).toEqual(output);
    expect(output.clustername).toBe('rac-cluster');
    expect(output.oracle_crs_home).toBe('/grid');
    expect(output.network).toEqual([
      { network: '1', ipv4_subnet: '10.0.0.0/255.255.255.0/eth0, static' },
    ]);
    expect(output.local_listener[0]).toEqual({
      name: 'LISTENER',
      type: 'Database Listener',
      network: '1',
      endpoints: 'TCP:1521',
      protocol_ports: { tcp: '1521' },
      address: 'node1-vip.example.com',
      ipv4: '10.0.0.11',
    });
    expect(output.scan_listener[0]?.scan_address).toBe('rac-scan.example.com');
    expect(output.database_list).toEqual(['ORCL']);
  });
});

describe('serializeJSON', () => {
  it('sorts object keys', () => {
    expect(serializeJSON({ b: 1, a: { d: 2, c: 3 } })).toBe(
      '{\n  "a": {\n    "c": 3,\n    "d": 2\n  },\n  "b": 1\n}',
    );
  });
});

describe('renderFacts', () => {
  it('renders the same document as YAML', () => {
    expect(parseYaml(renderFacts(FACTS, 'yaml'))).toEqual(
      JSON.parse(renderFacts(FACTS, 'json')),
    );
  });
});

describe('generateText', () => {
  it('lists the cluster and its entities', () => {
    const lines = generateText(FACTS).split('\n');

    expect(lines[0]).toBe('Cluster:   rac-cluster');
    expect(lines[1]).toBe('Mode:      clusterware');
    expect(lines).toContain('Version:   version = 19.0.0.0.0');
    expect(lines).toContain('  1  node1-vip.example.com  10.0.0.11  -');
    expect(lines).toContain('  LISTENER  TCP:1521  node1-vip.example.com');
    expect(lines).not.toContain('Issues:');
  });
});
