import type { CommandScript } from '../exec/index.js';
import type { HostResolver } from '../host/index.js';

// Captured-style output of a two-node 19c cluster, seen from node1.
// The grid home is /grid.

export const CLUSTER_SCRIPT: CommandScript = {
  '/grid/bin/olsnodes': 'node1\nnode2\n',
  '/grid/bin/cemutlo -n': 'rac-cluster\n',
  '/grid/bin/crsctl query crs activeversion':
    'Oracle Clusterware active version on the cluster is [19.0.0.0.0]\n',
  '/grid/bin/srvctl config network': [
    'Network 1 exists',
    'Subnet IPv4: 10.0.0.0/255.255.255.0/eth0, static',
    'Subnet IPv6: ',
    'Ping Targets: ',
    'Network is enabled',
    'Network 2 exists',
    'Subnet IPv4: 192.168.10.0/255.255.255.0/eth2, static',
    'Subnet IPv6: ',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config vip -n node1': [
    'VIP exists: network number 1, hosting node node1',
    'VIP Name: node1-vip',
    'VIP IPv4 Address: 10.0.0.11',
    'VIP IPv6 Address: ',
    'VIP is enabled.',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config scan -all': [
    'SCAN name: rac-scan, Network: 1',
    'Subnet IPv4: 10.0.0.0/255.255.255.0/eth0, static',
    'SCAN 1 IPv4 VIP: 10.0.0.21',
    'SCAN VIP is enabled.',
    'SCAN 2 IPv4 VIP: 10.0.0.22',
    'SCAN VIP is enabled.',
    '',
  ].join('\n'),
  '/grid/bin/srvctl status listener -n node1': [
    'Listener LISTENER is enabled on node(s): node1',
    'Listener LISTENER is running on node(s): node1',
    'Listener LISTENER_DG is enabled on node(s): node1',
    'Listener LISTENER_DG is running on node(s): node1',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config listener -l LISTENER': [
    'Name: LISTENER',
    'Type: Database Listener',
    'Network: 1, Owner: grid',
    'Home: <CRS home>',
    'End points: TCP:1521',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config listener -l LISTENER_DG': [
    'Name: LISTENER_DG',
    'Type: Database Listener',
    'Network: 2, Owner: grid',
    'Home: <CRS home>',
    'End points: TCP:1525',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config scan_listener -k 1': [
    'SCAN Listeners for network 1:',
    'Registration invited nodes: ',
    'Endpoints: TCP:1521',
    'SCAN Listener LISTENER_SCAN1 exists',
    'SCAN Listener is enabled.',
    '',
  ].join('\n'),
  '/grid/bin/srvctl config database': 'ORCL\nDGDB\n',
};

// Single-node Oracle Restart: olsnodes prints nothing.

export const RESTART_SCRIPT: CommandScript = {
  '/grid/bin/olsnodes': '',
  '/grid/bin/cemutlo -n': { status: 'failed', exitCode: 1, lines: [] },
  '/grid/bin/crsctl query has releaseversion':
    'Oracle High Availability Services release version on the local node is [19.0.0.0.0]\n',
  '/grid/bin/crsctl query has releasepatch':
    'Oracle High Availability Services release patch level is [0] and the complete list of patches [ ] have been applied on the local node.\n',
  '/grid/bin/crsctl query has softwareversion':
    'Oracle High Availability Services version on the local node is [19.3.0.0.0]\n',
  '/grid/bin/crsctl query has softwarepatch':
    'Oracle High Availability Services patch level on node host1 is [0].\n',
  '/grid/bin/srvctl config network': 'Network 1 exists\nSubnet IPv4: 10.0.0.0/255.255.255.0/eth0, static\n',
  '/grid/bin/srvctl config scan -all': 'SCAN name: rac-scan, Network: 1\nSCAN 1 IPv4 VIP: 10.0.0.21\n',
  '/grid/bin/srvctl config scan_listener -k 1': 'Endpoints: TCP:1521\n',
  '/grid/bin/srvctl status listener': 'Listener LISTENER is enabled\nListener LISTENER is running on node(s): host1\n',
  '/grid/bin/srvctl config listener -l LISTENER':
    'Name: LISTENER\nType: Database Listener\nHome: /grid\nEnd points: TCP:1521\n',
  '/grid/bin/srvctl config database': 'ORCL\n',
};

/** Resolves short names inside example.com without touching DNS. */
export function createStubHost(shortHostname = 'node1'): HostResolver {
  return {
    shortHostname: () => shortHostname,
    toFqdn: async (name) =>
      name.includes('.') || name.length === 0 ? name : `${name}.example.com`,
  };
}
