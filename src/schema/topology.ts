import { z } from 'zod';

// ── Network ─────────────────────────────────────────────────

export const networkIdSchema = z.string().regex(/^[0-9]+$/);

export type NetworkId = z.infer<typeof networkIdSchema>;

export const networkSchema = z.object({
  id: networkIdSchema,
  ipv4Subnet: z.string().optional(),
  ipv6Subnet: z.string().optional(),
});

export type Network = z.infer<typeof networkSchema>;

// ── VIP ─────────────────────────────────────────────────────

export const vipSchema = z.object({
  networkId: networkIdSchema,
  name: z.string(),
  fqdn: z.string(),
  ipv4: z.string().optional(),
  ipv6: z.string().optional(),
});

export type Vip = z.infer<typeof vipSchema>;

// ── SCAN ────────────────────────────────────────────────────

export const scanSchema = z.object({
  networkId: networkIdSchema,
  name: z.string().min(1),
  fqdn: z.string().min(1),
  ipv4: z.array(z.string()),
  ipv6: z.array(z.string()),
});

export type Scan = z.infer<typeof scanSchema>;

// ── Listeners ───────────────────────────────────────────────
// protocolPorts is keyed by lower-cased protocol, e.g. { tcp: '1521' }.

export const protocolPortsSchema = z.record(z.string(), z.string());

export type ProtocolPorts = z.infer<typeof protocolPortsSchema>;

export const listenerSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  networkId: networkIdSchema.optional(),
  endpoints: z.string(),
  protocolPorts: protocolPortsSchema,
  address: z.string().optional(),
  ipv4: z.string().optional(),
  ipv6: z.string().optional(),
});

export type Listener = z.infer<typeof listenerSchema>;

export const scanListenerSchema = z.object({
  networkId: networkIdSchema,
  scanAddress: z.string().min(1),
  endpoints: z.string().min(1),
  protocolPorts: protocolPortsSchema,
  ipv4: z.array(z.string()),
  ipv6: z.array(z.string()),
});

export type ScanListener = z.infer<typeof scanListenerSchema>;

// ── Mappings ────────────────────────────────────────────────

export type NetworkMap = ReadonlyMap<NetworkId, Network>;
export type VipMap = ReadonlyMap<NetworkId, Vip>;
export type ScanMap = ReadonlyMap<NetworkId, Scan>;
