import { z } from 'zod';

import { factEntitySchema } from './facts.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Entity output ───────────────────────────────────────────

export const jsonOutputNetworkSchema = z.object({
  network: z.string(),
  ipv4_subnet: z.string().optional(),
  ipv6_subnet: z.string().optional(),
});

export type JsonOutputNetwork = z.infer<typeof jsonOutputNetworkSchema>;

export const jsonOutputVipSchema = z.object({
  network: z.string(),
  name: z.string(),
  fqdn: z.string(),
  ipv4: z.string().optional(),
  ipv6: z.string().optional(),
});

export type JsonOutputVip = z.infer<typeof jsonOutputVipSchema>;

export const jsonOutputScanSchema = z.object({
  network: z.string(),
  name: z.string(),
  fqdn: z.string(),
  ipv4: z.array(z.string()),
  ipv6: z.array(z.string()),
});

export type JsonOutputScan = z.infer<typeof jsonOutputScanSchema>;

export const jsonOutputListenerSchema = z.object({
  name: z.string(),
  type: z.string(),
  network: z.string().optional(),
  endpoints: z.string(),
  protocol_ports: z.record(z.string(), z.string()),
  address: z.string().optional(),
  ipv4: z.string().optional(),
  ipv6: z.string().optional(),
});

export type JsonOutputListener = z.infer<typeof jsonOutputListenerSchema>;

export const jsonOutputScanListenerSchema = z.object({
  network: z.string(),
  scan_address: z.string(),
  endpoints: z.string(),
  protocol_ports: z.record(z.string(), z.string()),
  ipv4: z.array(z.string()),
  ipv6: z.array(z.string()),
});

export type JsonOutputScanListener = z.infer<typeof jsonOutputScanListenerSchema>;

export const jsonOutputIssueSchema = z.object({
  entity: factEntitySchema,
  command: z.string(),
  line: z.string(),
  message: z.string(),
});

export type JsonOutputIssue = z.infer<typeof jsonOutputIssueSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  format_version: z.literal(JSON_OUTPUT_VERSION),
  clustername: z.string(),
  hostname: z.string(),
  is_crs: z.boolean(),
  versions: z.record(z.string(), z.string()),
  vip: z.array(jsonOutputVipSchema),
  network: z.array(jsonOutputNetworkSchema),
  scan: z.array(jsonOutputScanSchema),
  local_listener: z.array(jsonOutputListenerSchema),
  scan_listener: z.array(jsonOutputScanListenerSchema),
  database_list: z.array(z.string()),
  oracle_crs_home: z.string(),
  issues: z.array(jsonOutputIssueSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
