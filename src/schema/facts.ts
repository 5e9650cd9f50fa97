import { z } from 'zod';

import {
  listenerSchema,
  networkSchema,
  scanListenerSchema,
  scanSchema,
  vipSchema,
} from './topology.js';

// ── FactIssue ───────────────────────────────────────────────

export const factEntitySchema = z.enum([
  'network',
  'vip',
  'scan',
  'listener',
  'scan_listener',
]);

export type FactEntity = z.infer<typeof factEntitySchema>;

export const factIssueSchema = z.object({
  entity: factEntitySchema,
  command: z.string(),
  line: z.string(),
  message: z.string().min(1),
});

export type FactIssue = z.infer<typeof factIssueSchema>;

// ── ClusterFacts ────────────────────────────────────────────

export const versionInfoSchema = z.record(z.string(), z.string());

export type VersionInfo = z.infer<typeof versionInfoSchema>;

export const clusterFactsSchema = z.object({
  clusterName: z.string(),
  versions: versionInfoSchema,
  vips: z.array(vipSchema),
  networks: z.array(networkSchema),
  scans: z.array(scanSchema),
  localListeners: z.array(listenerSchema),
  scanListeners: z.array(scanListenerSchema),
  databases: z.array(z.string()),
  crsHome: z.string().min(1),
  isCrs: z.boolean(),
  hostname: z.string(),
  issues: z.array(factIssueSchema),
});

export type ClusterFacts = z.infer<typeof clusterFactsSchema>;
