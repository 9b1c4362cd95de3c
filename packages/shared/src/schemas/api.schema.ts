import { z } from 'zod';

// Responses served by the agent, validated by clients on receipt.

export const healthResponseSchema = z.object({
  status: z.literal('healthy'),
  service: z.string(),
  timestamp: z.string(),
});

export const infoResponseSchema = z.object({
  service: z.string(),
  version: z.string(),
  endpoints: z.array(z.string()),
  authentication: z.string(),
});

export const metricsSnapshotSchema = z.object({
  timestamp: z.string(),
  cpu: z.number(),
  memory: z.object({
    total_gb: z.number(),
    used_gb: z.number(),
    available_gb: z.number(),
    percentage: z.number(),
  }),
  disk: z.object({
    total_gb: z.number(),
    used_gb: z.number(),
    free_gb: z.number(),
    percentage: z.number(),
  }),
  network: z.object({
    outbound_kbits_per_sec: z.number(),
    total_sent_gb: z.number(),
    total_received_gb: z.number(),
  }),
  uptime: z.object({
    uptime_seconds: z.number(),
    uptime_formatted: z.string(),
    boot_time: z.string(),
  }),
});

export const commandResultSchema = z.object({
  success: z.boolean(),
  outcome: z.enum(['succeeded', 'failed', 'timed-out', 'initiated', 'rejected']),
  message: z.string().optional(),
  update_output: z.string().optional(),
  upgrade_output: z.string().optional(),
  errors: z.string().optional(),
  error: z.string().optional(),
});

export const errorResponseSchema = z.object({
  code: z.string(),
  message: z.string(),
});
