import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { pino } from 'pino';
import { isNotFound } from '../stores/fs-utils.js';

const logger = pino({ name: 'networks-config', level: process.env.LOG_LEVEL || 'info' });

export const NetworkConfigSchema = z.object({
  chainId: z.number().int().positive(),
  rpcUrl: z.string().url('Invalid RPC URL'),
  explorerApiUrl: z.string().url('Invalid explorer API URL').optional(),
});

export const NetworksConfigSchema = z.record(
  z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'Invalid network name'),
  NetworkConfigSchema
);

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type NetworksConfig = z.infer<typeof NetworksConfigSchema>;

export function parseNetworks(raw: unknown): NetworksConfig {
  const result = NetworksConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Invalid networks configuration:\n${issues}`);
  }
  return result.data;
}

/** Reads the networks file. A missing file means no networks are configured. */
export async function loadNetworks(file: string): Promise<NetworksConfig> {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      logger.warn({ file }, 'Networks file not found, no networks configured');
      return {};
    }
    throw error;
  }
  return parseNetworks(JSON.parse(content));
}
