import { z } from 'zod';
import { DEFAULT_SERVER_CONFIG } from '../mcp/types.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ServerSchema = z.object({
  name: z.string().min(1).default(DEFAULT_SERVER_CONFIG.name),
  version: z.string().min(1).default(DEFAULT_SERVER_CONFIG.version),
  protocolVersion: z.string().min(1).default(DEFAULT_SERVER_CONFIG.protocolVersion),
  // Reject tools/list and tools/call until initialize has succeeded.
  requireInitialize: z.boolean().default(DEFAULT_SERVER_CONFIG.requireInitialize),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default('info'),
});

export const ReckonConfigSchema = z.object({
  server: ServerSchema.optional().transform(v => ServerSchema.parse(v ?? {})),
  logging: LoggingSchema.optional().transform(v => LoggingSchema.parse(v ?? {})),
});

export type ReckonConfig = z.infer<typeof ReckonConfigSchema>;
export type ServerConfig = ReckonConfig['server'];
