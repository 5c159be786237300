import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const EngineConfigFileSchema = z.object({
  dataDir: z.string().min(1).optional(),
  scenariosDir: z.string().min(1).optional(),
  settingsDir: z.string().min(1).optional(),
  profilesDir: z.string().min(1).optional(),
  outputsDir: z.string().min(1).optional(),
  runsDir: z.string().min(1).optional(),
  headless: z.boolean().optional(),
  keepBrowserOpen: z.boolean().optional(),
  browserChannel: z.string().min(1).optional(),
  executablePath: z.string().min(1).optional(),
  defaultTimeoutMs: z.number().int().positive().optional(),
  maxAccounts: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
  debugQueueCapacity: z.number().int().positive().optional(),
  logLevel: LogLevelSchema.optional(),
});

export type EngineConfigFile = z.infer<typeof EngineConfigFileSchema>;
