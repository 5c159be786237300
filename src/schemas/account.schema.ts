import { z } from 'zod';

export const AccountRecordSchema = z
  .object({
    name: z.string(),
    stage: z.string().nullable().optional(),
    extra_fields: z.record(z.unknown()).optional(),
    proxy_host: z.string().optional(),
    proxy_port: z.number().int().nullable().optional(),
    proxy_scheme: z.string().optional(),
    proxy_user: z.string().optional(),
    proxy_password: z.string().optional(),
  })
  .passthrough();

export const AccountListSchema = z.array(AccountRecordSchema);

export const SharedVariableDefinitionSchema = z.object({
  type: z.enum(['string', 'list']).catch('string'),
  value: z.union([z.string(), z.array(z.string())]).catch(''),
});

export const SharedVariableDefinitionsSchema = z.record(SharedVariableDefinitionSchema);

export const SettingsSchema = z.record(z.unknown());

export const SelectorIndicesSchema = z.record(z.number().int().nonnegative());
