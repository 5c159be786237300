import { z } from 'zod';

export const StepDefinitionSchema = z
  .object({
    action: z.string().default(''),
    tag: z.string().optional(),
    description: z.string().optional(),
    label: z.string().optional(),
    next_success_step: z.string().nullable().optional(),
    next_error_step: z.string().nullable().optional(),
    _no_default_links: z.boolean().optional(),
  })
  .passthrough();

export const ScenarioFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullable().optional(),
  steps: z.array(StepDefinitionSchema).nullable().optional(),
});

export type ScenarioFile = z.infer<typeof ScenarioFileSchema>;
