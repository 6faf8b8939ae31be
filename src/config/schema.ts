import { z } from 'zod';
import type { OperationSpec } from '../dispatch/types.js';
import { MAX_TIMEOUT_MS } from '../shared/exec.js';

/** Built-in operation table: the bundled Python client scripts, run from the working directory. */
export const DEFAULT_OPERATIONS = {
  fetch: { command: 'python3', args: ['python_client/example.py'] },
  coaching: { command: 'python3', args: ['python_client/ai_example.py'] },
} as const satisfies Record<string, OperationSpec>;

function operationSchema(defaults: OperationSpec) {
  return z
    .object({
      command: z.string().min(1, 'command must not be empty').default(defaults.command),
      args: z.array(z.string()).default([...defaults.args]),
    })
    .strict()
    .default({});
}

export const configSchema = z
  .object({
    operations: z
      .object({
        fetch: operationSchema(DEFAULT_OPERATIONS.fetch),
        coaching: operationSchema(DEFAULT_OPERATIONS.coaching),
      })
      .strict()
      .default({}),
    working_directory: z.string().min(1).nullable().default(null),
    // Legacy behaviour drops the data/coaching type; true appends it to the operation's args.
    pass_kind: z.boolean().default(false),
    timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).nullable().default(null),
  })
  .strict();

export type CoachConfig = z.infer<typeof configSchema>;

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

// A variable that is exported but empty counts as unset.
function unsetWhenEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

export const envSchema = z.object({
  GARMIN_COACH_CONFIG: unsetWhenEmpty(z.string()),
  GARMIN_COACH_PASS_KIND: unsetWhenEmpty(booleanFlag),
  GARMIN_COACH_TIMEOUT_MS: unsetWhenEmpty(z.coerce.number().int().positive().max(MAX_TIMEOUT_MS)),
});

export type CoachEnv = z.infer<typeof envSchema>;
