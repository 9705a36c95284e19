import { z } from 'zod';

// ===== Configuration =====

export const AnswerPolicySchema = z.enum(['lenient', 'strict']);

export const WizardConfigSchema = z.object({
  answers: z.object({
    yes: z.string().min(1).regex(/^\S+$/, 'answer token must be a single word').default('y'),
    no: z.string().min(1).regex(/^\S+$/, 'answer token must be a single word').default('n'),
    /**
     * What an unrecognized answer to "Add next file" does.
     * - 'lenient': ignored, the next file record starts as if the answer were yes.
     * - 'strict': the run fails with an input-shape error.
     */
    policy: AnswerPolicySchema.default('lenient'),
  }).default({}).refine((a) => a.yes !== a.no, {
    message: 'affirmative and negative answers must differ',
  }),
  output: z.object({
    indent: z.number().int().min(0).max(8).default(0),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type WizardConfig = z.infer<typeof WizardConfigSchema>;
export type AnswerPolicy = z.infer<typeof AnswerPolicySchema>;

// ===== Collected document =====

/** int64 values beyond Number.MAX_SAFE_INTEGER are kept as bigint. */
export const ScalarValueSchema = z.union([z.boolean(), z.number(), z.bigint(), z.string()]);
export type ScalarValue = z.infer<typeof ScalarValueSchema>;

export const VariablesSchema = z.record(z.string(), ScalarValueSchema);
export type Variables = z.infer<typeof VariablesSchema>;

export const FileSpecSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  template: z.string().min(1),
  local: VariablesSchema.nullable().default(null),
});
export type FileSpec = z.infer<typeof FileSpecSchema>;

export const CommandHookSchema = z.object({
  name: z.string().min(1),
  args: z.array(z.string()).default([]),
});
export type CommandHook = z.infer<typeof CommandHookSchema>;

export const WizardDocumentSchema = z.object({
  global: VariablesSchema.nullable().default(null),
  files: z.array(FileSpecSchema).default([]),
  commands: z.array(CommandHookSchema).default([]),
});
export type WizardDocument = z.infer<typeof WizardDocumentSchema>;

export type ValueKind = 'boolean' | 'integer' | 'float' | 'string';
