import { z } from 'zod';

export const CONFIG_SCHEMA_URL =
  'https://raw.githubusercontent.com/Bedrock-OSS/regolith-schemas/main/config/v1.json';

export const LOCAL_FILTER_KINDS = ['python', 'nodejs', 'shell', 'exe'] as const;
export type LocalFilterKind = (typeof LOCAL_FILTER_KINDS)[number];

export const EXPORT_TARGETS = ['development', 'local', 'exact'] as const;
export type ExportTargetKind = (typeof EXPORT_TARGETS)[number];

const jsonObjectSchema = z.record(z.string(), z.unknown());

export const remoteFilterDefinitionSchema = z.object({
  url: z.string().min(1),
  version: z.string().min(1),
});

export const localFilterDefinitionSchema = z.discriminatedUnion('runWith', [
  z.object({ runWith: z.literal('python'), script: z.string().min(1) }),
  z.object({ runWith: z.literal('nodejs'), script: z.string().min(1) }),
  z.object({ runWith: z.literal('shell'), command: z.string().min(1) }),
  z.object({ runWith: z.literal('exe'), exe: z.string().min(1) }),
]);

export const filterRunConfigSchema = z.object({
  filter: z.string().min(1),
  arguments: z.array(z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value))).default([]),
  settings: jsonObjectSchema.default({}),
  disabled: z.boolean().default(false),
});

export const profileReferenceSchema = z.object({
  profile: z.string().min(1),
});

export const exportTargetSchema = z
  .object({
    target: z.enum(EXPORT_TARGETS),
    readOnly: z.boolean().default(false),
    rpPath: z.string().min(1).optional(),
    bpPath: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.target === 'exact' && (!value.rpPath || !value.bpPath)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'The "exact" export target requires both "rpPath" and "bpPath".',
      });
    }
  });

export const profileSchema = z.object({
  filters: z.array(z.unknown()),
  export: exportTargetSchema,
});

export const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().min(1),
    author: z.string().default(''),
    packs: z
      .object({
        behaviorPack: z.string().default(''),
        resourcePack: z.string().default(''),
      })
      .passthrough(),
    regolith: z
      .object({
        dataPath: z.string().default(''),
        filterDefinitions: z.record(z.string(), z.unknown()).default({}),
        profiles: z.record(z.string(), z.unknown()).default({}),
      })
      .passthrough(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof configFileSchema>;

export const filterDescriptorSchema = z
  .object({
    filters: z.array(z.unknown()),
    version: z.string().optional(),
  })
  .passthrough();

export type FilterDescriptor = z.infer<typeof filterDescriptorSchema>;

export const sessionLockSchema = z.object({
  pid: z.number().int(),
  timestamp: z.string(),
});

export type SessionLockData = z.infer<typeof sessionLockSchema>;

/**
 * Remote filter definitions are told apart from local ones by their `url`.
 */
export function isRemoteDefinition(obj: unknown): boolean {
  return typeof obj === 'object' && obj !== null && 'url' in obj;
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('\n');
}
