/**
 * Zod validation schemas for the service declaration file
 */
import { z } from 'zod';

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z.string().refine(isValidRegex, { message: 'must be a valid regular expression' });

// Ports may arrive as strings after `${VAR}` expansion
const PortSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, 'must be a number').transform(Number)])
  .pipe(z.number().int().min(1).max(65535));

const probeBase = {
  name: z.string().min(1).optional(),
  critical: z.boolean().default(true),
};

export const HttpProbeSchema = z
  .object({
    type: z.literal('http'),
    url: z.string().url(),
    expectedStatus: z
      .union([z.number().int(), z.array(z.number().int()).nonempty()])
      .default(200)
      .transform((value) => (Array.isArray(value) ? [...value] : [value])),
    body: z
      .object({
        contains: z.string().min(1).optional(),
        json: z
          .object({
            path: z.string().min(1),
            equals: z.union([z.string(), z.number(), z.boolean()]),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    ...probeBase,
  })
  .strict();

export const TcpProbeSchema = z
  .object({
    type: z.literal('tcp'),
    host: z.string().min(1),
    port: PortSchema,
    ...probeBase,
  })
  .strict();

export const CommandProbeSchema = z
  .object({
    type: z.literal('command'),
    command: z.string().min(1),
    expectExitCode: z.number().int().min(0).default(0),
    stdoutIncludes: z.string().min(1).optional(),
    outputExcludes: z.array(z.string().min(1)).optional(),
    ...probeBase,
  })
  .strict();

export const EnvProbeSchema = z
  .object({
    type: z.literal('env'),
    variable: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name'),
    pattern: RegexSourceSchema.optional(),
    ...probeBase,
  })
  .strict();

export const ProbeSchema = z.discriminatedUnion('type', [
  HttpProbeSchema,
  TcpProbeSchema,
  CommandProbeSchema,
  EnvProbeSchema,
]);

const policyFields = {
  timeoutSeconds: z.number().positive().optional(),
  retries: z.number().int().min(0).optional(),
  backoffSeconds: z.number().min(0).optional(),
  backoffMultiplier: z.number().min(1).optional(),
  maxBackoffSeconds: z.number().min(0).optional(),
};

export const PolicyDefaultsSchema = z.object(policyFields).strict();

export const ServiceConfigSchema = z
  .object({
    name: z.string().min(1),
    required: z.boolean().default(true),
    probes: z.array(ProbeSchema).min(1),
    ...policyFields,
  })
  .strict();

export const ServicesFileSchema = z
  .object({
    defaults: PolicyDefaultsSchema.optional(),
    services: z.array(ServiceConfigSchema).min(1),
  })
  .strict()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.services.forEach((service, index) => {
      if (seen.has(service.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['services', index, 'name'],
          message: `duplicate service name "${service.name}"`,
        });
      }
      seen.add(service.name);
    });
  });

// Type exports
export type PolicyDefaults = z.infer<typeof PolicyDefaultsSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

// Query Parameter Schemas
export const PolicyQuerySchema = z.object({
  policy: z.enum(['strict', 'lenient']).optional(),
});

// Command-line flag values, as raw strings from argv
export const CliOptionsSchema = z
  .object({
    config: z.string().min(1).optional(),
    format: z.enum(['text', 'json']).optional(),
    concurrency: z.coerce.number().int().positive().optional(),
    deadline: z.coerce.number().positive().optional(),
    policy: z.enum(['strict', 'lenient']).optional(),
  })
  .strict();

export type CliOptions = z.infer<typeof CliOptionsSchema>;
