/**
 * Zod schema for servicepack.yml.
 *
 * services:
 *   worker:
 *     source: worker
 *     ecosystem: python
 *     entrypoint: python3 app2.py
 * profiles:
 *   production:
 *     installMode: ci-clean
 *     env: { APP_ENV: production }
 */

import { z } from "zod";

const NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Either "python3 app.py" or ["python3", "app.py"] */
const CommandSchema = z.union([
  z.string().trim().min(1),
  z.array(z.string().min(1)).min(1),
]);

const BuildStepSchema = z
  .object({
    command: CommandSchema.default(["npm", "run", "build"]),
    outputDir: z.string().min(1).default("build"),
  })
  .strict();

export const ServiceConfigSchema = z
  .object({
    source: z.string().min(1),
    ecosystem: z.enum(["python", "node"]),
    entrypoint: CommandSchema,
    port: z.number().int().min(1).max(65535).optional(),
    buildStep: z.boolean().default(false),
    serve: z.enum(["process", "static"]).default("process"),
    build: BuildStepSchema.default({}),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .superRefine((service, ctx) => {
    if (service.serve === "static" && !service.buildStep) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["serve"],
        message: "serve: static requires buildStep: true",
      });
    }
  });

const EnvValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const ProfileConfigSchema = z
  .object({
    installMode: z.enum(["full", "ci-clean"]),
    buildEnabled: z.boolean().default(true),
    env: z.record(z.string().regex(ENV_KEY_PATTERN), EnvValueSchema).default({}),
    envFile: z.string().min(1).optional(),
  })
  .strict();

export const RuntimeConfigSchema = z
  .object({
    python: z.string().min(1).default("python:3.11-slim"),
    node: z.string().min(1).default("node:20-alpine"),
    static: z.string().min(1).default("nginx:1.27-alpine"),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    services: z.record(z.string().regex(NAME_PATTERN), ServiceConfigSchema),
    profiles: z.record(z.string().regex(NAME_PATTERN), ProfileConfigSchema),
    runtimes: RuntimeConfigSchema.default({}),
  })
  .strict();

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;
export type RuntimeImages = z.infer<typeof RuntimeConfigSchema>;
export type RawPipelineConfig = z.infer<typeof PipelineConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
