import { z } from "zod";

export const colorModeSchema = z.enum(["auto", "always", "never"]);

export const terminalProbeSchema = z.object({
  isTTY: z.boolean().optional(),
  env: z.record(z.string(), z.string().optional()),
});

export const formatOptionsSchema = z
  .object({
    when: colorModeSchema.optional(),
    probe: terminalProbeSchema.optional(),
  })
  .strict();

export const toolNameSchema = z.enum(["render", "escape", "strip"]);

export const cliConfigSchema = z.object({
  tool: toolNameSchema,
  input: z.string(),
  when: colorModeSchema,
  verbose: z.boolean(),
});
