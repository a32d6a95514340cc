import { z } from "zod";

export const shellSchema = z.object({
  program: z.string().min(1),
  flag: z.string(),
});

export const mkgraphConfigSchema = z.object({
  /** Build file, relative to the project directory. */
  file: z.string().min(1).optional(),
  format: z.enum(["yaml", "makefile"]).optional(),
  shell: shellSchema.optional(),
  keepGoing: z.boolean().default(false),
  memoize: z.boolean().default(false),
  maxDepth: z.number().int().positive().default(256),
  echo: z.boolean().default(true),
  defaultTargets: z.array(z.string().min(1)).default([]),
});

export type MkgraphConfigInput = z.input<typeof mkgraphConfigSchema>;
