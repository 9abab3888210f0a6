import { z } from "zod";

const LOG_LEVEL_SCHEMA = z.enum(["silent", "error", "warn", "info", "debug"]);

const REGEX_SOURCE_SCHEMA = z
  .string()
  .min(1, "pattern must not be empty")
  .refine((source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  }, "pattern must be a valid regular expression");

export const ASSEMBLER_CONFIG_INPUT_SCHEMA = z.object({
  projectsDir: z.string().min(1, "projectsDir must not be empty").optional(),
  baseImage: z
    .object({
      repositoryUrl: z.string().min(1, "repositoryUrl must not be empty").optional(),
    })
    .optional(),
  repositories: z.array(z.string().min(1, "repository urls must not be empty")).optional(),
  patterns: z
    .object({
      scriptSource: REGEX_SOURCE_SCHEMA.optional(),
      baseDocument: REGEX_SOURCE_SCHEMA.optional(),
    })
    .optional(),
  output: z
    .object({
      lineWidth: z
        .number()
        .int("lineWidth must be an integer")
        .positive("lineWidth must be greater than zero")
        .optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LOG_LEVEL_SCHEMA.optional(),
      destination: z
        .object({
          type: z.enum(["stdout", "stderr", "file"]),
          path: z.string().optional(),
          pretty: z.boolean().optional(),
          colorize: z.boolean().optional(),
        })
        .optional(),
      enableTimestamps: z.boolean().optional(),
    })
    .optional(),
});

export const LOG_LEVELS = LOG_LEVEL_SCHEMA.options;

export const PROJECT_LIST_SCHEMA = z
  .object({
    git: z
      .object({
        repo_urls: z.array(z.string().min(1, "repository urls must not be empty")),
      })
      .loose(),
  })
  .loose();
