import { z } from "zod";
import { normalizeLogLevel } from "../utils/logging/logger";

export const llmProviderSettingsSchema = z
  .object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    baseURL: z.string().url().optional(),
    apiKey: z.string().optional(),
  })
  .passthrough();

const logLevelSchema = z.string().transform((value, ctx) => {
  const level = normalizeLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level "${value}"` });
    return z.NEVER;
  }
  return level;
});

export const appConfigSchema = z
  .object({
    llm: z
      .object({
        defaultProvider: z.string().min(1).optional(),
        providers: z.record(llmProviderSettingsSchema).optional(),
      })
      .passthrough()
      .optional(),
    tools: z.record(z.record(z.unknown())).optional(),
    security: z
      .object({
        apiKeyEnvPrefix: z.string().optional(),
        encryptionEnabled: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    logging: z
      .object({
        level: logLevelSchema.optional(),
        enabled: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
