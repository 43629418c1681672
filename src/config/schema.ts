// pattern: Functional Core
import { z } from "zod";

const AgentConfigSchema = z.object({
  max_tool_rounds: z.number().int().positive().default(10),
  max_tokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).optional(),
});

const ModelConfigSchema = z
  .object({
    provider: z.enum(["openai-compat", "azure", "anthropic"]),
    name: z.string().min(1),
    api_key: z.string().optional(),
    base_url: z.string().url().optional(),
    api_version: z.string().default("2024-02-15-preview"),
    max_retries: z.number().int().nonnegative().default(3),
  })
  .superRefine((data, ctx) => {
    if (data.provider === "azure" && !data.base_url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "base_url (the Azure OpenAI endpoint) is required when provider is azure",
        path: ["base_url"],
      });
    }
  });

const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  public_url: z.string().url().optional(),
});

const AppConfigSchema = z.object({
  agent: AgentConfigSchema.default({}),
  model: ModelConfigSchema,
  server: ServerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ModelConfig = z.input<typeof ModelConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export { AppConfigSchema, AgentConfigSchema, ModelConfigSchema, ServerConfigSchema };
