import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * 環境変数のスキーマ
 */
export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().default("0.0.0.0"),
  APP_URL: z.string().url().default("http://localhost:8787"),

  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REDIRECT_URI: optionalString,
  GOOGLE_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(14 * 24 * 60 * 60),
  STATE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * 環境変数を読み込む
 * OAuth の設定不足は起動時ではなく /oauth/start で ConfigurationError にする
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid environment: ${details}`);
  }

  return parsed.data;
}

/**
 * リダイレクト URI（未指定なら APP_URL から組み立てる）
 */
export function redirectUri(config: AppConfig): string {
  return config.GOOGLE_REDIRECT_URI ?? new URL("/oauth/callback", config.APP_URL).toString();
}
