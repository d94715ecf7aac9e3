/**
 * Runtime configuration, read from the environment.
 *
 *   ROOST_WEBAPP_URL    web app serving the HTML shell   (default https://twitter.com)
 *   ROOST_GRAPHQL_URL   GraphQL base                     (default https://twitter.com/i/api/graphql)
 *   ROOST_API_URL       REST base for the client event   (default https://api.twitter.com/1.1)
 *   ROOST_USER_AGENT    User-Agent sent on every request
 *   ROOST_TIMEOUT_MS    per-request timeout              (default 10000)
 *   ROOST_CLIENT_EVENT  "false" skips the cookie-load client event during open()
 */

import { z } from "zod";
import { ConfigError } from "./errors";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const ConfigSchema = z.object({
  webappUrl: z.string().url().default("https://twitter.com"),
  graphqlUrl: z.string().url().default("https://twitter.com/i/api/graphql"),
  apiUrl: z.string().url().default("https://api.twitter.com/1.1"),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  reportClientEvent: z.boolean().default(true),
});

export type Config = z.infer<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof Config, string> = {
  webappUrl: "ROOST_WEBAPP_URL",
  graphqlUrl: "ROOST_GRAPHQL_URL",
  apiUrl: "ROOST_API_URL",
  userAgent: "ROOST_USER_AGENT",
  timeoutMs: "ROOST_TIMEOUT_MS",
  reportClientEvent: "ROOST_CLIENT_EVENT",
};

function isConfigKey(key: unknown): key is keyof Config {
  return typeof key === "string" && Object.hasOwn(ENV_KEYS, key);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse({
    webappUrl: env.ROOST_WEBAPP_URL || undefined,
    graphqlUrl: env.ROOST_GRAPHQL_URL || undefined,
    apiUrl: env.ROOST_API_URL || undefined,
    userAgent: env.ROOST_USER_AGENT || undefined,
    timeoutMs: env.ROOST_TIMEOUT_MS || undefined,
    reportClientEvent: env.ROOST_CLIENT_EVENT ? env.ROOST_CLIENT_EVENT !== "false" : undefined,
  });

  if (!result.success) {
    const keys = result.error.issues.map((issue) => {
      const field = issue.path[0];
      return isConfigKey(field) ? ENV_KEYS[field] : String(field);
    });
    throw new ConfigError([...new Set(keys)]);
  }

  return result.data;
}
