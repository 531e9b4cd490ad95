import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_TIMEOUT_MS, type ClientConfig } from "../core/types.js";

export type Environment = Record<string, string | undefined>;

/** Unset and blank variables are the same thing. */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(blankToUndefined, schema.optional());

const EnvSchema = z.object({
  ZENDESK_SUBDOMAIN: optional(
    z
      .string()
      .trim()
      .regex(/^[a-z0-9][a-z0-9-]*$/i, "must be a bare subdomain such as \"acme\"")
  ),
  ZENDESK_EMAIL: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "is required" }).trim().email("must be an email address")
  ),
  ZENDESK_API_TOKEN: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "is required" }).trim().min(1, "is required")
  ),
  ZENDESK_TIMEOUT_MS: optional(
    z.coerce
      .number({ invalid_type_error: "must be a number" })
      .int("must be an integer")
      .positive("must be positive")
  ),
  ZENDESK_BASE_URL: optional(z.string().trim().url("must be a URL")),
});

/**
 * Loads `.env` into process.env and returns it. Variables already set in the
 * process win over the file.
 */
export function readEnvironment(): Environment {
  dotenv.config();
  return process.env;
}

/**
 * Builds a client configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(env: Environment = readEnvironment()): ClientConfig {
  const problems: string[] = [];
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      problems.push(`${issue.path.join(".") || "environment"} ${issue.message}`);
    }
  }
  if (
    blankToUndefined(env["ZENDESK_SUBDOMAIN"]) === undefined &&
    blankToUndefined(env["ZENDESK_BASE_URL"]) === undefined
  ) {
    problems.push("ZENDESK_SUBDOMAIN is required unless ZENDESK_BASE_URL is set");
  }
  if (!parsed.success || problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const values = parsed.data;
  const config: ClientConfig = {
    auth: {
      email: values.ZENDESK_EMAIL,
      apiToken: values.ZENDESK_API_TOKEN,
    },
    timeout: values.ZENDESK_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
  if (values.ZENDESK_SUBDOMAIN !== undefined) {
    config.subdomain = values.ZENDESK_SUBDOMAIN;
  }
  if (values.ZENDESK_BASE_URL !== undefined) {
    config.baseUrl = values.ZENDESK_BASE_URL;
  }
  return config;
}
