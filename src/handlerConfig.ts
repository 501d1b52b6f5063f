import { readFileSync } from "node:fs";
import { S3 } from "@aws-sdk/client-s3";
import * as v from "valibot";
import { DEFAULT_REGION } from "./common/types.ts";

const EndpointSchema = v.pipe(
  v.string(),
  v.url(),
  v.regex(/^https?:\/\//, "endpoint must start with http:// or https://"),
);

const HandlerConfigSchema = v.object({
  region: v.optional(v.pipe(v.string(), v.nonEmpty())),
  endpoint: v.optional(EndpointSchema),
  forcePathStyle: v.optional(v.boolean()),
  keysPerPage: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(10_000))),
  delimiter: v.optional(v.pipe(v.string(), v.nonEmpty())),
  logger: v.optional(v.boolean()),
});

export type HandlerConfig = v.InferOutput<typeof HandlerConfigSchema>;

const BooleanStringSchema = v.pipe(
  v.picklist(["true", "false"]),
  v.transform((value) => value === "true"),
);

const EnvSchema = v.object({
  S3_HANDLER_CONFIG: v.optional(v.string()),
  S3_HANDLER_REGION: v.optional(v.string()),
  S3_HANDLER_ENDPOINT: v.optional(v.string()),
  S3_HANDLER_FORCE_PATH_STYLE: v.optional(BooleanStringSchema),
  S3_HANDLER_KEYS_PER_PAGE: v.optional(v.pipe(v.string(), v.transform(Number))),
  S3_HANDLER_DELIMITER: v.optional(v.string()),
  S3_HANDLER_LOGGER: v.optional(BooleanStringSchema),
});

export function validateHandlerConfig(data: unknown): HandlerConfig {
  return v.parse(HandlerConfigSchema, data);
}

export function loadHandlerConfig(path: string): HandlerConfig {
  const content = readFileSync(path, "utf-8");
  return validateHandlerConfig(JSON.parse(content));
}

/**
 * Reads handler settings from `S3_HANDLER_*` variables. When
 * `S3_HANDLER_CONFIG` names a JSON file, its values are the base that the
 * other variables override.
 */
export function handlerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): HandlerConfig {
  const vars = v.parse(EnvSchema, env);
  const base = vars.S3_HANDLER_CONFIG ? loadHandlerConfig(vars.S3_HANDLER_CONFIG) : {};

  const overrides: Record<string, unknown> = {
    region: vars.S3_HANDLER_REGION,
    endpoint: vars.S3_HANDLER_ENDPOINT,
    forcePathStyle: vars.S3_HANDLER_FORCE_PATH_STYLE,
    keysPerPage: vars.S3_HANDLER_KEYS_PER_PAGE,
    delimiter: vars.S3_HANDLER_DELIMITER,
    logger: vars.S3_HANDLER_LOGGER,
  };
  for (const [name, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete overrides[name];
    }
  }

  return validateHandlerConfig({ ...base, ...overrides });
}

/**
 * Builds the SDK client used when no `s3` dependency is supplied. Credentials
 * come from the SDK's default provider chain.
 */
export function createS3Client(config: HandlerConfig = {}): S3 {
  return new S3({
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  });
}
