export { S3Handler, createS3Handler } from "./s3/s3Handler.ts";
export type { S3HandlerDependencies, S3HandlerOptions } from "./s3/s3Handler.ts";
export type { S3Api, ObjectBody, ListObjectsV2Page, ListBucketsPage } from "./s3/s3Types.ts";
export { copySource } from "./s3/actions/copyFile.ts";
export {
  createS3Client,
  handlerConfigFromEnv,
  loadHandlerConfig,
  validateHandlerConfig,
} from "./handlerConfig.ts";
export type { HandlerConfig } from "./handlerConfig.ts";
export { S3HandlerError, ListingStalledError } from "./common/errors.ts";
export { createLogger } from "./common/logger.ts";
export type { LoggerOption } from "./common/logger.ts";
export {
  DEFAULT_DELIMITER,
  DEFAULT_ENCODING,
  DEFAULT_KEYS_PER_PAGE,
  DEFAULT_REGION,
} from "./common/types.ts";
