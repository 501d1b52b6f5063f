import type { Logger } from "pino";
import { createLogger, type LoggerOption } from "../common/logger.ts";
import { DEFAULT_DELIMITER, DEFAULT_ENCODING, DEFAULT_KEYS_PER_PAGE } from "../common/types.ts";
import { createS3Client, handlerConfigFromEnv, type HandlerConfig } from "../handlerConfig.ts";
import { copyFile } from "./actions/copyFile.ts";
import { deleteFile } from "./actions/deleteFile.ts";
import { downloadFile } from "./actions/downloadFile.ts";
import { getFileSize } from "./actions/getFileSize.ts";
import { iterateDirs } from "./actions/iterateDirs.ts";
import { iterateKeys } from "./actions/iterateKeys.ts";
import { listBuckets } from "./actions/listBuckets.ts";
import { readBytes, readFile } from "./actions/readFile.ts";
import { uploadFile } from "./actions/uploadFile.ts";
import { writeFile } from "./actions/writeFile.ts";
import type { ActionContext, S3Api } from "./s3Types.ts";

export interface S3HandlerDependencies {
  s3: S3Api;
}

export interface S3HandlerOptions {
  /** `MaxKeys` sent by {@link S3Handler.iterateKeys}. Defaults to 10000. */
  keysPerPage?: number;
  /** Separator of virtual directories. Defaults to `/`. */
  delimiter?: string;
  logger?: LoggerOption;
}

/**
 * Read, write, copy, transfer, delete and list objects in S3-compatible
 * storage. Every method is a single delegated call except the two iterators;
 * errors from the storage client and the local filesystem propagate as thrown.
 */
export class S3Handler {
  private readonly context: ActionContext;

  constructor(dependencies: S3HandlerDependencies, options: S3HandlerOptions = {}) {
    this.context = {
      s3: dependencies.s3,
      logger: createLogger(options.logger),
      keysPerPage: options.keysPerPage ?? DEFAULT_KEYS_PER_PAGE,
      delimiter: options.delimiter ?? DEFAULT_DELIMITER,
    };
  }

  get logger(): Logger {
    return this.context.logger;
  }

  /** Reads an object and decodes it with `encoding`. */
  readFile(bucket: string, key: string, encoding: BufferEncoding = DEFAULT_ENCODING): Promise<string> {
    return readFile(this.context, bucket, key, encoding);
  }

  /** Reads an object's raw bytes. */
  readBytes(bucket: string, key: string): Promise<Uint8Array> {
    return readBytes(this.context, bucket, key);
  }

  writeFile(bucket: string, key: string, content: string | Uint8Array): Promise<void> {
    return writeFile(this.context, bucket, key, content);
  }

  copyFile(sourceBucket: string, sourceKey: string, targetBucket: string, targetKey: string): Promise<void> {
    return copyFile(this.context, sourceBucket, sourceKey, targetBucket, targetKey);
  }

  /** Downloads an object to `localFilePath`, creating its parent directory first. */
  downloadFile(bucket: string, key: string, localFilePath: string): Promise<void> {
    return downloadFile(this.context, bucket, key, localFilePath);
  }

  uploadFile(bucket: string, key: string, localFilePath: string): Promise<void> {
    return uploadFile(this.context, bucket, key, localFilePath);
  }

  deleteFile(bucket: string, key: string): Promise<void> {
    return deleteFile(this.context, bucket, key);
  }

  /** Size of the object in bytes. */
  getFileSize(bucket: string, key: string): Promise<number> {
    return getFileSize(this.context, bucket, key);
  }

  listBuckets(): Promise<string[]> {
    return listBuckets(this.context);
  }

  /**
   * Lazily yields every directory and sub-directory under `prefix`,
   * depth-first. Each call starts a new traversal.
   */
  iterateDirs(bucket: string, prefix = ""): AsyncGenerator<string, void, undefined> {
    return iterateDirs(this.context, bucket, prefix);
  }

  /** Lazily yields every key under `prefix` in listing order. */
  iterateKeys(bucket: string, prefix = ""): AsyncGenerator<string, void, undefined> {
    return iterateKeys(this.context, bucket, prefix);
  }
}

/**
 * Builds a handler backed by the SDK's `S3` client. Without a config, settings
 * are read from `S3_HANDLER_*` environment variables.
 */
export function createS3Handler(config: HandlerConfig = handlerConfigFromEnv()): S3Handler {
  return new S3Handler(
    { s3: createS3Client(config) },
    {
      keysPerPage: config.keysPerPage,
      delimiter: config.delimiter,
      logger: config.logger,
    },
  );
}
