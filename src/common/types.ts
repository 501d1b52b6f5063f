export const DEFAULT_REGION = "us-east-1";

export const DEFAULT_DELIMITER = "/";

// AWS caps pages at 1000 keys; some S3-compatible stores return more.
export const DEFAULT_KEYS_PER_PAGE = 10_000;

export const DEFAULT_ENCODING: BufferEncoding = "utf-8";
