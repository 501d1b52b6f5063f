export class S3HandlerError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "S3HandlerError";
    this.code = code;
  }
}

/**
 * Raised when start-after pagination is told more keys exist but the page
 * carried none, leaving no key to resume after.
 */
export class ListingStalledError extends S3HandlerError {
  readonly bucket: string;
  readonly prefix: string;

  constructor(bucket: string, prefix: string) {
    super(
      "ListingStalled",
      `Listing of s3://${bucket}/${prefix} returned a truncated page without keys`,
    );
    this.name = "ListingStalledError";
    this.bucket = bucket;
    this.prefix = prefix;
  }
}
