import type { ActionContext } from "../s3Types.ts";

/**
 * Builds the `CopySource` header value. Every key character except
 * `A-Z a-z 0-9 - . _ ~ /` is percent-encoded.
 */
export function copySource(bucket: string, key: string): string {
  const encoded = encodeURIComponent(key)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replaceAll("%2F", "/");
  return `${bucket}/${encoded}`;
}

export async function copyFile(
  context: ActionContext,
  sourceBucket: string,
  sourceKey: string,
  targetBucket: string,
  targetKey: string,
): Promise<void> {
  context.logger.debug(
    { event: "s3.copy", sourceBucket, sourceKey, bucket: targetBucket, key: targetKey },
    "Copying object",
  );
  await context.s3.copyObject({
    Bucket: targetBucket,
    Key: targetKey,
    CopySource: copySource(sourceBucket, sourceKey),
  });
}
