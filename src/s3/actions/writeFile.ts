import type { ActionContext } from "../s3Types.ts";

export async function writeFile(
  context: ActionContext,
  bucket: string,
  key: string,
  content: string | Uint8Array,
): Promise<void> {
  context.logger.debug(
    { event: "s3.write", bucket, key, size: Buffer.byteLength(content) },
    "Writing object",
  );
  await context.s3.putObject({ Bucket: bucket, Key: key, Body: content });
}
