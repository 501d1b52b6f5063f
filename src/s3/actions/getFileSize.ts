import type { ActionContext } from "../s3Types.ts";

export async function getFileSize(context: ActionContext, bucket: string, key: string): Promise<number> {
  context.logger.debug({ event: "s3.size", bucket, key }, "Reading object size");
  const result = await context.s3.headObject({ Bucket: bucket, Key: key });
  return result.ContentLength ?? 0;
}
