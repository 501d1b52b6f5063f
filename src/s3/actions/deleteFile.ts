import type { ActionContext } from "../s3Types.ts";

export async function deleteFile(context: ActionContext, bucket: string, key: string): Promise<void> {
  context.logger.debug({ event: "s3.delete", bucket, key }, "Deleting object");
  await context.s3.deleteObject({ Bucket: bucket, Key: key });
}
