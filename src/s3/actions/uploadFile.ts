import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { ActionContext } from "../s3Types.ts";

export async function uploadFile(
  context: ActionContext,
  bucket: string,
  key: string,
  localFilePath: string,
): Promise<void> {
  const { size } = await stat(localFilePath);
  context.logger.debug({ event: "s3.upload", bucket, key, localFilePath, size }, "Uploading file");

  const body = createReadStream(localFilePath);
  try {
    // stream bodies must declare their length
    await context.s3.putObject({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentLength: size,
    });
  } finally {
    // the client may reject before it ever reads the stream
    body.destroy();
  }
}
