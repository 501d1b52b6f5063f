import { randomUUID } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ActionContext } from "../s3Types.ts";

export async function downloadFile(
  context: ActionContext,
  bucket: string,
  key: string,
  localFilePath: string,
): Promise<void> {
  context.logger.debug({ event: "s3.download", bucket, key, localFilePath }, "Downloading object");

  // mkdir is a no-op for an existing directory; other errors propagate
  await mkdir(dirname(localFilePath), { recursive: true });

  const result = await context.s3.getObject({ Bucket: bucket, Key: key });
  const body = result.Body;

  // localFilePath only ever holds a complete object
  const partialPath = `${localFilePath}.${randomUUID()}.partial`;
  try {
    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(partialPath));
    } else {
      // Non-Node runtimes hand back a web stream or Blob
      await writeFile(partialPath, (await body?.transformToByteArray()) ?? new Uint8Array());
    }
    await rename(partialPath, localFilePath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }
}
