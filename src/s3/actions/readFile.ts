import { TextDecoder } from "node:util";
import type { ActionContext } from "../s3Types.ts";

export async function readBytes(
  context: ActionContext,
  bucket: string,
  key: string,
): Promise<Uint8Array> {
  context.logger.debug({ event: "s3.read", bucket, key }, "Reading object");
  const result = await context.s3.getObject({ Bucket: bucket, Key: key });
  return (await result.Body?.transformToByteArray()) ?? new Uint8Array();
}

export async function readFile(
  context: ActionContext,
  bucket: string,
  key: string,
  encoding: BufferEncoding,
): Promise<string> {
  const bytes = await readBytes(context, bucket, key);
  if (encoding === "utf-8" || encoding === "utf8") {
    // Buffer#toString would substitute U+FFFD for malformed sequences
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  }
  return Buffer.from(bytes).toString(encoding);
}
