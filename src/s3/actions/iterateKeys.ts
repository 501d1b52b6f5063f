import { ListingStalledError } from "../../common/errors.ts";
import type { ActionContext } from "../s3Types.ts";

/**
 * Yields every key under `prefix` in listing order, one page at a time.
 *
 * Unlike {@link iterateDirs}, paging resumes from the last key seen
 * (`StartAfter`) and ends when the service reports `IsTruncated: false`, however
 * many keys the final page held.
 */
export async function* iterateKeys(
  context: ActionContext,
  bucket: string,
  prefix = "",
): AsyncGenerator<string, void, undefined> {
  let startAfter: string | undefined;
  let truncated = true;

  while (truncated) {
    const page = await context.s3.listObjectsV2({
      Bucket: bucket,
      Prefix: prefix,
      MaxKeys: context.keysPerPage,
      StartAfter: startAfter,
    });
    const keys = (page.Contents ?? []).flatMap((entry) =>
      entry.Key === undefined ? [] : [entry.Key],
    );
    truncated = page.IsTruncated === true;

    context.logger.debug(
      { event: "s3.listPage", bucket, prefix, startAfter, keys: keys.length, truncated },
      "Listed page of keys",
    );

    yield* keys;

    if (truncated) {
      const lastKey = keys.at(-1);
      if (lastKey === undefined) {
        throw new ListingStalledError(bucket, prefix);
      }
      startAfter = lastKey;
    }
  }
}
