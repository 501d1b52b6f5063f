import type { ActionContext } from "../s3Types.ts";

interface PrefixCursor {
  prefix: string;
  /** Sub-prefixes from the last fetched page not yet yielded. */
  pending: string[];
  continuationToken?: string;
  fetched: boolean;
}

function openCursor(prefix: string): PrefixCursor {
  return { prefix, pending: [], fetched: false };
}

/**
 * Yields every virtual directory under `prefix`, depth-first and pre-order:
 * each common prefix is yielded and then fully descended into before its next
 * sibling.
 *
 * Descent is tracked on an explicit stack of cursors, one per open prefix, so
 * nesting depth does not grow the call stack. Pages are requested only when
 * the consumer asks for a value the buffered pages cannot supply. A page is
 * followed by another as long as it carries a continuation token, even when
 * it holds no common prefixes.
 */
export async function* iterateDirs(
  context: ActionContext,
  bucket: string,
  prefix = "",
): AsyncGenerator<string, void, undefined> {
  const stack: PrefixCursor[] = [openCursor(prefix)];

  while (stack.length > 0) {
    const cursor = stack[stack.length - 1];

    const next = cursor.pending.shift();
    if (next !== undefined) {
      yield next;
      stack.push(openCursor(next));
      continue;
    }

    if (cursor.fetched && !cursor.continuationToken) {
      stack.pop();
      continue;
    }

    const page = await context.s3.listObjectsV2({
      Bucket: bucket,
      Prefix: cursor.prefix,
      Delimiter: context.delimiter,
      ContinuationToken: cursor.continuationToken,
    });
    cursor.fetched = true;
    cursor.pending = (page.CommonPrefixes ?? []).flatMap((entry) =>
      entry.Prefix === undefined ? [] : [entry.Prefix],
    );
    cursor.continuationToken = page.NextContinuationToken || undefined;

    context.logger.debug(
      {
        event: "s3.listPage",
        bucket,
        prefix: cursor.prefix,
        commonPrefixes: cursor.pending.length,
        hasNextPage: cursor.continuationToken !== undefined,
      },
      "Listed page of directories",
    );
  }
}
