import type { ActionContext } from "../s3Types.ts";

export async function listBuckets(context: ActionContext): Promise<string[]> {
  const names: string[] = [];
  let continuationToken: string | undefined;

  do {
    const page = await context.s3.listBuckets(
      continuationToken ? { ContinuationToken: continuationToken } : {},
    );
    for (const bucket of page.Buckets ?? []) {
      if (bucket.Name !== undefined) {
        names.push(bucket.Name);
      }
    }
    continuationToken = page.ContinuationToken || undefined;
  } while (continuationToken);

  context.logger.debug({ event: "s3.listBuckets", count: names.length }, "Listed buckets");
  return names;
}
