import { Bench } from "tinybench";
import { S3Handler } from "../src/s3/s3Handler.ts";
import { FakeS3 } from "../test/helpers/fakeS3.ts";

function populateStore(n: number): FakeS3 {
  const s3 = new FakeS3();
  for (let i = 0; i < n; i++) {
    s3.seedObject("bench-bucket", `prefix-${i % 10}/key-${String(i).padStart(6, "0")}`, "");
  }
  return s3;
}

async function drain(iterable: AsyncIterable<string>): Promise<number> {
  let count = 0;
  for await (const _ of iterable) {
    count++;
  }
  return count;
}

async function run() {
  for (const size of [1_000, 10_000]) {
    const s3 = populateStore(size);

    const bench = new Bench({ warmupIterations: 5 });

    for (const keysPerPage of [1_000, 10_000]) {
      const handler = new S3Handler({ s3 }, { keysPerPage, logger: false });
      bench.add(`iterateKeys (${size} keys, ${keysPerPage} per page)`, async () => {
        await drain(handler.iterateKeys("bench-bucket"));
      });
    }

    const handler = new S3Handler({ s3 }, { logger: false });
    bench.add(`iterateDirs (${size} keys, 10 prefixes)`, async () => {
      await drain(handler.iterateDirs("bench-bucket"));
    });

    await bench.run();

    console.log(`\n--- listing with ${size} keys ---`);
    console.table(bench.table());
  }
}

run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
