import type { Logger } from "pino";
import type {
  CopyObjectCommandInput,
  DeleteObjectCommandInput,
  GetObjectCommandInput,
  HeadObjectCommandInput,
  HeadObjectCommandOutput,
  ListBucketsCommandInput,
  ListBucketsCommandOutput,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
  PutObjectCommandInput,
} from "@aws-sdk/client-s3";

/** The part of an object body the handler reads. SDK streaming bodies satisfy it. */
export interface ObjectBody {
  transformToByteArray(): Promise<Uint8Array>;
}

export type ListObjectsV2Page = Pick<
  ListObjectsV2CommandOutput,
  "Contents" | "CommonPrefixes" | "IsTruncated" | "NextContinuationToken"
>;

export type ListBucketsPage = Pick<ListBucketsCommandOutput, "Buckets" | "ContinuationToken">;

/**
 * Storage operations the handler delegates to. The aggregated `S3` client from
 * `@aws-sdk/client-s3` implements this structurally; tests pass an in-memory
 * stand-in.
 */
export interface S3Api {
  getObject(input: GetObjectCommandInput): Promise<{ Body?: ObjectBody }>;
  putObject(input: PutObjectCommandInput): Promise<object>;
  copyObject(input: CopyObjectCommandInput): Promise<object>;
  deleteObject(input: DeleteObjectCommandInput): Promise<object>;
  headObject(input: HeadObjectCommandInput): Promise<Pick<HeadObjectCommandOutput, "ContentLength">>;
  listBuckets(input: ListBucketsCommandInput): Promise<ListBucketsPage>;
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ListObjectsV2Page>;
}

/** Shared state every action runs against. */
export interface ActionContext {
  s3: S3Api;
  logger: Logger;
  keysPerPage: number;
  delimiter: string;
}
