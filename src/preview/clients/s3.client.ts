import {
  S3Client as Client,
  S3ClientConfig,
  BucketLocationConstraint,
  CreateBucketCommand,
  CreateBucketCommandInput,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  PutBucketPolicyCommand,
  PutObjectCommand,
} from "@aws-sdk/client-s3";

import { isNotFound } from "../utils/aws.utils.js";

export type ObjectPage = Readonly<{
  keys: string[];
  nextContinuationToken?: string;
}>;

export interface S3Api {
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string, region: string): Promise<void>;
  putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    contentType: string
  ): Promise<void>;
  listObjects(bucket: string, continuationToken?: string): Promise<ObjectPage>;
  deleteObjects(bucket: string, keys: string[]): Promise<void>;
  deleteBucket(bucket: string): Promise<void>;
  putBucketPolicy(bucket: string, policy: string): Promise<void>;
}

export class S3Client implements S3Api {
  private readonly client: Client;

  constructor(options: S3ClientConfig = {}) {
    this.client = new Client(options);
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw e;
    }
  }

  /**
   * Creates the bucket in the given region. us-east-1 is the default location
   * and rejects an explicit constraint.
   * @param bucket
   * @param region
   */
  async createBucket(bucket: string, region: string): Promise<void> {
    const input: CreateBucketCommandInput = { Bucket: bucket };

    if (region !== "us-east-1") {
      input.CreateBucketConfiguration = {
        LocationConstraint: toLocationConstraint(region),
      };
    }

    await this.client.send(new CreateBucketCommand(input));
  }

  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array,
    contentType: string
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async listObjects(
    bucket: string,
    continuationToken?: string
  ): Promise<ObjectPage> {
    const { Contents, IsTruncated, NextContinuationToken } =
      await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ContinuationToken: continuationToken,
        })
      );

    const keys = (Contents ?? []).flatMap(({ Key }) => (Key ? [Key] : []));

    return {
      keys,
      nextContinuationToken: IsTruncated ? NextContinuationToken : undefined,
    };
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    const { Errors } = await this.client.send(
      new DeleteObjectsCommand({
        Bucket: bucket,
        Delete: {
          Objects: keys.map((Key) => ({ Key })),
          Quiet: true,
        },
      })
    );

    if (Errors && Errors.length > 0) {
      const [first] = Errors;
      throw new Error(
        `failed to delete ${Errors.length} object(s) from ${bucket}, first: ${first.Key} (${first.Code}: ${first.Message})`
      );
    }
  }

  async deleteBucket(bucket: string): Promise<void> {
    await this.client.send(new DeleteBucketCommand({ Bucket: bucket }));
  }

  async putBucketPolicy(bucket: string, policy: string): Promise<void> {
    await this.client.send(
      new PutBucketPolicyCommand({ Bucket: bucket, Policy: policy })
    );
  }
}

function toLocationConstraint(region: string): BucketLocationConstraint {
  const constraint = Object.values(BucketLocationConstraint).find(
    (value) => value === region
  );

  if (!constraint) {
    throw new Error(`S3 does not accept ${region} as a bucket location`);
  }

  return constraint;
}
