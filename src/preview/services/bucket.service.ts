import { Logger } from "@aws-lambda-powertools/logger";

import { S3Api } from "../clients/s3.client.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export type BucketServiceOptions = {
  s3: S3Api;
  logger?: Logger;
};

export type BucketRemoval = Readonly<{
  deleted: boolean;
  objectCount: number;
}>;

export class BucketService {
  private readonly s3: S3Api;
  private readonly logger: Logger;

  constructor(options: BucketServiceOptions) {
    this.s3 = options.s3;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Creates the bucket unless it already exists.
   * @returns true when a bucket was created
   */
  async ensure(bucket: string, region: string): Promise<boolean> {
    if (await this.s3.bucketExists(bucket)) {
      this.logger.info("Bucket already exists", { bucket });
      return false;
    }

    await this.s3.createBucket(bucket, region);
    this.logger.info("Bucket created", { bucket, region });
    return true;
  }

  /**
   * Deletes every object and then the bucket itself. A bucket that is already
   * gone is reported, not treated as a failure.
   */
  async emptyAndDelete(bucket: string): Promise<BucketRemoval> {
    if (!(await this.s3.bucketExists(bucket))) {
      this.logger.info("Bucket does not exist", { bucket });
      return { deleted: false, objectCount: 0 };
    }

    let objectCount = 0;
    let token: string | undefined;

    do {
      const page = await this.s3.listObjects(bucket, token);
      await this.s3.deleteObjects(bucket, page.keys);
      objectCount += page.keys.length;
      token = page.nextContinuationToken;
    } while (token);

    await this.s3.deleteBucket(bucket);
    this.logger.info("Bucket deleted", { bucket, objectCount });

    return { deleted: true, objectCount };
  }
}
