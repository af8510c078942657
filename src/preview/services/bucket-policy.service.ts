import { Logger } from "@aws-lambda-powertools/logger";

import { S3Api } from "../clients/s3.client.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export type BucketPolicyServiceOptions = {
  s3: S3Api;
  logger?: Logger;
};

export type BucketPolicyDocument = Readonly<{
  Version: "2012-10-17";
  Statement: ReadonlyArray<
    Readonly<{
      Sid: string;
      Effect: "Allow";
      Principal: Readonly<{ Service: string }>;
      Action: string;
      Resource: string;
      Condition: Readonly<{
        StringEquals: Readonly<Record<"AWS:SourceArn", string>>;
      }>;
    }>
  >;
}>;

/**
 * Grants CloudFront read access to every object, but only on behalf of the
 * given distribution.
 */
export function buildBucketPolicy(
  bucket: string,
  distributionArn: string
): BucketPolicyDocument {
  return {
    Version: "2012-10-17",
    Statement: [
      {
        Sid: "AllowCloudFrontServicePrincipal",
        Effect: "Allow",
        Principal: {
          Service: "cloudfront.amazonaws.com",
        },
        Action: "s3:GetObject",
        Resource: `arn:aws:s3:::${bucket}/*`,
        Condition: {
          StringEquals: {
            "AWS:SourceArn": distributionArn,
          },
        },
      },
    ],
  };
}

export class BucketPolicyService {
  private readonly s3: S3Api;
  private readonly logger: Logger;

  constructor(options: BucketPolicyServiceOptions) {
    this.s3 = options.s3;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Replaces the bucket policy. Existing statements are not merged.
   */
  async attach(bucket: string, distributionArn: string): Promise<void> {
    await this.s3.putBucketPolicy(
      bucket,
      JSON.stringify(buildBucketPolicy(bucket, distributionArn))
    );
    this.logger.info("Bucket policy configured for CloudFront access", {
      bucket,
      distributionArn,
    });
  }
}
