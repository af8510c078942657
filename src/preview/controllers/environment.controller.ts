import { Logger } from "@aws-lambda-powertools/logger";

import { CloudfrontApi, CloudfrontClient } from "../clients/cloudfront.client.js";
import { GithubClient, Notifier } from "../clients/github.client.js";
import { Route53Api, Route53Client } from "../clients/route53.client.js";
import { S3Api, S3Client } from "../clients/s3.client.js";
import { PreviewConfig } from "../config/preview.config.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import { StepError } from "../errors/StepError.js";
import { DistributionTransition } from "../models/distribution-state.model.js";
import { BucketPolicyService } from "../services/bucket-policy.service.js";
import { BucketService } from "../services/bucket.service.js";
import { CacheInvalidationService } from "../services/cache-invalidation.service.js";
import { ContentSyncService } from "../services/content-sync.service.js";
import { DistributionLocator } from "../services/distribution-locator.service.js";
import { DistributionService } from "../services/distribution.service.js";
import { DnsRecordService } from "../services/dns-record.service.js";
import { OriginAccessControlService } from "../services/origin-access-control.service.js";
import { Clock, systemClock } from "../utils/clock.utils.js";
import { cleanedUpComment, deployedComment } from "../utils/comment.utils.js";
import {
  EnvironmentIdentity,
  deriveEnvironmentIdentity,
} from "../utils/identity.utils.js";
import { errorMessage, logger as defaultLogger } from "../utils/logger.utils.js";

/** CloudFront and Route 53 are global and served from us-east-1. */
const GLOBAL_SERVICE_REGION = "us-east-1";

export type EnvironmentControllerOptions = {
  config: PreviewConfig;
  s3: S3Api;
  cloudfront: CloudfrontApi;
  route53: Route53Api;
  notifier?: Notifier;
  locator?: DistributionLocator;
  clock?: Clock;
  logger?: Logger;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
  onDistributionTransition?: (transition: DistributionTransition) => void;
};

export type DeployResult = Readonly<{
  hostname: string;
  url: string;
  bucketName: string;
  distributionId: string;
  edgeDomain: string;
  fileCount: number;
}>;

export type CleanupResult = Readonly<{
  hostname: string;
  distributionDeleted: boolean;
  dnsRecordDeleted: boolean;
  bucketDeleted: boolean;
  warnings: string[];
}>;

/**
 * Drives the preview resources through deploy and cleanup. Every step finds
 * before it creates and matches before it deletes, so both entry points can be
 * re-run after a partial failure.
 */
export class EnvironmentController {
  readonly identity: EnvironmentIdentity;

  private readonly config: PreviewConfig;
  private readonly notifier?: Notifier;
  private readonly logger: Logger;

  private readonly buckets: BucketService;
  private readonly contentSync: ContentSyncService;
  private readonly originAccessControls: OriginAccessControlService;
  private readonly distributions: DistributionService;
  private readonly bucketPolicies: BucketPolicyService;
  private readonly cacheInvalidation: CacheInvalidationService;
  private readonly dnsRecords: DnsRecordService;

  constructor(options: EnvironmentControllerOptions) {
    this.config = options.config;
    this.identity = deriveEnvironmentIdentity(
      options.config.environmentKey,
      options.config.appName,
      options.config.baseDomain
    );
    this.notifier = options.notifier;
    this.logger = options.logger ?? defaultLogger;

    const clock = options.clock ?? systemClock;
    const { s3, cloudfront, route53 } = options;
    const logger = this.logger;

    this.buckets = new BucketService({ s3, logger });
    this.contentSync = new ContentSyncService({ s3, logger });
    this.originAccessControls = new OriginAccessControlService({
      cloudfront,
      logger,
    });
    this.distributions = new DistributionService({
      cloudfront,
      locator: options.locator,
      clock,
      logger,
      waitTimeoutMs: options.waitTimeoutMs,
      pollIntervalMs: options.pollIntervalMs,
      onTransition: options.onDistributionTransition,
    });
    this.bucketPolicies = new BucketPolicyService({ s3, logger });
    this.cacheInvalidation = new CacheInvalidationService({
      cloudfront,
      clock,
      logger,
    });
    this.dnsRecords = new DnsRecordService({ route53, logger });
  }

  /**
   * Wires the AWS and GitHub clients for a config. Without a GitHub token the
   * controller runs without a notifier.
   */
  static fromConfig(
    config: PreviewConfig,
    logger: Logger = defaultLogger
  ): EnvironmentController {
    if (!config.githubToken) {
      logger.warn("GITHUB_TOKEN not set, PR comment will be skipped");
    }

    return new EnvironmentController({
      config,
      logger,
      s3: new S3Client({ region: config.region }),
      cloudfront: new CloudfrontClient({ region: GLOBAL_SERVICE_REGION }),
      route53: new Route53Client({ region: GLOBAL_SERVICE_REGION }),
      notifier: config.githubToken
        ? new GithubClient({
            token: config.githubToken,
            apiUrl: config.githubApiUrl,
          })
        : undefined,
    });
  }

  async deploy(): Promise<DeployResult> {
    const { bucketName, hostname, originAccessControlName, baseDomain, key } =
      this.identity;

    this.logger.info("Starting deployment", { bucketName, hostname });

    if (!this.config.certificateArn) {
      this.logger.warn(
        "No certificate supplied, HTTPS will not work on the custom hostname",
        { hostname }
      );
    }

    await this.step("create bucket", () =>
      this.buckets.ensure(bucketName, this.config.region)
    );

    const fileCount = await this.step("sync content", () =>
      this.contentSync.sync(this.config.sourceDir, bucketName)
    );

    const originAccessControlId = await this.step(
      "ensure origin access control",
      () =>
        this.originAccessControls.getOrCreate(
          originAccessControlName,
          `OAC for PR #${key} preview environment`
        )
    );

    const distribution = await this.step("ensure distribution", () =>
      this.distributions.getOrCreate({
        bucketName,
        region: this.config.region,
        originAccessControlId,
        hostname,
        comment: `PR #${key} Preview Environment`,
        certificateArn: this.config.certificateArn,
      })
    );

    await this.step("attach bucket policy", () =>
      this.bucketPolicies.attach(bucketName, distribution.arn)
    );

    await this.step("invalidate cache", () =>
      this.cacheInvalidation.invalidateAll(distribution.id)
    );

    const zoneId = await this.step("resolve hosted zone", () =>
      this.dnsRecords.resolveZone(baseDomain)
    );

    await this.step("upsert dns record", () =>
      this.dnsRecords.upsert(zoneId, hostname, distribution.domainName)
    );

    await this.notify(deployedComment(hostname));

    this.logger.info("Deployment complete", {
      hostname,
      distributionId: distribution.id,
    });

    return {
      hostname,
      url: `https://${hostname}`,
      bucketName,
      distributionId: distribution.id,
      edgeDomain: distribution.domainName,
      fileCount,
    };
  }

  async cleanup(): Promise<CleanupResult> {
    const { bucketName, hostname, baseDomain, key } = this.identity;
    const warnings: string[] = [];

    this.logger.info("Starting cleanup", { bucketName, hostname });

    const distributionId = await this.step("find distribution", () =>
      this.distributions.findByAlias(hostname)
    );

    if (distributionId) {
      await this.step("teardown distribution", () =>
        this.distributions.teardown(distributionId)
      );
    } else {
      this.logger.info("No CloudFront distribution found", { hostname });
    }

    let dnsRecordDeleted = false;
    try {
      const zoneId = await this.dnsRecords.resolveZone(baseDomain);
      dnsRecordDeleted = await this.dnsRecords.delete(zoneId, hostname);
    } catch (e) {
      const message =
        e instanceof NotFoundError
          ? `Skipping DNS record: ${e.message}`
          : `Failed to delete DNS record: ${errorMessage(e)}`;
      warnings.push(message);
      this.logger.warn(message, { hostname });
    }

    const removal = await this.step("delete bucket", () =>
      this.buckets.emptyAndDelete(bucketName)
    );

    await this.notify(cleanedUpComment(key));

    this.logger.info("Cleanup complete", { hostname });

    return {
      hostname,
      distributionDeleted: distributionId !== undefined,
      dnsRecordDeleted,
      bucketDeleted: removal.deleted,
      warnings,
    };
  }

  private async step<T>(name: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (e) {
      throw e instanceof StepError ? e : new StepError(name, e);
    }
  }

  private async notify(text: string): Promise<void> {
    if (!this.notifier) {
      this.logger.info("Skipping GitHub comment (no GitHub token provided)");
      return;
    }

    try {
      await this.notifier.postComment(
        this.config.repoOwner,
        this.config.repoName,
        this.identity.key,
        text
      );
      this.logger.info("GitHub PR comment posted");
    } catch (e) {
      this.logger.warn("Failed to post GitHub comment", {
        error: errorMessage(e),
      });
    }
  }
}
