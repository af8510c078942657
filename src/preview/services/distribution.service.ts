import { Logger } from "@aws-lambda-powertools/logger";
import { DistributionConfig } from "@aws-sdk/client-cloudfront";

import {
  CloudfrontApi,
  DistributionRecord,
} from "../clients/cloudfront.client.js";
import { DistributionStateError } from "../errors/DistributionStateError.js";
import { WaitTimeoutError } from "../errors/WaitTimeoutError.js";
import {
  DistributionState,
  DistributionTransition,
  canTransition,
} from "../models/distribution-state.model.js";
import { Clock, systemClock, toUnixSeconds } from "../utils/clock.utils.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";
import {
  AliasScanLocator,
  DistributionLocator,
} from "./distribution-locator.service.js";

export const DEFAULT_WAIT_TIMEOUT_MS = 20 * 60 * 1000;
export const DEFAULT_POLL_INTERVAL_MS = 60 * 1000;

export type CreateDistributionParams = Readonly<{
  bucketName: string;
  region: string;
  originAccessControlId: string;
  hostname: string;
  comment: string;
  callerReference: string;
  certificateArn?: string;
}>;

export type DistributionServiceOptions = {
  cloudfront: CloudfrontApi;
  locator?: DistributionLocator;
  clock?: Clock;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
  logger?: Logger;
  onTransition?: (transition: DistributionTransition) => void;
};

/**
 * Builds the config of a preview distribution: a single private S3 origin read
 * through origin access control, HTTPS redirect, GET/HEAD caching and a 404
 * fallback to `/index.html` for client-side routed apps.
 */
export function buildDistributionConfig(
  params: CreateDistributionParams
): DistributionConfig {
  const originId = `S3-${params.bucketName}`;

  return {
    CallerReference: params.callerReference,
    Comment: params.comment,
    Enabled: true,
    Aliases: {
      Quantity: 1,
      Items: [params.hostname],
    },
    DefaultRootObject: "index.html",
    Origins: {
      Quantity: 1,
      Items: [
        {
          Id: originId,
          DomainName: `${params.bucketName}.s3.${params.region}.amazonaws.com`,
          S3OriginConfig: {
            OriginAccessIdentity: "",
          },
          OriginAccessControlId: params.originAccessControlId,
        },
      ],
    },
    DefaultCacheBehavior: {
      TargetOriginId: originId,
      ViewerProtocolPolicy: "redirect-to-https",
      AllowedMethods: {
        Quantity: 2,
        Items: ["GET", "HEAD"],
        CachedMethods: {
          Quantity: 2,
          Items: ["GET", "HEAD"],
        },
      },
      ForwardedValues: {
        QueryString: false,
        Cookies: {
          Forward: "none",
        },
      },
      MinTTL: 0,
      DefaultTTL: 86400,
      MaxTTL: 31536000,
      Compress: true,
      TrustedSigners: {
        Enabled: false,
        Quantity: 0,
      },
    },
    CustomErrorResponses: {
      Quantity: 1,
      Items: [
        {
          ErrorCode: 404,
          ResponsePagePath: "/index.html",
          ResponseCode: "200",
          ErrorCachingMinTTL: 300,
        },
      ],
    },
    // Without a certificate CloudFront serves its shared *.cloudfront.net
    // certificate, which does not cover the custom alias.
    ViewerCertificate: params.certificateArn
      ? {
          ACMCertificateArn: params.certificateArn,
          SSLSupportMethod: "sni-only",
          MinimumProtocolVersion: "TLSv1.3_2025",
        }
      : {
          CloudFrontDefaultCertificate: true,
        },
  };
}

export class DistributionService implements DistributionLocator {
  private readonly cloudfront: CloudfrontApi;
  private readonly locator: DistributionLocator;
  private readonly clock: Clock;
  private readonly waitTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly onTransition?: (transition: DistributionTransition) => void;

  constructor(options: DistributionServiceOptions) {
    this.cloudfront = options.cloudfront;
    this.locator = options.locator ?? new AliasScanLocator(options.cloudfront);
    this.clock = options.clock ?? systemClock;
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? defaultLogger;
    this.onTransition = options.onTransition;
  }

  async findByAlias(hostname: string): Promise<string | undefined> {
    return this.locator.findByAlias(hostname);
  }

  async describe(id: string): Promise<DistributionRecord> {
    return this.cloudfront.getDistribution(id);
  }

  /**
   * Returns the distribution aliased to `params.hostname`, creating it when
   * none exists.
   */
  async getOrCreate(
    params: Omit<CreateDistributionParams, "callerReference">
  ): Promise<DistributionRecord> {
    const existingId = await this.findByAlias(params.hostname);

    if (existingId) {
      this.logger.info("Using existing distribution", {
        distributionId: existingId,
        hostname: params.hostname,
      });
      return this.describe(existingId);
    }

    return this.create({
      ...params,
      callerReference: `${params.bucketName}-${toUnixSeconds(
        this.clock.now()
      )}`,
    });
  }

  async create(params: CreateDistributionParams): Promise<DistributionRecord> {
    this.logger.info("Creating distribution", { hostname: params.hostname });

    const distribution = await this.cloudfront.createDistribution(
      buildDistributionConfig(params)
    );

    this.transition(
      distribution.id,
      DistributionState.Absent,
      DistributionState.Creating
    );
    this.transition(
      distribution.id,
      DistributionState.Creating,
      DistributionState.Enabled
    );

    this.logger.info("Distribution created", {
      distributionId: distribution.id,
      domainName: distribution.domainName,
    });
    return distribution;
  }

  /**
   * Disables the distribution, waits until CloudFront reports the disabled
   * config as deployed, and deletes it with a freshly read ETag.
   */
  async teardown(id: string): Promise<void> {
    const snapshot = await this.cloudfront.getDistributionConfig(id);
    let state = snapshot.config.Enabled
      ? DistributionState.Enabled
      : DistributionState.Disabled;

    if (state === DistributionState.Enabled) {
      this.logger.info("Disabling distribution", { distributionId: id });
      state = this.transition(id, state, DistributionState.Disabling);

      await this.cloudfront.updateDistribution(
        id,
        { ...snapshot.config, Enabled: false },
        snapshot.eTag
      );

      await this.waitForDisabled(id);
      state = this.transition(id, state, DistributionState.Disabled);
    } else {
      const current = await this.cloudfront.getDistribution(id);
      if (current.status !== "Deployed") {
        // a previous run disabled it but did not see the change propagate
        await this.waitForDisabled(id);
      }
    }

    const fresh = await this.cloudfront.getDistributionConfig(id);
    if (fresh.config.Enabled) {
      throw new DistributionStateError(
        id,
        state,
        DistributionState.Deleting,
        `distribution ${id} reports enabled, refusing to delete`
      );
    }

    state = this.transition(id, state, DistributionState.Deleting);
    await this.cloudfront.deleteDistribution(id, fresh.eTag);
    this.transition(id, state, DistributionState.Absent);

    this.logger.info("Distribution deleted", { distributionId: id });
  }

  private async waitForDisabled(id: string): Promise<void> {
    const startedAt = this.clock.now();
    const deadline = startedAt + this.waitTimeoutMs;

    this.logger.info("Waiting for distribution to be disabled", {
      distributionId: id,
      timeoutMs: this.waitTimeoutMs,
    });

    for (;;) {
      const distribution = await this.cloudfront.getDistribution(id);

      if (distribution.status === "Deployed" && !distribution.enabled) {
        return;
      }

      if (this.clock.now() >= deadline) {
        throw new WaitTimeoutError(
          id,
          this.clock.now() - startedAt,
          distribution.status
        );
      }

      this.logger.debug("Distribution not yet disabled", {
        distributionId: id,
        status: distribution.status,
      });
      await this.clock.sleep(this.pollIntervalMs);
    }
  }

  private transition(
    distributionId: string,
    from: DistributionState,
    to: DistributionState
  ): DistributionState {
    if (!canTransition(from, to)) {
      throw new DistributionStateError(distributionId, from, to);
    }

    this.onTransition?.({ distributionId, from, to });
    return to;
  }
}
