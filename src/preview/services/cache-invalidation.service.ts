import { Logger } from "@aws-lambda-powertools/logger";

import { CloudfrontApi } from "../clients/cloudfront.client.js";
import { Clock, systemClock } from "../utils/clock.utils.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export type CacheInvalidationServiceOptions = {
  cloudfront: CloudfrontApi;
  clock?: Clock;
  logger?: Logger;
};

export class CacheInvalidationService {
  private readonly cloudfront: CloudfrontApi;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CacheInvalidationServiceOptions) {
    this.cloudfront = options.cloudfront;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Submits an invalidation of `/*`. Returns once CloudFront accepts the
   * request; propagation is not awaited.
   * @returns the invalidation id
   */
  async invalidateAll(distributionId: string): Promise<string> {
    const invalidationId = await this.cloudfront.createInvalidation(
      distributionId,
      ["/*"],
      `invalidation-${this.clock.now()}`
    );

    this.logger.info("Cache invalidation created", {
      distributionId,
      invalidationId,
    });
    return invalidationId;
  }
}
