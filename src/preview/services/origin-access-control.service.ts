import { Logger } from "@aws-lambda-powertools/logger";
import { OriginAccessControlConfig } from "@aws-sdk/client-cloudfront";

import { CloudfrontApi } from "../clients/cloudfront.client.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export type OriginAccessControlServiceOptions = {
  cloudfront: CloudfrontApi;
  logger?: Logger;
};

export function buildOriginAccessControlConfig(
  name: string,
  description: string
): OriginAccessControlConfig {
  return {
    Name: name,
    Description: description,
    SigningProtocol: "sigv4",
    SigningBehavior: "always",
    OriginAccessControlOriginType: "s3",
  };
}

export class OriginAccessControlService {
  private readonly cloudfront: CloudfrontApi;
  private readonly logger: Logger;

  constructor(options: OriginAccessControlServiceOptions) {
    this.cloudfront = options.cloudfront;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Returns the id of the origin access control called `name`, creating it if
   * no exact (case-sensitive) match exists. An existing entry is never updated.
   */
  async getOrCreate(name: string, description: string): Promise<string> {
    const existing = (await this.cloudfront.listOriginAccessControls()).find(
      (oac) => oac.name === name
    );

    if (existing) {
      this.logger.info("Using existing origin access control", {
        name,
        id: existing.id,
      });
      return existing.id;
    }

    const created = await this.cloudfront.createOriginAccessControl(
      buildOriginAccessControlConfig(name, description)
    );

    this.logger.info("Origin access control created", { name, id: created.id });
    return created.id;
  }
}
