import { CloudfrontApi } from "../clients/cloudfront.client.js";

/**
 * Finds the distribution serving a hostname. Kept behind an interface so the
 * full-account scan can later be swapped for a tagged or indexed lookup.
 */
export interface DistributionLocator {
  findByAlias(hostname: string): Promise<string | undefined>;
}

export class AliasScanLocator implements DistributionLocator {
  constructor(private readonly cloudfront: CloudfrontApi) {}

  async findByAlias(hostname: string): Promise<string | undefined> {
    const distributions = await this.cloudfront.listDistributions();
    return distributions.find((distribution) =>
      distribution.aliases.includes(hostname)
    )?.id;
  }
}
