import { Logger } from "@aws-lambda-powertools/logger";

import { Route53Api } from "../clients/route53.client.js";
import { NotFoundError } from "../errors/NotFoundError.js";
import { logger as defaultLogger } from "../utils/logger.utils.js";

export const CNAME_TTL_SECONDS = 300;

export type DnsRecordServiceOptions = {
  route53: Route53Api;
  logger?: Logger;
};

/** Route 53 returns fully qualified names with a trailing dot. */
export function toFqdn(name: string): string {
  return name.endsWith(".") ? name : `${name}.`;
}

export class DnsRecordService {
  private readonly route53: Route53Api;
  private readonly logger: Logger;

  constructor(options: DnsRecordServiceOptions) {
    this.route53 = options.route53;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Finds the hosted zone named exactly `baseDomain`.
   * @returns the bare zone id, without the `/hostedzone/` prefix
   */
  async resolveZone(baseDomain: string): Promise<string> {
    const zones = await this.route53.listHostedZonesByName(baseDomain);
    const zone = zones.find((candidate) => candidate.name === toFqdn(baseDomain));

    if (!zone) {
      throw new NotFoundError(
        "hosted-zone",
        `no hosted zone found for domain: ${baseDomain}`
      );
    }

    return zone.id.split("/").pop() ?? zone.id;
  }

  async upsert(zoneId: string, hostname: string, target: string): Promise<void> {
    await this.route53.changeResourceRecordSet(zoneId, "UPSERT", {
      Name: hostname,
      Type: "CNAME",
      TTL: CNAME_TTL_SECONDS,
      ResourceRecords: [{ Value: target }],
    });

    this.logger.info("DNS record updated", { hostname, target });
  }

  /**
   * Deletes the CNAME for `hostname`. Route 53 only accepts a delete that
   * matches the live record exactly, so the record is read first and
   * submitted verbatim.
   * @returns true when a delete was submitted
   */
  async delete(zoneId: string, hostname: string): Promise<boolean> {
    const [record] = await this.route53.listResourceRecordSets(
      zoneId,
      hostname,
      "CNAME",
      1
    );

    if (!record || record.Name !== toFqdn(hostname) || record.Type !== "CNAME") {
      this.logger.info("No DNS record found", { hostname });
      return false;
    }

    await this.route53.changeResourceRecordSet(zoneId, "DELETE", record);
    this.logger.info("DNS record deleted", { hostname });
    return true;
  }
}
