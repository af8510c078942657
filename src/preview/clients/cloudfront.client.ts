import {
  CloudFrontClient as Client,
  CloudFrontClientConfig,
  CreateDistributionCommand,
  CreateInvalidationCommand,
  CreateOriginAccessControlCommand,
  DeleteDistributionCommand,
  Distribution,
  DistributionConfig,
  DistributionSummary,
  GetDistributionCommand,
  GetDistributionConfigCommand,
  ListDistributionsCommand,
  ListOriginAccessControlsCommand,
  OriginAccessControlConfig,
  UpdateDistributionCommand,
} from "@aws-sdk/client-cloudfront";

import { requireValue } from "../utils/aws.utils.js";

export type OriginAccessControlRecord = Readonly<{
  id: string;
  name: string;
}>;

export type DistributionRecord = Readonly<{
  id: string;
  arn: string;
  domainName: string;
  status: string;
  enabled: boolean;
  aliases: string[];
}>;

export type DistributionConfigSnapshot = Readonly<{
  config: DistributionConfig;
  eTag: string;
}>;

export interface CloudfrontApi {
  listOriginAccessControls(): Promise<OriginAccessControlRecord[]>;
  createOriginAccessControl(
    config: OriginAccessControlConfig
  ): Promise<OriginAccessControlRecord>;
  listDistributions(): Promise<DistributionRecord[]>;
  getDistribution(id: string): Promise<DistributionRecord>;
  getDistributionConfig(id: string): Promise<DistributionConfigSnapshot>;
  createDistribution(config: DistributionConfig): Promise<DistributionRecord>;
  updateDistribution(
    id: string,
    config: DistributionConfig,
    ifMatch: string
  ): Promise<string>;
  deleteDistribution(id: string, ifMatch: string): Promise<void>;
  createInvalidation(
    distributionId: string,
    paths: string[],
    callerReference: string
  ): Promise<string>;
}

export class CloudfrontClient implements CloudfrontApi {
  private readonly client: Client;

  constructor(options: CloudFrontClientConfig = {}) {
    this.client = new Client(options);
  }

  /**
   * Lists every origin access control in the account. CloudFront offers no
   * filter by name, so callers scan the full result.
   * @returns
   */
  async listOriginAccessControls(): Promise<OriginAccessControlRecord[]> {
    const records: OriginAccessControlRecord[] = [];
    let marker: string | undefined;

    do {
      const { OriginAccessControlList } = await this.client.send(
        new ListOriginAccessControlsCommand({ Marker: marker })
      );

      for (const item of OriginAccessControlList?.Items ?? []) {
        records.push({ id: item.Id ?? "", name: item.Name ?? "" });
      }

      marker = OriginAccessControlList?.IsTruncated
        ? OriginAccessControlList.NextMarker
        : undefined;
    } while (marker);

    return records;
  }

  async createOriginAccessControl(
    config: OriginAccessControlConfig
  ): Promise<OriginAccessControlRecord> {
    const { OriginAccessControl } = await this.client.send(
      new CreateOriginAccessControlCommand({
        OriginAccessControlConfig: config,
      })
    );

    return {
      id: requireValue(OriginAccessControl?.Id, "OriginAccessControl.Id"),
      name: config.Name ?? "",
    };
  }

  /**
   * Lists every distribution in the account, following pagination markers.
   * @returns
   */
  async listDistributions(): Promise<DistributionRecord[]> {
    const records: DistributionRecord[] = [];
    let marker: string | undefined;

    do {
      const { DistributionList } = await this.client.send(
        new ListDistributionsCommand({ Marker: marker })
      );

      for (const summary of DistributionList?.Items ?? []) {
        records.push(fromSummary(summary));
      }

      marker = DistributionList?.IsTruncated
        ? DistributionList.NextMarker
        : undefined;
    } while (marker);

    return records;
  }

  async getDistribution(id: string): Promise<DistributionRecord> {
    const { Distribution } = await this.client.send(
      new GetDistributionCommand({ Id: id })
    );

    return fromDistribution(requireValue(Distribution, "Distribution"));
  }

  async getDistributionConfig(id: string): Promise<DistributionConfigSnapshot> {
    const { DistributionConfig, ETag } = await this.client.send(
      new GetDistributionConfigCommand({ Id: id })
    );

    return {
      config: requireValue(DistributionConfig, "DistributionConfig"),
      eTag: requireValue(ETag, "ETag"),
    };
  }

  async createDistribution(
    config: DistributionConfig
  ): Promise<DistributionRecord> {
    const { Distribution } = await this.client.send(
      new CreateDistributionCommand({ DistributionConfig: config })
    );

    return fromDistribution(requireValue(Distribution, "Distribution"));
  }

  /**
   * Submits a new config. `ifMatch` must be the ETag of the latest read;
   * CloudFront rejects stale tokens with PreconditionFailed.
   * @returns the new ETag
   */
  async updateDistribution(
    id: string,
    config: DistributionConfig,
    ifMatch: string
  ): Promise<string> {
    const { ETag } = await this.client.send(
      new UpdateDistributionCommand({
        Id: id,
        DistributionConfig: config,
        IfMatch: ifMatch,
      })
    );

    return requireValue(ETag, "ETag");
  }

  async deleteDistribution(id: string, ifMatch: string): Promise<void> {
    await this.client.send(
      new DeleteDistributionCommand({ Id: id, IfMatch: ifMatch })
    );
  }

  async createInvalidation(
    distributionId: string,
    paths: string[],
    callerReference: string
  ): Promise<string> {
    const { Invalidation } = await this.client.send(
      new CreateInvalidationCommand({
        DistributionId: distributionId,
        InvalidationBatch: {
          CallerReference: callerReference,
          Paths: {
            Quantity: paths.length,
            Items: paths,
          },
        },
      })
    );

    return requireValue(Invalidation?.Id, "Invalidation.Id");
  }
}

function fromSummary(summary: DistributionSummary): DistributionRecord {
  return {
    id: requireValue(summary.Id, "DistributionSummary.Id"),
    arn: summary.ARN ?? "",
    domainName: summary.DomainName ?? "",
    status: summary.Status ?? "",
    enabled: summary.Enabled ?? false,
    aliases: summary.Aliases?.Items ?? [],
  };
}

function fromDistribution(distribution: Distribution): DistributionRecord {
  return {
    id: requireValue(distribution.Id, "Distribution.Id"),
    arn: requireValue(distribution.ARN, "Distribution.ARN"),
    domainName: requireValue(distribution.DomainName, "Distribution.DomainName"),
    status: distribution.Status ?? "",
    enabled: distribution.DistributionConfig?.Enabled ?? false,
    aliases: distribution.DistributionConfig?.Aliases?.Items ?? [],
  };
}
