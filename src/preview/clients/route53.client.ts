import {
  Route53Client as Client,
  Route53ClientConfig,
  ChangeAction,
  ChangeResourceRecordSetsCommand,
  ListHostedZonesByNameCommand,
  ListResourceRecordSetsCommand,
  RRType,
  ResourceRecordSet,
} from "@aws-sdk/client-route-53";

export type HostedZoneRecord = Readonly<{
  id: string;
  name: string;
}>;

export interface Route53Api {
  listHostedZonesByName(dnsName: string): Promise<HostedZoneRecord[]>;
  listResourceRecordSets(
    hostedZoneId: string,
    startRecordName: string,
    startRecordType: RRType,
    maxItems?: number
  ): Promise<ResourceRecordSet[]>;
  changeResourceRecordSet(
    hostedZoneId: string,
    action: ChangeAction,
    recordSet: ResourceRecordSet
  ): Promise<void>;
}

export class Route53Client implements Route53Api {
  private readonly client: Client;

  constructor(options: Route53ClientConfig = {}) {
    this.client = new Client(options);
  }

  /**
   * Hosted zones in lexicographic order starting at `dnsName`. The first entry
   * is not necessarily the zone for `dnsName`.
   * @param dnsName
   * @returns
   */
  async listHostedZonesByName(dnsName: string): Promise<HostedZoneRecord[]> {
    const { HostedZones } = await this.client.send(
      new ListHostedZonesByNameCommand({ DNSName: dnsName })
    );

    return (HostedZones ?? []).map((zone) => ({
      id: zone.Id ?? "",
      name: zone.Name ?? "",
    }));
  }

  async listResourceRecordSets(
    hostedZoneId: string,
    startRecordName: string,
    startRecordType: RRType,
    maxItems?: number
  ): Promise<ResourceRecordSet[]> {
    const { ResourceRecordSets } = await this.client.send(
      new ListResourceRecordSetsCommand({
        HostedZoneId: hostedZoneId,
        StartRecordName: startRecordName,
        StartRecordType: startRecordType,
        MaxItems: maxItems,
      })
    );

    return ResourceRecordSets ?? [];
  }

  async changeResourceRecordSet(
    hostedZoneId: string,
    action: ChangeAction,
    recordSet: ResourceRecordSet
  ): Promise<void> {
    await this.client.send(
      new ChangeResourceRecordSetsCommand({
        HostedZoneId: hostedZoneId,
        ChangeBatch: {
          Changes: [{ Action: action, ResourceRecordSet: recordSet }],
        },
      })
    );
  }
}
