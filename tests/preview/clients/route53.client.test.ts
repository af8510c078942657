import {
  ChangeResourceRecordSetsCommand,
  ListHostedZonesByNameCommand,
  ListResourceRecordSetsCommand,
  Route53Client as SdkRoute53Client,
} from "@aws-sdk/client-route-53";

import { Route53Client } from "../../../src/preview/clients/route53.client.js";

describe("Route53Client", () => {
  const client = new Route53Client({ region: "us-east-1" });
  let inputs: unknown[];

  beforeEach(() => {
    inputs = [];
    jest
      .spyOn(SdkRoute53Client.prototype, "send")
      .mockImplementation(async (command: unknown) => {
        if (command instanceof ListHostedZonesByNameCommand) {
          inputs.push(command.input);
          return {
            HostedZones: [
              { Id: "/hostedzone/Z1", Name: "example.test." },
              { Id: "/hostedzone/Z2", Name: "preview.example.testing." },
            ],
          };
        }
        if (command instanceof ListResourceRecordSetsCommand) {
          inputs.push(command.input);
          return {
            ResourceRecordSets: [
              {
                Name: "pr-42-site.example.test.",
                Type: "CNAME",
                TTL: 300,
                ResourceRecords: [{ Value: "edfdvbd1.cloudfront.net" }],
              },
            ],
          };
        }
        if (command instanceof ChangeResourceRecordSetsCommand) {
          inputs.push(command.input);
          return { ChangeInfo: { Id: "/change/C1", Status: "PENDING" } };
        }
        throw new Error("unexpected command");
      });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("lists hosted zones starting at a name", async () => {
    await expect(client.listHostedZonesByName("example.test")).resolves.toEqual([
      { id: "/hostedzone/Z1", name: "example.test." },
      { id: "/hostedzone/Z2", name: "preview.example.testing." },
    ]);
    expect(inputs).toEqual([{ DNSName: "example.test" }]);
  });

  it("lists record sets from a start point with a page limit", async () => {
    const records = await client.listResourceRecordSets(
      "Z1",
      "pr-42-site.example.test",
      "CNAME",
      1
    );

    expect(records).toHaveLength(1);
    expect(inputs).toEqual([
      {
        HostedZoneId: "Z1",
        StartRecordName: "pr-42-site.example.test",
        StartRecordType: "CNAME",
        MaxItems: 1,
      },
    ]);
  });

  it("submits a single change", async () => {
    const recordSet = {
      Name: "pr-42-site.example.test",
      Type: "CNAME" as const,
      TTL: 300,
      ResourceRecords: [{ Value: "edfdvbd1.cloudfront.net" }],
    };

    await client.changeResourceRecordSet("Z1", "UPSERT", recordSet);

    expect(inputs).toEqual([
      {
        HostedZoneId: "Z1",
        ChangeBatch: { Changes: [{ Action: "UPSERT", ResourceRecordSet: recordSet }] },
      },
    ]);
  });
});
