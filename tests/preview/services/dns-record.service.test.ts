import { NotFoundError } from "../../../src/preview/errors/NotFoundError.js";
import {
  DnsRecordService,
  toFqdn,
} from "../../../src/preview/services/dns-record.service.js";
import { FakeRoute53 } from "../../fakes/fake-cloud.js";
import { silentLogger } from "../../fakes/silent-logger.js";

describe("toFqdn", () => {
  it("appends a single trailing dot", () => {
    expect(toFqdn("example.test")).toBe("example.test.");
    expect(toFqdn("example.test.")).toBe("example.test.");
  });
});

describe("DnsRecordService", () => {
  let route53: FakeRoute53;
  let service: DnsRecordService;

  beforeEach(() => {
    route53 = new FakeRoute53();
    service = new DnsRecordService({ route53, logger: silentLogger });
  });

  describe("resolveZone", () => {
    it("returns the bare id of the exactly matching zone", async () => {
      route53.addZone("Z1", "example.test.");
      route53.addZone("Z2", "preview.example.testing.");

      await expect(service.resolveZone("example.test")).resolves.toBe("Z1");
    });

    it("ignores zones that only sort after the domain", async () => {
      route53.addZone("Z2", "preview.example.testing.");

      const error = await service.resolveZone("example.test").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        resource: "hosted-zone",
        message: "no hosted zone found for domain: example.test",
      });
    });
  });

  describe("upsert", () => {
    it("writes a CNAME and replaces it on the next call", async () => {
      route53.addZone("Z1", "example.test.");

      await service.upsert("Z1", "pr-42-site.example.test", "edfdvbd1.cloudfront.net");
      await service.upsert("Z1", "pr-42-site.example.test", "edfdvbd9.cloudfront.net");

      expect(route53.zoneRecords("Z1")).toEqual([
        {
          Name: "pr-42-site.example.test.",
          Type: "CNAME",
          TTL: 300,
          ResourceRecords: [{ Value: "edfdvbd9.cloudfront.net" }],
        },
      ]);
      expect(route53.changes.map(({ action }) => action)).toEqual(["UPSERT", "UPSERT"]);
    });
  });

  describe("delete", () => {
    beforeEach(() => {
      route53.addZone("Z1", "example.test.");
    });

    it("deletes the live record verbatim", async () => {
      await service.upsert("Z1", "pr-42-site.example.test", "edfdvbd1.cloudfront.net");

      await expect(service.delete("Z1", "pr-42-site.example.test")).resolves.toBe(true);
      expect(route53.zoneRecords("Z1")).toEqual([]);
      expect(route53.changes[1]).toEqual({
        zoneId: "Z1",
        action: "DELETE",
        recordSet: {
          Name: "pr-42-site.example.test.",
          Type: "CNAME",
          TTL: 300,
          ResourceRecords: [{ Value: "edfdvbd1.cloudfront.net" }],
        },
      });
    });

    it("reads only the first record at the hostname", async () => {
      const list = jest.spyOn(route53, "listResourceRecordSets");
      await service.upsert("Z1", "pr-42-site.example.test", "edfdvbd1.cloudfront.net");
      await service.upsert("Z1", "pr-43-site.example.test", "edfdvbd2.cloudfront.net");

      await service.delete("Z1", "pr-42-site.example.test");

      expect(list).toHaveBeenCalledWith("Z1", "pr-42-site.example.test", "CNAME", 1);
      await expect(list.mock.results[0].value).resolves.toHaveLength(1);
      expect(route53.zoneRecords("Z1").map(({ Name }) => Name)).toEqual([
        "pr-43-site.example.test.",
      ]);
    });

    it("leaves the next record alone when the name differs", async () => {
      await service.upsert("Z1", "pr-43-site.example.test", "edfdvbd1.cloudfront.net");

      await expect(service.delete("Z1", "pr-42-site.example.test")).resolves.toBe(false);
      expect(route53.zoneRecords("Z1")).toHaveLength(1);
    });

    it("leaves a record of another type alone", async () => {
      await route53.changeResourceRecordSet("Z1", "CREATE", {
        Name: "pr-42-site.example.test",
        Type: "TXT",
        TTL: 300,
        ResourceRecords: [{ Value: '"owner=ci"' }],
      });

      await expect(service.delete("Z1", "pr-42-site.example.test")).resolves.toBe(false);
      expect(route53.changes.map(({ action }) => action)).toEqual(["CREATE"]);
    });
  });
});
