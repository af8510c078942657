import { BucketService } from "../../../src/preview/services/bucket.service.js";
import { FakeS3 } from "../../fakes/fake-cloud.js";
import { silentLogger } from "../../fakes/silent-logger.js";

describe("BucketService", () => {
  let s3: FakeS3;
  let service: BucketService;

  beforeEach(() => {
    s3 = new FakeS3();
    service = new BucketService({ s3, logger: silentLogger });
  });

  describe("ensure", () => {
    it("creates a missing bucket in the requested region", async () => {
      await expect(service.ensure("pr-42-site", "eu-west-1")).resolves.toBe(true);
      expect(s3.buckets.get("pr-42-site")?.region).toBe("eu-west-1");
    });

    it("leaves an existing bucket alone", async () => {
      await service.ensure("pr-42-site", "us-east-1");
      await expect(service.ensure("pr-42-site", "us-east-1")).resolves.toBe(false);
      expect(s3.calls.filter((call) => call.startsWith("createBucket"))).toEqual([
        "createBucket pr-42-site",
      ]);
    });
  });

  describe("emptyAndDelete", () => {
    it("deletes every page of objects before the bucket", async () => {
      s3.pageSize = 2;
      await service.ensure("pr-42-site", "us-east-1");
      for (const key of ["a.html", "b.js", "c.css"]) {
        await s3.putObject("pr-42-site", key, new Uint8Array([1]), "text/plain");
      }

      await expect(service.emptyAndDelete("pr-42-site")).resolves.toEqual({
        deleted: true,
        objectCount: 3,
      });
      expect(s3.buckets.has("pr-42-site")).toBe(false);
      expect(s3.calls.filter((call) => call.startsWith("delete"))).toEqual([
        "deleteObjects 2",
        "deleteObjects 1",
        "deleteBucket pr-42-site",
      ]);
    });

    it("reports a bucket that is already gone", async () => {
      await expect(service.emptyAndDelete("pr-42-site")).resolves.toEqual({
        deleted: false,
        objectCount: 0,
      });
      expect(s3.calls).toEqual(["headBucket pr-42-site"]);
    });
  });
});
