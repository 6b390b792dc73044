import { S3Client } from "@aws-sdk/client-s3";
import fs from "fs";
import os from "os";
import path from "path";
import { S3ObjectStore } from "../../src/infrastructure/s3/S3ObjectStore";
import { startServer, type TestServer } from "../helpers/testServer";

describe("S3ObjectStore", () => {
  let server: TestServer;
  let destDir: string;
  let requested: string[];

  beforeEach(async () => {
    requested = [];
    destDir = fs.mkdtempSync(path.join(os.tmpdir(), "s3-store-"));
    server = await startServer((req, res) => {
      requested.push(`${req.method ?? ""} ${req.url ?? ""}`);
      if (req.url?.startsWith("/archive/granules/file.h5")) {
        res.writeHead(200, { "content-type": "application/octet-stream", "content-length": "11" });
        res.end("object-data");
        return;
      }
      res.writeHead(404, { "content-type": "application/xml" });
      res.end("<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message></Error>");
    });
  });

  afterEach(async () => {
    await server.close();
    fs.rmSync(destDir, { recursive: true, force: true });
  });

  const storeFor = () =>
    new S3ObjectStore(
      new S3Client({
        region: "us-west-2",
        endpoint: server.baseUrl,
        forcePathStyle: true,
        maxAttempts: 1,
        credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" }
      })
    );

  it("streams the object body to the destination path", async () => {
    const dest = path.join(destDir, "file.h5");

    await storeFor().downloadObject({ bucket: "archive", key: "granules/file.h5" }, dest);

    expect(fs.readFileSync(dest, "utf8")).toBe("object-data");
    expect(requested[0]).toMatch(/^GET \/archive\/granules\/file\.h5/);
  });

  it("rejects when the object does not exist", async () => {
    await expect(
      storeFor().downloadObject({ bucket: "archive", key: "missing.h5" }, path.join(destDir, "missing.h5"))
    ).rejects.toMatchObject({ name: "NoSuchKey" });
  });
});
