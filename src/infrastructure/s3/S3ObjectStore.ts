import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import fs from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { ObjectRef, ObjectStore } from "../../ports/ObjectStore";

/**
 * Bucket/key download with the SDK's default credential chain
 * (environment, shared profile, instance or task role).
 */
export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  static forRegion(region: string): S3ObjectStore {
    return new S3ObjectStore(new S3Client({ region }));
  }

  async downloadObject(ref: ObjectRef, destPath: string): Promise<void> {
    const res = await this.client.send(new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key }));
    const body = res.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`S3 object s3://${ref.bucket}/${ref.key} returned no readable body`);
    }
    await pipeline(body, fs.createWriteStream(destPath));
  }
}
