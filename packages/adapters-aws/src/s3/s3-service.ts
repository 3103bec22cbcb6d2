/**
 * S3 storage for deployment artifacts.
 */

import fs from "fs-extra";
import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommand,
  BucketLocationConstraint,
} from "@aws-sdk/client-s3";
import type { IObjectStorageService } from "@ebshield/adapters-common";
import { callAws, findAws } from "../errors";

// us-east-1 rejects an explicit LocationConstraint
const DEFAULT_REGION = "us-east-1";

export class S3StorageService implements IObjectStorageService {
  constructor(private readonly client: S3Client) {}

  async bucketExists(bucket: string): Promise<boolean> {
    const result = await findAws("HeadBucket", async () => {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    });
    return result === true;
  }

  async createBucket(bucket: string, region: string): Promise<void> {
    await callAws("CreateBucket", () => {
      const location = toLocationConstraint(region);
      if (region !== DEFAULT_REGION && !location) {
        throw new Error(`Unsupported bucket region "${region}"`);
      }
      return this.client.send(
        new CreateBucketCommand({
          Bucket: bucket,
          CreateBucketConfiguration: location ? { LocationConstraint: location } : undefined,
        })
      );
    });
  }

  async uploadFile(bucket: string, key: string, filePath: string): Promise<void> {
    const body = await fs.readFile(filePath);
    await callAws("PutObject", () =>
      this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }))
    );
  }
}

function toLocationConstraint(region: string): BucketLocationConstraint | undefined {
  if (region === DEFAULT_REGION) {
    return undefined;
  }
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}
