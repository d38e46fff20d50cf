// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import {
  CopyObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
} from "@aws-sdk/client-s3";
import { ReplicationError, describeError } from "./errors";
import type { ObjectRef, ObjectStore } from "./object-replicator";
import { toS3Uri } from "./object-replicator";

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === "NotFound" ||
      error.name === "NoSuchKey" ||
      error.$metadata.httpStatusCode === 404)
  );
}

/** CopySource must be URL-encoded; the separators between segments stay literal */
export function encodeCopySource(ref: ObjectRef): string {
  const key = ref.key.split("/").map(encodeURIComponent).join("/");
  return `${ref.bucket}/${key}`;
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async copyObject(source: ObjectRef, destination: ObjectRef): Promise<void> {
    try {
      await this.client.send(
        new CopyObjectCommand({
          CopySource: encodeCopySource(source),
          Bucket: destination.bucket,
          Key: destination.key,
          ACL: "bucket-owner-full-control",
        })
      );
    } catch (error) {
      throw new ReplicationError(
        `S3 copy failed for ${toS3Uri(source)}: ${describeError(error)}`,
        { source: toS3Uri(source), destination: toS3Uri(destination) }
      );
    }
  }

  async objectExists(ref: ObjectRef): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: ref.bucket, Key: ref.key })
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new ReplicationError(
        `S3 head failed for ${toS3Uri(ref)}: ${describeError(error)}`,
        { object: toS3Uri(ref) }
      );
    }
  }

  async listKeys(
    bucket: string,
    prefix: string,
    maxKeys: number
  ): Promise<string[]> {
    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          MaxKeys: maxKeys,
        })
      );
      return (response.Contents ?? []).flatMap((object) =>
        object.Key ? [object.Key] : []
      );
    } catch (error) {
      throw new ReplicationError(
        `S3 list failed for s3://${bucket}/${prefix}: ${describeError(error)}`,
        { bucket, prefix }
      );
    }
  }

  async *listAllKeys(bucket: string, prefix: string): AsyncIterable<string> {
    const pages = paginateListObjectsV2(
      { client: this.client },
      { Bucket: bucket, Prefix: prefix }
    );
    try {
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (object.Key) {
            yield object.Key;
          }
        }
      }
    } catch (error) {
      throw new ReplicationError(
        `S3 list failed for s3://${bucket}/${prefix}: ${describeError(error)}`,
        { bucket, prefix }
      );
    }
  }

  async readText(ref: ObjectRef): Promise<string> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key })
      );
      const body = await response.Body?.transformToString("utf-8");
      if (body === undefined) {
        throw new Error("response body was empty");
      }
      return body;
    } catch (error) {
      throw new ReplicationError(
        `S3 get failed for ${toS3Uri(ref)}: ${describeError(error)}`,
        { object: toS3Uri(ref) }
      );
    }
  }
}
