// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import { ReplicationError, describeError, serializeError } from "./errors";

export interface ObjectRef {
  bucket: string;
  key: string;
}

/**
 * Storage operations the forwarder needs. Implemented over S3 by
 * S3ObjectStore; tests substitute an in-memory store.
 */
export interface ObjectStore {
  /** Server-side copy granting the destination bucket owner full control */
  copyObject(source: ObjectRef, destination: ObjectRef): Promise<void>;
  objectExists(ref: ObjectRef): Promise<boolean>;
  /** At most `maxKeys` keys under the prefix, in key order */
  listKeys(bucket: string, prefix: string, maxKeys: number): Promise<string[]>;
  listAllKeys(bucket: string, prefix: string): AsyncIterable<string>;
  readText(ref: ObjectRef): Promise<string>;
}

export function toS3Uri(ref: ObjectRef): string {
  return `s3://${ref.bucket}/${ref.key}`;
}

/**
 * Copy one object. Repeated calls overwrite; callers that need
 * copy-if-absent check with `objectExists` first. No retries.
 */
export async function replicateObject(
  store: ObjectStore,
  source: ObjectRef,
  destination: ObjectRef,
  logger: Logger
): Promise<void> {
  try {
    await store.copyObject(source, destination);
  } catch (error) {
    logger.error("Failed to copy object", {
      source: toS3Uri(source),
      destination: toS3Uri(destination),
      error: serializeError(error),
    });
    if (error instanceof ReplicationError) {
      throw error;
    }
    throw new ReplicationError(
      `Copy ${toS3Uri(source)} -> ${toS3Uri(destination)} failed: ${describeError(error)}`,
      { source: toS3Uri(source), destination: toS3Uri(destination) }
    );
  }
  logger.info("Copied object", {
    source: toS3Uri(source),
    destination: toS3Uri(destination),
  });
}
