// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import { z } from "zod";
import { ManifestUnreadableError, describeError, serializeError } from "./errors";
import type { ObjectRef, ObjectStore } from "./object-replicator";
import { replicateObject, toS3Uri } from "./object-replicator";
import type { PrefixRule } from "./path-mapper";
import { toDestinationKey } from "./path-mapper";

/** Only `reportKeys` is read; the rest of the document is passed through */
export const manifestSchema = z
  .object({
    reportKeys: z.array(z.string()).default([]),
  })
  .passthrough();

export type ManifestDocument = z.infer<typeof manifestSchema>;

export interface ExpansionRequest {
  sourceBucket: string;
  manifestKey: string;
  destinationBucket: string;
  rule: PrefixRule;
}

export interface ExpansionFailure {
  sourceKey: string;
  destinationKey: string;
  error: string;
}

export interface ExpansionResult {
  /** Destination keys copied or already present, in manifest order */
  keys: string[];
  copied: string[];
  verified: string[];
  failures: ExpansionFailure[];
}

export interface ExpansionDeps {
  store: ObjectStore;
  logger: Logger;
}

export async function readManifest(
  store: ObjectStore,
  ref: ObjectRef
): Promise<ManifestDocument> {
  let text: string;
  try {
    text = await store.readText(ref);
  } catch (error) {
    throw new ManifestUnreadableError(
      `Manifest ${toS3Uri(ref)} could not be read: ${describeError(error)}`,
      { manifest: toS3Uri(ref) }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ManifestUnreadableError(
      `Manifest ${toS3Uri(ref)} is not valid JSON: ${describeError(error)}`,
      { manifest: toS3Uri(ref) }
    );
  }

  const result = manifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ManifestUnreadableError(
      `Manifest ${toS3Uri(ref)} has an unexpected shape`,
      { manifest: toS3Uri(ref), issues: result.error.issues }
    );
  }
  return result.data;
}

function emptyResult(): ExpansionResult {
  return { keys: [], copied: [], verified: [], failures: [] };
}

/**
 * Make every data file referenced by an assembly manifest present at the
 * destination. The manifest itself is never copied: a JSON file in the table
 * folder would be read as a data file by Athena.
 *
 * Never throws for a single file; unreadable manifests yield an empty result.
 */
export async function expandManifest(
  request: ExpansionRequest,
  { store, logger }: ExpansionDeps
): Promise<ExpansionResult> {
  const manifestRef = { bucket: request.sourceBucket, key: request.manifestKey };

  let manifest: ManifestDocument;
  try {
    manifest = await readManifest(store, manifestRef);
  } catch (error) {
    logger.warn("Skipping manifest expansion", {
      manifest: toS3Uri(manifestRef),
      error: serializeError(error),
    });
    return emptyResult();
  }

  if (manifest.reportKeys.length === 0) {
    logger.info("Manifest has no reportKeys", {
      manifest: toS3Uri(manifestRef),
    });
    return emptyResult();
  }

  logger.info("Expanding manifest", {
    manifest: toS3Uri(manifestRef),
    reportKeys: manifest.reportKeys.length,
  });

  const result = emptyResult();
  for (const sourceKey of manifest.reportKeys) {
    const source = { bucket: request.sourceBucket, key: sourceKey };
    const destination = {
      bucket: request.destinationBucket,
      key: toDestinationKey(sourceKey, request.rule),
    };

    let present = false;
    try {
      present = await store.objectExists(destination);
    } catch (error) {
      logger.warn("Existence check failed, copying anyway", {
        destination: toS3Uri(destination),
        error: serializeError(error),
      });
    }

    if (present) {
      logger.debug("Data file already at destination", {
        destination: toS3Uri(destination),
      });
      result.verified.push(destination.key);
      result.keys.push(destination.key);
      continue;
    }

    try {
      await replicateObject(store, source, destination, logger);
      result.copied.push(destination.key);
      result.keys.push(destination.key);
    } catch (error) {
      result.failures.push({
        sourceKey,
        destinationKey: destination.key,
        error: describeError(error),
      });
    }
  }

  logger.info("Manifest expansion finished", {
    manifest: toS3Uri(manifestRef),
    copied: result.copied.length,
    verified: result.verified.length,
    failed: result.failures.length,
    total: manifest.reportKeys.length,
  });
  return result;
}
