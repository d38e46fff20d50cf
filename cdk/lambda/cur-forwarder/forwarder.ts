// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import { describeError, serializeError } from "./errors";
import { classifyKey } from "./key-classifier";
import { expandManifest } from "./manifest-expander";
import type { ObjectRef, ObjectStore } from "./object-replicator";
import { replicateObject, toS3Uri } from "./object-replicator";
import type { PartitionRefresh } from "./partition-refresh";
import { refreshPartition } from "./partition-refresh";
import type { PartitionCatalog } from "./partition-repointer";
import { PASSTHROUGH_RULE, mapKey } from "./path-mapper";
import type { ForwarderSettings } from "./settings";

export interface ForwarderDeps {
  store: ObjectStore;
  /** Required when settings.catalog is set */
  catalog?: PartitionCatalog;
  logger: Logger;
}

export type PartitionOutcome =
  | PartitionRefresh
  | { status: "failed"; error: string };

export interface ForwardResult {
  source: string;
  destination: string;
  /** Data files copied or verified, reported for assembly manifests only */
  copiedDataFiles?: number;
  partition?: PartitionOutcome;
}

/**
 * Forward one stored object to the destination bucket and, for assembly
 * artifacts, refresh the billing-period partition.
 *
 * Throws only when the object's own copy fails. Manifest and partition
 * problems are logged and reflected in the result.
 */
export async function forwardObject(
  source: ObjectRef,
  settings: ForwarderSettings,
  deps: ForwarderDeps
): Promise<ForwardResult> {
  const { store, logger } = deps;
  logger.info("Processing file", { source: toS3Uri(source) });

  let rule = settings.prefixRules[source.bucket];
  if (!rule) {
    logger.warn("No prefix mapping found for bucket, using defaults", {
      bucket: source.bucket,
    });
    rule = PASSTHROUGH_RULE;
  }

  const mapped = mapKey(source.key, rule);
  if (!mapped.prefixMatched) {
    logger.warn("Key does not start with the configured source prefix", {
      key: source.key,
      sourcePrefix: rule.sourcePrefix,
    });
  }

  const destination = {
    bucket: settings.destinationBucket,
    key: mapped.destinationKey,
  };
  const kind = classifyKey(destination.key);
  const result: ForwardResult = {
    source: toS3Uri(source),
    destination: toS3Uri(destination),
  };

  if (kind === "assembly-manifest") {
    logger.info("Assembly manifest detected, copying data files only", {
      manifest: destination.key,
    });
    const expansion = await expandManifest(
      {
        sourceBucket: source.bucket,
        manifestKey: source.key,
        destinationBucket: settings.destinationBucket,
        rule,
      },
      { store, logger }
    );
    result.copiedDataFiles = expansion.keys.length;
  } else {
    await replicateObject(store, source, destination, logger);
  }

  if (settings.catalog && deps.catalog && kind !== "plain") {
    try {
      result.partition = await refreshPartition(
        {
          bucket: settings.destinationBucket,
          key: destination.key,
          catalog: settings.catalog,
          tableBindings: settings.tableBindings,
        },
        { store, catalog: deps.catalog, logger }
      );
    } catch (error) {
      logger.error("Failed to update Athena partition", {
        key: destination.key,
        error: serializeError(error),
      });
      result.partition = { status: "failed", error: describeError(error) };
    }
  }

  return result;
}
