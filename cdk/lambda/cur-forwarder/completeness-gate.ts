// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import { DATA_FILE_SUFFIX } from "./key-classifier";
import type { ObjectStore } from "./object-replicator";

/** One data file is enough evidence, so the listing stays small */
export const GATE_LISTING_LIMIT = 20;

/**
 * Whether an assembly folder at the destination holds at least one data file.
 *
 * A manifest can land before its data files finish replicating; pointing the
 * partition at such a folder makes the billing period return zero rows. Call
 * this right before repointing, never reuse an earlier answer.
 */
export async function isAssemblyComplete(
  store: ObjectStore,
  bucket: string,
  folder: string,
  logger?: Logger
): Promise<boolean> {
  const prefix = folder.endsWith("/") ? folder : `${folder}/`;
  const keys = await store.listKeys(bucket, prefix, GATE_LISTING_LIMIT);
  const dataFiles = keys.filter((key) => key.endsWith(DATA_FILE_SUFFIX));

  logger?.debug("Listed assembly folder", {
    bucket,
    prefix,
    listed: keys.length,
    dataFiles: dataFiles.length,
  });
  return dataFiles.length > 0;
}
