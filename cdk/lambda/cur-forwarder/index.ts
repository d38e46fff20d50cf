// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Lambda entry point: forwards CUR files delivered by S3 notifications,
 * directly or through SNS, and keeps the Glue partitions on the latest
 * complete assembly.
 */

import { getGlueClient, getS3Client } from "./clients";
import { GlueCatalog } from "./glue-catalog";
import { createHandler } from "./handler";
import { logger } from "./logger";
import { S3ObjectStore } from "./s3-object-store";
import { loadSettings } from "./settings";

export const handler = createHandler({
  loadSettings: () => loadSettings(process.env),
  objectStore: () => new S3ObjectStore(getS3Client()),
  catalog: (region) => new GlueCatalog(getGlueClient(region)),
  logger,
});
