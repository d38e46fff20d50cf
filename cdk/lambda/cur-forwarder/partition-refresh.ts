// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import { isAssemblyComplete } from "./completeness-gate";
import { extractBillingPeriodAndAssembly } from "./key-classifier";
import type { ObjectStore } from "./object-replicator";
import type { PartitionCatalog, RepointOutcome } from "./partition-repointer";
import { repointPartition } from "./partition-repointer";
import type { CatalogSettings } from "./settings";
import type { TableBinding } from "./table-binding";
import { resolveTableName } from "./table-binding";

export type SkipReason =
  | "no-table-binding"
  | "no-billing-period"
  | "assembly-incomplete";

export type PartitionRefresh =
  | { status: "skipped"; reason: SkipReason }
  | {
      status: RepointOutcome;
      tableName: string;
      billingPeriod: string;
      location: string;
    };

export interface PartitionRefreshRequest {
  bucket: string;
  /** Any destination key inside the assembly folder */
  key: string;
  catalog: CatalogSettings;
  tableBindings: readonly TableBinding[];
}

export interface PartitionRefreshDeps {
  store: ObjectStore;
  catalog: PartitionCatalog;
  logger: Logger;
}

/**
 * Repoint the billing-period partition owning `key` at its assembly folder,
 * provided the folder already holds data at the destination. Otherwise the
 * current pointer stays as it is.
 */
export async function refreshPartition(
  request: PartitionRefreshRequest,
  { store, catalog, logger }: PartitionRefreshDeps
): Promise<PartitionRefresh> {
  const tableName = resolveTableName(request.key, request.tableBindings);
  if (!tableName) {
    logger.info("No table mapping for key, skipping partition update", {
      key: request.key,
    });
    return { status: "skipped", reason: "no-table-binding" };
  }

  const assembly = extractBillingPeriodAndAssembly(request.key);
  if (!assembly) {
    logger.warn("Could not parse billing period from key", {
      key: request.key,
    });
    return { status: "skipped", reason: "no-billing-period" };
  }

  const complete = await isAssemblyComplete(
    store,
    request.bucket,
    assembly.folder,
    logger
  );
  if (!complete) {
    logger.info("No data files in assembly folder yet, skipping partition update", {
      bucket: request.bucket,
      folder: assembly.folder,
    });
    return { status: "skipped", reason: "assembly-incomplete" };
  }

  const location = `s3://${request.bucket}/${assembly.folder}/`;
  const status = await repointPartition(
    catalog,
    {
      database: request.catalog.database,
      tableName,
      billingPeriod: assembly.billingPeriod,
      location,
    },
    logger
  );
  return { status, tableName, billingPeriod: assembly.billingPeriod, location };
}
