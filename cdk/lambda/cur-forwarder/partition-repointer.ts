// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import type { PartitionInput, StorageDescriptor } from "@aws-sdk/client-glue";
import { PartitionNotFoundError } from "./errors";

/**
 * Catalog operations behind partition repointing. GlueCatalog implements
 * them over the Glue API.
 */
export interface PartitionCatalog {
  getTableStorageDescriptor(
    database: string,
    tableName: string
  ): Promise<StorageDescriptor>;
  /** Rejects with PartitionNotFoundError when no partition has these values */
  updatePartition(
    database: string,
    tableName: string,
    values: string[],
    input: PartitionInput
  ): Promise<void>;
  createPartition(
    database: string,
    tableName: string,
    input: PartitionInput
  ): Promise<void>;
}

export interface RepointTarget {
  database: string;
  tableName: string;
  billingPeriod: string;
  /** s3:// URI of the assembly folder, with a trailing separator */
  location: string;
}

export type RepointOutcome = "updated" | "created";

/**
 * Point the billing-period partition at `location`, creating it when absent.
 *
 * Update-then-create is not atomic. Two concurrent repoints of the same
 * period race and the last write the catalog sees wins.
 */
export async function repointPartition(
  catalog: PartitionCatalog,
  target: RepointTarget,
  logger: Logger
): Promise<RepointOutcome> {
  const { database, tableName, billingPeriod, location } = target;

  const template = await catalog.getTableStorageDescriptor(database, tableName);
  const input: PartitionInput = {
    Values: [billingPeriod],
    StorageDescriptor: { ...template, Location: location },
  };

  try {
    await catalog.updatePartition(database, tableName, [billingPeriod], input);
    logger.info("Updated partition", { tableName, billingPeriod, location });
    return "updated";
  } catch (error) {
    if (!(error instanceof PartitionNotFoundError)) {
      throw error;
    }
  }

  await catalog.createPartition(database, tableName, input);
  logger.info("Created partition", { tableName, billingPeriod, location });
  return "created";
}
