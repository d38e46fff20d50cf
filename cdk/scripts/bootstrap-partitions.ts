#!/usr/bin/env node
// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Bootstrap Glue partitions for CUR data that was delivered before the
 * forwarder was deployed.
 *
 * Usage:
 *   AWS_PROFILE=reports npm run bootstrap-partitions -- \
 *     --bucket my-cur-reports --database cur_database --region eu-west-1 \
 *     --table account-prod/=account_prod --table account-dev/=account_dev
 */

import { Command, InvalidArgumentError } from "commander";
import { GlueClient } from "@aws-sdk/client-glue";
import { S3Client } from "@aws-sdk/client-s3";
import { runBackfill } from "../lambda/cur-forwarder/backfill";
import { serializeError } from "../lambda/cur-forwarder/errors";
import { GlueCatalog } from "../lambda/cur-forwarder/glue-catalog";
import { logger } from "../lambda/cur-forwarder/logger";
import { S3ObjectStore } from "../lambda/cur-forwarder/s3-object-store";
import { DEFAULT_GLUE_REGION } from "../lambda/cur-forwarder/settings";
import type { TableBinding } from "../lambda/cur-forwarder/table-binding";

function collectBinding(value: string, previous: TableBinding[]): TableBinding[] {
  const separator = value.lastIndexOf("=");
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError("expected <prefix>=<table>");
  }
  return [
    ...previous,
    { prefix: value.slice(0, separator), tableName: value.slice(separator + 1) },
  ];
}

interface CliOptions {
  bucket: string;
  database: string;
  region: string;
  table: TableBinding[];
  dryRun: boolean;
}

const program = new Command()
  .name("bootstrap-partitions")
  .description("Point Glue partitions at the latest complete CUR assembly per billing period")
  .requiredOption("--bucket <name>", "bucket holding the forwarded reports")
  .requiredOption("--database <name>", "Glue database")
  .option("--region <region>", "region of the Glue catalog and bucket", DEFAULT_GLUE_REGION)
  .option("--table <prefix=table>", "key prefix owned by a table, repeatable", collectBinding, [])
  .option("--dry-run", "report the partitions without writing them", false);

async function main(): Promise<void> {
  program.parse();
  const options = program.opts<CliOptions>();
  if (options.table.length === 0) {
    program.error("at least one --table <prefix=table> is required");
  }

  const entries = await runBackfill(
    {
      bucket: options.bucket,
      database: options.database,
      tableBindings: options.table,
      dryRun: options.dryRun,
    },
    {
      store: new S3ObjectStore(new S3Client({ region: options.region })),
      catalog: new GlueCatalog(new GlueClient({ region: options.region })),
      logger,
    }
  );

  for (const entry of entries) {
    logger.info(`${entry.tableName} ${entry.billingPeriod}: ${entry.outcome} -> ${entry.label}`, {
      location: entry.location,
    });
  }
  if (entries.some((entry) => entry.outcome === "failed")) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error("Backfill failed", { error: serializeError(error) });
  process.exitCode = 1;
});
