// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { StorageDescriptor } from "@aws-sdk/client-glue";
import { beforeEach, describe, expect, it } from "vitest";
import { PartitionUpdateError } from "../lambda/cur-forwarder/errors";
import { repointPartition } from "../lambda/cur-forwarder/partition-repointer";
import { InMemoryCatalog, silentLogger } from "./support/in-memory";

const TABLE_DESCRIPTOR: StorageDescriptor = {
  Columns: [
    { Name: "line_item_usage_account_id", Type: "string" },
    { Name: "line_item_unblended_cost", Type: "string" },
  ],
  Location: "s3://central-cur/account-prod/",
  InputFormat: "org.apache.hadoop.mapred.TextInputFormat",
  OutputFormat: "org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat",
  SerdeInfo: {
    SerializationLibrary: "org.apache.hadoop.hive.serde2.OpenCSVSerde",
  },
};

const target = {
  database: "cur_database",
  tableName: "cur_prod",
  billingPeriod: "20240101-20240201",
  location: "s3://central-cur/account-prod/20240101-20240201/20240115T120000Z/",
};

describe("repointPartition", () => {
  const logger = silentLogger();
  let catalog: InMemoryCatalog;

  beforeEach(() => {
    catalog = new InMemoryCatalog().addTable("cur_database", "cur_prod", TABLE_DESCRIPTOR);
  });

  it("creates the partition when it does not exist", async () => {
    const outcome = await repointPartition(catalog, target, logger);

    expect(outcome).toBe("created");
    expect(catalog.operations).toEqual([
      "getTable cur_prod",
      "update cur_prod/20240101-20240201",
      "create cur_prod/20240101-20240201",
    ]);
    expect(catalog.partition("cur_database", "cur_prod", "20240101-20240201")).toEqual({
      Values: ["20240101-20240201"],
      StorageDescriptor: { ...TABLE_DESCRIPTOR, Location: target.location },
    });
  });

  it("updates an existing partition to the new location", async () => {
    await repointPartition(
      catalog,
      { ...target, location: "s3://central-cur/account-prod/20240101-20240201/20240110T000000Z/" },
      logger
    );

    const outcome = await repointPartition(catalog, target, logger);

    expect(outcome).toBe("updated");
    expect(
      catalog.partition("cur_database", "cur_prod", "20240101-20240201")?.StorageDescriptor?.Location
    ).toBe(target.location);
  });

  it("copies the table descriptor without changing it", async () => {
    await repointPartition(catalog, target, logger);

    const stored = catalog.partition("cur_database", "cur_prod", "20240101-20240201");
    expect(stored?.StorageDescriptor?.Columns).toEqual(TABLE_DESCRIPTOR.Columns);
    expect(stored?.StorageDescriptor?.SerdeInfo).toEqual(TABLE_DESCRIPTOR.SerdeInfo);
    expect(catalog.table("cur_database", "cur_prod")?.Location).toBe("s3://central-cur/account-prod/");
  });

  it("propagates update failures other than a missing partition", async () => {
    catalog.updateError = new PartitionUpdateError("AccessDeniedException: not authorized");

    await expect(repointPartition(catalog, target, logger)).rejects.toThrow(
      "AccessDeniedException: not authorized"
    );
    expect(catalog.partition("cur_database", "cur_prod", "20240101-20240201")).toBeUndefined();
  });

  it("fails when the table does not exist", async () => {
    await expect(
      repointPartition(catalog, { ...target, tableName: "cur_missing" }, logger)
    ).rejects.toBeInstanceOf(PartitionUpdateError);
  });
});
