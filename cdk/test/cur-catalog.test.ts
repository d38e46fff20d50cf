// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { App, Stack } from "aws-cdk-lib";
import { Match, Template } from "aws-cdk-lib/assertions";
import { beforeAll, describe, expect, it } from "vitest";
import { CurCatalog } from "../lib/cur-catalog";
import { ResourceNaming } from "../lib/naming";

describe("CurCatalog", () => {
  let template: Template;

  beforeAll(() => {
    const app = new App();
    const stack = new Stack(app, "CatalogStack", {
      env: { account: "123456789012", region: "eu-west-1" },
    });
    new CurCatalog(stack, "Catalog", {
      bucketName: "central-cur",
      databaseName: "cur_database",
      tables: [
        { tableName: "cur_prod", prefix: "account-prod/" },
        { tableName: "cur_dev", prefix: "account-dev/" },
      ],
      columns: [
        { name: "line_item_usage_account_id", type: "string" },
        { name: "line_item_unblended_cost", type: "string" },
      ],
    });
    template = Template.fromStack(stack);
  });

  it("creates one database and one table per binding", () => {
    template.resourceCountIs("AWS::Glue::Database", 1);
    template.resourceCountIs("AWS::Glue::Table", 2);
    template.hasResourceProperties("AWS::Glue::Database", {
      CatalogId: "123456789012",
      DatabaseInput: { Name: "cur_database" },
    });
  });

  it("partitions each table by billing period over its prefix", () => {
    template.hasResourceProperties("AWS::Glue::Table", {
      DatabaseName: "cur_database",
      TableInput: {
        Name: "cur_dev",
        TableType: "EXTERNAL_TABLE",
        PartitionKeys: [{ Name: "billing_period", Type: "string" }],
        StorageDescriptor: Match.objectLike({
          Location: "s3://central-cur/account-dev/",
          SerdeInfo: Match.objectLike({
            SerializationLibrary: "org.apache.hadoop.hive.serde2.OpenCSVSerde",
          }),
        }),
      },
    });
  });

  it("skips the csv header row", () => {
    const tables = template.findResources("AWS::Glue::Table", {
      Properties: { TableInput: { Parameters: { "skip.header.line.count": "1" } } },
    });

    expect(Object.keys(tables)).toHaveLength(2);
  });

  it("creates tables after the database", () => {
    const tables = template.findResources("AWS::Glue::Table");

    for (const table of Object.values(tables)) {
      expect(table.DependsOn).toEqual([expect.stringMatching(/^CatalogCurDatabase/)]);
    }
  });
});

describe("ResourceNaming", () => {
  it("derives Glue-safe catalog names", () => {
    const stack = new Stack(new App(), "NamingStack");

    expect(new ResourceNaming(stack).catalogName("CUR-reports")).toBe("cur_fwd_cur_reports");
  });
});
