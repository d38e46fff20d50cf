// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import "source-map-support/register";
import * as fs from "fs";
import * as path from "path";
import * as cdk from "aws-cdk-lib";
import type { CfnTable } from "aws-cdk-lib/aws-glue";
import { Config } from "../lib/config";
import type { CurTableProps } from "../lib/cur-catalog";
import type { CurSourceProps } from "../lib/cur-forwarder";
import { CurForwarderStack } from "../lib/cur-forwarder-stack";

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION ?? Config.DEFAULT_GLUE_REGION,
};

const app = new cdk.App();

const columns: CfnTable.ColumnProperty[] = JSON.parse(
  fs.readFileSync(path.join(__dirname, "../config/cur-columns.json"), "utf-8")
);

new CurForwarderStack(app, "CurForwarderStack", {
  env,
  destinationBucketName: Config.getContextValue<string | undefined>(app, "destinationBucketName", undefined),
  databaseName: Config.getNameOrDisabled(app, "databaseName", Config.DEFAULT_DATABASE_NAME),
  sources: Config.getRequiredContextValue<CurSourceProps[]>(app, "sources"),
  tables: Config.getContextValue<CurTableProps[]>(app, "tables", []),
  columns,
  alarmTopicArn: Config.getContextValue<string | undefined>(app, "alarmTopicArn", undefined),
});
