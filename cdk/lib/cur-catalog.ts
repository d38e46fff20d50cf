// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import * as cdk from "aws-cdk-lib";
import * as glue from "aws-cdk-lib/aws-glue";
import { Construct } from "constructs";
import { Config } from "./config";

export interface CurTableProps {
  /** Glue table name */
  tableName: string;
  /** Destination key prefix holding this table's reports, e.g. "account-prod/" */
  prefix: string;
}

export interface CurCatalogProps {
  bucketName: string;
  databaseName: string;
  tables: CurTableProps[];
  columns: glue.CfnTable.ColumnProperty[];
}

/**
 * Glue database with one CSV table per forwarded account. Each table is
 * partitioned by billing period; the forwarder points every partition at
 * the latest complete assembly folder.
 */
export class CurCatalog extends Construct {
  public readonly databaseName: string;
  public readonly database: glue.CfnDatabase;
  public readonly tables: glue.CfnTable[];

  public constructor(scope: Construct, id: string, props: CurCatalogProps) {
    super(scope, id);

    const stack = cdk.Stack.of(this);
    const accountId = stack.account;
    this.databaseName = props.databaseName;

    this.database = new glue.CfnDatabase(this, "CurDatabase", {
      catalogId: accountId,
      databaseInput: {
        name: props.databaseName,
        description: "Forwarded cost and usage reports",
      },
    });

    this.tables = props.tables.map((table) => {
      const cfnTable = new glue.CfnTable(this, `CurTable-${table.tableName}`, {
        catalogId: accountId,
        databaseName: props.databaseName,
        tableInput: {
          name: table.tableName,
          tableType: "EXTERNAL_TABLE",
          parameters: {
            classification: "csv",
            compressionType: "gzip",
            "skip.header.line.count": "1",
          },
          partitionKeys: [{ name: Config.PARTITION_KEY, type: "string" }],
          storageDescriptor: {
            columns: props.columns,
            location: `s3://${props.bucketName}/${table.prefix}`,
            inputFormat: "org.apache.hadoop.mapred.TextInputFormat",
            outputFormat:
              "org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat",
            serdeInfo: {
              serializationLibrary: "org.apache.hadoop.hive.serde2.OpenCSVSerde",
              parameters: {
                separatorChar: ",",
                quoteChar: '"',
                escapeChar: "\\",
              },
            },
          },
        },
      });
      cfnTable.addDependency(this.database);
      return cfnTable;
    });
  }

  public get databaseArn(): string {
    const stack = cdk.Stack.of(this);
    return `arn:${stack.partition}:glue:${stack.region}:${stack.account}:database/${this.databaseName}`;
  }

  public get tableArns(): string[] {
    const stack = cdk.Stack.of(this);
    return [
      `arn:${stack.partition}:glue:${stack.region}:${stack.account}:table/${this.databaseName}/*`,
    ];
  }

  public get catalogArn(): string {
    const stack = cdk.Stack.of(this);
    return `arn:${stack.partition}:glue:${stack.region}:${stack.account}:catalog`;
  }
}
