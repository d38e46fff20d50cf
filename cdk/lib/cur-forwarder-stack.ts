// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { CfnOutput, Stack, StackProps } from "aws-cdk-lib";
import { CfnTable } from "aws-cdk-lib/aws-glue";
import { LayerVersion } from "aws-cdk-lib/aws-lambda";
import { Bucket, IBucket } from "aws-cdk-lib/aws-s3";
import { Topic } from "aws-cdk-lib/aws-sns";
import { Construct } from "constructs";
import { BucketFactory } from "./constructs/bucket-factory";
import { Config } from "./config";
import { CurCatalog, CurTableProps } from "./cur-catalog";
import { CurForwarder, CurSourceProps } from "./cur-forwarder";
import { ResourceNaming } from "./naming";

export interface CurForwarderStackProps extends StackProps {
  /** Import an existing bucket instead of creating one */
  readonly destinationBucketName?: string;
  readonly sources: CurSourceProps[];
  readonly tables: CurTableProps[];
  readonly columns: CfnTable.ColumnProperty[];
  /** Defaults to a prefixed name; set to false to skip the catalog entirely */
  readonly databaseName?: string | false;
  /** Existing SNS topic notified when the forwarder alarms fire */
  readonly alarmTopicArn?: string;
}

export class CurForwarderStack extends Stack {
  public readonly destinationBucket: IBucket;
  public readonly catalog?: CurCatalog;
  public readonly forwarder: CurForwarder;

  constructor(scope: Construct, id: string, props: CurForwarderStackProps) {
    super(scope, id, props);

    const naming = new ResourceNaming(this);

    this.destinationBucket = props.destinationBucketName
      ? Bucket.fromBucketName(this, "DestinationBucket", props.destinationBucketName)
      : BucketFactory.createReportsBucket(this, "DestinationBucket",
          naming.bucketName("cur-reports")
        );

    if (props.databaseName !== false) {
      this.catalog = new CurCatalog(this, "CurCatalog", {
        bucketName: this.destinationBucket.bucketName,
        databaseName: props.databaseName ?? naming.catalogName("cur"),
        tables: props.tables,
        columns: props.columns,
      });
    }

    const powerToolsLayer = LayerVersion.fromLayerVersionArn(
      this,
      "LambdaPowerTools",
      Config.getPowerToolsLayerArn(this.region)
    );

    this.forwarder = new CurForwarder(this, "CurForwarder", {
      destinationBucket: this.destinationBucket,
      sources: props.sources,
      tables: props.tables,
      powerToolsLayer,
      catalog: this.catalog,
      functionName: naming.functionName("cur-forwarder"),
      alarmTopic: props.alarmTopicArn
        ? Topic.fromTopicArn(this, "AlarmTopic", props.alarmTopicArn)
        : undefined,
    });

    new CfnOutput(this, "DestinationBucketName", {
      value: this.destinationBucket.bucketName,
      description: "Bucket receiving forwarded cost and usage reports",
    });
    new CfnOutput(this, "ForwarderFunctionArn", {
      value: this.forwarder.function.functionArn,
      description: "Subscribe source buckets or topics to this function",
    });
    if (this.catalog) {
      new CfnOutput(this, "GlueDatabaseName", {
        value: this.catalog.databaseName,
        description: "Glue database holding one table per forwarded account",
      });
    }
  }
}
