// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import * as path from "path";
import { Duration, Stack } from "aws-cdk-lib";
import { Effect, PolicyStatement, ServicePrincipal } from "aws-cdk-lib/aws-iam";
import { Architecture, ILayerVersion, Runtime } from "aws-cdk-lib/aws-lambda";
import { NodejsFunction, OutputFormat } from "aws-cdk-lib/aws-lambda-nodejs";
import { IBucket } from "aws-cdk-lib/aws-s3";
import { ITopic, Topic } from "aws-cdk-lib/aws-sns";
import { LambdaSubscription } from "aws-cdk-lib/aws-sns-subscriptions";
import { Construct } from "constructs";
import { LambdaLogging } from "./constructs/lambda-logging";
import { CurCatalog, CurTableProps } from "./cur-catalog";

export interface CurSourceProps {
  /** Bucket the source account's CUR export writes to */
  readonly bucketName: string;
  readonly sourcePrefix?: string;
  readonly destinationPrefix?: string;
  /**
   * SNS topic relaying the bucket's object-created notifications. Without
   * one, the source bucket must notify the function directly.
   */
  readonly topicArn?: string;
}

export interface CurForwarderProps {
  readonly destinationBucket: IBucket;
  readonly sources: CurSourceProps[];
  readonly tables: CurTableProps[];
  readonly powerToolsLayer: ILayerVersion;
  /** Partition management is disabled without a catalog */
  readonly catalog?: CurCatalog;
  readonly functionName?: string;
  /** Receives the error and duration alarms */
  readonly alarmTopic?: ITopic;
}

/**
 * The forwarding Lambda together with its permissions and triggers.
 */
export class CurForwarder extends Construct {
  public readonly function: NodejsFunction;

  constructor(scope: Construct, id: string, props: CurForwarderProps) {
    super(scope, id);

    const region = Stack.of(this).region;

    const prefixMapping = Object.fromEntries(
      props.sources.map((source) => [
        source.bucketName,
        {
          source_prefix: source.sourcePrefix ?? "",
          destination_prefix: source.destinationPrefix ?? "",
        },
      ])
    );
    const tableMapping = Object.fromEntries(
      props.tables.map((table) => [table.prefix, table.tableName])
    );

    this.function = LambdaLogging.createNodejsFunction(
      this,
      "CurForwarderFunction",
      {
        functionName: props.functionName,
        entry: path.join(__dirname, "../lambda/cur-forwarder/index.ts"),
        handler: "handler",
        runtime: Runtime.NODEJS_20_X,
        architecture: Architecture.ARM_64,
        memorySize: 256,
        timeout: Duration.minutes(5),
        layers: [props.powerToolsLayer],
        bundling: {
          format: OutputFormat.CJS,
          // Both are provided by the runtime and the Powertools layer
          externalModules: ["@aws-sdk/*", "@aws-lambda-powertools/*"],
        },
        environment: {
          DESTINATION_BUCKET: props.destinationBucket.bucketName,
          PREFIX_MAPPING: JSON.stringify(prefixMapping),
          GLUE_DATABASE: props.catalog?.databaseName ?? "",
          GLUE_REGION: region,
          TABLE_MAPPING: JSON.stringify(tableMapping),
        },
      },
      { serviceName: "cur-forwarder", alarmTopic: props.alarmTopic }
    );

    // Read from every source bucket
    for (const source of props.sources) {
      this.function.addToRolePolicy(
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: ["s3:GetObject"],
          resources: [
            `arn:aws:s3:::${source.bucketName}/${source.sourcePrefix ?? ""}*`,
          ],
        })
      );
    }

    // Copy into, check and list the destination
    props.destinationBucket.grantReadWrite(this.function);
    this.function.addToRolePolicy(
      new PolicyStatement({
        effect: Effect.ALLOW,
        actions: ["s3:PutObjectAcl"],
        resources: [props.destinationBucket.arnForObjects("*")],
      })
    );

    if (props.catalog) {
      this.function.addToRolePolicy(
        new PolicyStatement({
          effect: Effect.ALLOW,
          actions: [
            "glue:GetTable",
            "glue:CreatePartition",
            "glue:UpdatePartition",
          ],
          resources: [
            props.catalog.catalogArn,
            props.catalog.databaseArn,
            ...props.catalog.tableArns,
          ],
        })
      );
    }

    // Triggers
    props.sources.forEach((source, index) => {
      if (source.topicArn) {
        Topic.fromTopicArn(this, `SourceTopic${index}`, source.topicArn)
          .addSubscription(new LambdaSubscription(this.function));
      } else {
        this.function.addPermission(`AllowS3Invoke${index}`, {
          principal: new ServicePrincipal("s3.amazonaws.com"),
          action: "lambda:InvokeFunction",
          sourceArn: `arn:aws:s3:::${source.bucketName}`,
        });
      }
    });
  }
}
