// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { Construct } from "constructs";
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatch_actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as sns from 'aws-cdk-lib/aws-sns';
import { Duration, RemovalPolicy } from "aws-cdk-lib";

/**
 * Properties for the LambdaLogging construct
 */
export interface LambdaLoggingProps {
  /**
   * The bundled function to configure logging for
   */
  function: nodejs.NodejsFunction;

  /**
   * Log retention period in days (default: 30 days)
   */
  logRetention?: logs.RetentionDays;

  /**
   * Service name for Powertools (default: function name)
   */
  serviceName?: string;

  /**
   * Log level (default: 'INFO')
   */
  logLevel?: string;

  /**
   * Namespace of the metrics extracted from the function's JSON logs (default: 'CurForwarder')
   */
  metricNamespace?: string;

  /**
   * Whether to create alarms (default: true)
   */
  createAlarms?: boolean;

  /**
   * SNS topic for alarms (optional)
   */
  alarmTopic?: sns.ITopic;

  /**
   * Duration threshold for alarm in milliseconds (default: 60000)
   */
  durationThreshold?: number;
}

/** Values in the forwarder's structured logs that the metric filters match */
export const PARTITION_FAILURE_MESSAGE = 'Failed to update Athena partition';
export const PARTIAL_BATCH_STATUS = 207;

/**
 * Log group, Powertools settings and alarms for a forwarding function.
 *
 * Invocation errors only cover configuration failures: per-object failures
 * end up in a 207 batch result and partition failures are logged and
 * swallowed. Both are turned into metrics from the structured logs.
 */
export class LambdaLogging extends Construct {
  public readonly logGroup: logs.LogGroup;

  /**
   * Invocations that returned a partial batch result
   */
  public readonly partialBatchMetric: cloudwatch.Metric;

  /**
   * Partition refreshes that failed after the copy succeeded
   */
  public readonly partitionFailureMetric: cloudwatch.Metric;

  public readonly alarms: cloudwatch.Alarm[] = [];

  constructor(scope: Construct, id: string, props: LambdaLoggingProps) {
    super(scope, id);

    // Set default values
    const logRetention = props.logRetention || logs.RetentionDays.ONE_MONTH;
    const serviceName = props.serviceName || props.function.functionName;
    const logLevel = props.logLevel || 'INFO';
    const metricNamespace = props.metricNamespace || 'CurForwarder';
    const createAlarms = props.createAlarms !== undefined ? props.createAlarms : true;
    const durationThreshold = props.durationThreshold || 60000;

    this.logGroup = new logs.LogGroup(this, 'LogGroup', {
      logGroupName: `/aws/lambda/${props.function.functionName}`,
      retention: logRetention,
      removalPolicy: RemovalPolicy.DESTROY,
    });

    props.function.addEnvironment('POWERTOOLS_SERVICE_NAME', serviceName);
    props.function.addEnvironment('POWERTOOLS_LOG_LEVEL', logLevel);

    this.partialBatchMetric = new logs.MetricFilter(this, 'PartialBatchFilter', {
      logGroup: this.logGroup,
      metricNamespace,
      metricName: 'PartialBatches',
      filterPattern: logs.FilterPattern.numberValue('$.statusCode', '=', PARTIAL_BATCH_STATUS),
      metricValue: '1',
    }).metric({ statistic: cloudwatch.Stats.SUM, period: Duration.minutes(5) });

    this.partitionFailureMetric = new logs.MetricFilter(this, 'PartitionFailureFilter', {
      logGroup: this.logGroup,
      metricNamespace,
      metricName: 'PartitionUpdateFailures',
      filterPattern: logs.FilterPattern.stringValue('$.message', '=', PARTITION_FAILURE_MESSAGE),
      metricValue: '1',
    }).metric({ statistic: cloudwatch.Stats.SUM, period: Duration.minutes(5) });

    if (!createAlarms) {
      return;
    }

    this.alarms.push(
      new cloudwatch.Alarm(this, 'ErrorAlarm', {
        metric: props.function.metricErrors(),
        threshold: 1,
        evaluationPeriods: 1,
        alarmDescription: `${props.function.functionName} failed an invocation, check its configuration`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      }),
      new cloudwatch.Alarm(this, 'DurationAlarm', {
        metric: props.function.metricDuration(),
        threshold: durationThreshold,
        evaluationPeriods: 3,
        datapointsToAlarm: 2,
        alarmDescription: `${props.function.functionName} is taking long to copy report files`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      }),
      new cloudwatch.Alarm(this, 'PartialBatchAlarm', {
        metric: this.partialBatchMetric,
        threshold: 1,
        evaluationPeriods: 1,
        alarmDescription: `${props.function.functionName} could not forward some report files`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      }),
      new cloudwatch.Alarm(this, 'PartitionFailureAlarm', {
        metric: this.partitionFailureMetric,
        threshold: 1,
        evaluationPeriods: 1,
        alarmDescription: `${props.function.functionName} could not repoint a billing period partition`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      })
    );

    if (props.alarmTopic) {
      const action = new cloudwatch_actions.SnsAction(props.alarmTopic);
      this.alarms.forEach((alarm) => alarm.addAlarmAction(action));
    }
  }

  /**
   * Creates a bundled TypeScript Lambda function with logging configuration
   * @param scope The construct scope
   * @param id The construct ID
   * @param props NodejsFunction properties
   * @param loggingProps Optional logging properties
   * @returns A Lambda function with logging configuration
   */
  public static createNodejsFunction(
    scope: Construct,
    id: string,
    props: nodejs.NodejsFunctionProps,
    loggingProps?: Partial<LambdaLoggingProps>
  ): nodejs.NodejsFunction {
    const lambdaFunction = new nodejs.NodejsFunction(scope, id, props);

    new LambdaLogging(scope, `${id}Logging`, {
      ...loggingProps,
      function: lambdaFunction,
    });

    return lambdaFunction;
  }
}
