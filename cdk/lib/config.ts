// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { App } from "aws-cdk-lib";

/**
 * Central configuration class for the CDK application
 * Provides access to configuration values from context, environment variables,
 * or default values
 */
export class Config {
  // AWS Lambda Powertools for TypeScript layer
  public static readonly POWERTOOLS_LAYER_ACCOUNT = '094274105915';
  public static readonly POWERTOOLS_LAYER_VERSION = '24';

  // Glue catalog defaults
  public static readonly DEFAULT_GLUE_REGION = 'eu-west-1';
  public static readonly DEFAULT_DATABASE_NAME = 'cur_database';
  public static readonly PARTITION_KEY = 'billing_period';

  // Resource naming prefixes
  public static readonly RESOURCE_PREFIX = 'cur-fwd';

  /**
   * Gets the AWS Lambda Powertools layer ARN for the specified region
   * @param region AWS region
   * @returns The ARN for the Lambda Powertools layer
   */
  public static getPowerToolsLayerArn(region: string): string {
    return `arn:aws:lambda:${region}:${this.POWERTOOLS_LAYER_ACCOUNT}:layer:AWSLambdaPowertoolsTypeScriptV2:${this.POWERTOOLS_LAYER_VERSION}`;
  }

  /**
   * Gets a context value from the CDK app, with fallback to default value
   * @param app CDK App instance
   * @param key Context key to retrieve
   * @param defaultValue Default value if context key is not found
   * @returns The context value or default value
   */
  public static getContextValue<T>(app: App, key: string, defaultValue: T): T {
    const value: T | undefined = app.node.tryGetContext(key);
    return value ?? defaultValue;
  }

  /**
   * Gets a name that can be switched off with false, in cdk.json or as -c key=false
   * @param app CDK App instance
   * @param key Context key to retrieve
   * @param defaultValue Name used when the key is absent
   * @returns The name, or false when disabled
   */
  public static getNameOrDisabled(app: App, key: string, defaultValue: string): string | false {
    const value: unknown = app.node.tryGetContext(key);
    if (value === false || value === 'false') {
      return false;
    }
    return typeof value === 'string' && value !== '' ? value : defaultValue;
  }

  /**
   * Gets a required context value, failing synthesis when it is absent
   * @param app CDK App instance
   * @param key Context key to retrieve
   * @returns The context value
   */
  public static getRequiredContextValue<T>(app: App, key: string): T {
    const value: T | undefined = app.node.tryGetContext(key);
    if (value === undefined || value === null || value === '') {
      throw new Error(`Missing required context value "${key}" (set it in cdk.json or with -c ${key}=...)`);
    }
    return value;
  }
}
