// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { Stack } from "aws-cdk-lib";
import { Config } from "./config";

/**
 * Resource naming strategy class to ensure consistent naming across resources
 */
export class ResourceNaming {
  private readonly stack: Stack;
  private readonly prefix: string;

  /**
   * Creates a new ResourceNaming instance
   * @param stack The CDK stack
   * @param prefix Optional prefix override (defaults to Config.RESOURCE_PREFIX)
   */
  constructor(stack: Stack, prefix?: string) {
    this.stack = stack;
    this.prefix = prefix || Config.RESOURCE_PREFIX;
  }

  /**
   * Generates a standardized bucket name
   * @param resourceName Base name of the bucket
   * @returns Formatted bucket name
   */
  public bucketName(resourceName: string): string {
    return `${this.prefix}-${resourceName}-${this.stack.account}`;
  }

  /**
   * Generates a standardized function name
   * @param resourceName Base name of the function
   * @returns Formatted function name
   */
  public functionName(resourceName: string): string {
    return `${this.prefix}-${resourceName}-function`;
  }

  /**
   * Glue identifiers only allow lowercase letters, digits and underscores
   * @param resourceName Base name of the database or table
   * @returns Formatted catalog name
   */
  public catalogName(resourceName: string): string {
    return `${this.prefix}_${resourceName}`.toLowerCase().replace(/[^a-z0-9_]/g, '_');
  }
}
