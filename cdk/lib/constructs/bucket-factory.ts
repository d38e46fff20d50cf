// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { RemovalPolicy } from "aws-cdk-lib";
import {
  BlockPublicAccess,
  Bucket,
  BucketEncryption,
  BucketProps,
  ObjectOwnership,
} from "aws-cdk-lib/aws-s3";
import { Construct } from "constructs";

/**
 * Factory class for creating S3 buckets with consistent configurations
 */
export class BucketFactory {
  /**
   * Creates a standard bucket with common configurations
   * @param scope The construct scope
   * @param id The construct ID
   * @param bucketName Optional bucket name
   * @param additionalProps Additional bucket properties to merge
   * @returns A new S3 bucket
   */
  public static createStandardBucket(
    scope: Construct,
    id: string,
    bucketName?: string,
    additionalProps: Partial<BucketProps> = {}
  ): Bucket {
    return new Bucket(scope, id, {
      bucketName,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      encryption: BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      ...additionalProps
    });
  }

  /**
   * Creates the bucket receiving forwarded cost and usage reports.
   * Copies arrive with the bucket-owner-full-control ACL, so the bucket owner
   * must be preferred as object owner. Report history is retained.
   * @param scope The construct scope
   * @param id The construct ID
   * @param bucketName Optional bucket name
   * @param additionalProps Additional bucket properties to merge
   * @returns A new S3 bucket configured for reports
   */
  public static createReportsBucket(
    scope: Construct,
    id: string,
    bucketName?: string,
    additionalProps: Partial<BucketProps> = {}
  ): Bucket {
    return this.createStandardBucket(scope, id, bucketName, {
      objectOwnership: ObjectOwnership.BUCKET_OWNER_PREFERRED,
      removalPolicy: RemovalPolicy.RETAIN,
      ...additionalProps
    });
  }
}
