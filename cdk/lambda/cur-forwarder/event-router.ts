// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import type { S3Event, S3EventRecord, SNSEvent, SNSEventRecord } from "aws-lambda";
import { z } from "zod";
import { describeError, serializeError } from "./errors";
import type { ObjectRef } from "./object-replicator";

export type ForwarderEvent = S3Event | SNSEvent;

export interface BatchResult<TItem> {
  /** 200 when every item succeeded, 207 when at least one failed */
  statusCode: 200 | 207;
  processed: number;
  errors: number;
  files: TItem[];
  errorDetails?: string[];
}

/** The S3 notification as it appears inside an SNS message body */
const snsS3MessageSchema = z.object({
  Records: z
    .array(
      z.object({
        s3: z.object({
          bucket: z.object({ name: z.string() }),
          object: z.object({ key: z.string() }),
        }),
      })
    )
    .default([]),
});

/** Event keys are form-encoded: "+" stands for a space */
export function decodeObjectKey(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, " "));
}

function toObjectRef(record: Pick<S3EventRecord, "s3">): ObjectRef {
  return {
    bucket: record.s3.bucket.name,
    key: decodeObjectKey(record.s3.object.key),
  };
}

function isSnsRecord(
  record: S3EventRecord | SNSEventRecord
): record is SNSEventRecord {
  return "Sns" in record;
}

/**
 * Objects described by one inbound record. SNS-wrapped notifications carry
 * their S3 records in the message body; an S3 test event yields none.
 */
export function unwrapRecord(record: S3EventRecord | SNSEventRecord): ObjectRef[] {
  if (!isSnsRecord(record)) {
    return [toObjectRef(record)];
  }

  const message = snsS3MessageSchema.parse(JSON.parse(record.Sns.Message));
  return message.Records.map((inner) => ({
    bucket: inner.s3.bucket.name,
    key: decodeObjectKey(inner.s3.object.key),
  }));
}

/**
 * Run `processObject` for every object in the event, one at a time. A failure
 * is recorded against its item and never stops the rest of the batch.
 */
export async function routeEvent<TItem>(
  event: ForwarderEvent,
  processObject: (object: ObjectRef) => Promise<TItem>,
  logger: Logger
): Promise<BatchResult<TItem>> {
  const files: TItem[] = [];
  const errorDetails: string[] = [];

  for (const record of event.Records) {
    let objects: ObjectRef[];
    try {
      objects = unwrapRecord(record);
    } catch (error) {
      const detail = `Error unwrapping record: ${describeError(error)}`;
      logger.error(detail, { error: serializeError(error) });
      errorDetails.push(detail);
      continue;
    }

    logger.debug("Unwrapped record", {
      wrapped: isSnsRecord(record),
      objects: objects.length,
    });

    for (const object of objects) {
      try {
        files.push(await processObject(object));
      } catch (error) {
        const detail = `Error processing s3://${object.bucket}/${object.key}: ${describeError(error)}`;
        logger.error(detail, { error: serializeError(error) });
        errorDetails.push(detail);
      }
    }
  }

  const result: BatchResult<TItem> = {
    statusCode: errorDetails.length === 0 ? 200 : 207,
    processed: files.length,
    errors: errorDetails.length,
    files,
  };
  if (errorDetails.length > 0) {
    result.errorDetails = errorDetails;
  }
  return result;
}
