// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Error hierarchy for the CUR forwarder.
 *
 * Every error carries a machine-readable `code` and a `context` record that is
 * logged alongside the message. Which of them abort what:
 *   - ConfigurationMissingError / ConfigurationInvalidError: the whole invocation
 *   - ReplicationError: the single file being copied
 *   - ManifestUnreadableError: nothing, expansion yields an empty result
 *   - PartitionUpdateError: the partition refresh only
 */
export class ForwarderError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "ForwarderError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Copy, existence check or listing against S3 failed */
export class ReplicationError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "REPLICATION_FAILED", context);
    this.name = "ReplicationError";
  }
}

/** Manifest could not be fetched or does not have the expected shape */
export class ManifestUnreadableError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "MANIFEST_UNREADABLE", context);
    this.name = "ManifestUnreadableError";
  }
}

/** The catalog has no partition for the requested values */
export class PartitionNotFoundError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "PARTITION_NOT_FOUND", context);
    this.name = "PartitionNotFoundError";
  }
}

/** Any catalog failure other than a missing partition */
export class PartitionUpdateError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "PARTITION_UPDATE_FAILED", context);
    this.name = "PartitionUpdateError";
  }
}

export class ConfigurationMissingError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "CONFIG_MISSING", context);
    this.name = "ConfigurationMissingError";
  }
}

export class ConfigurationInvalidError extends ForwarderError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "CONFIG_INVALID", context);
    this.name = "ConfigurationInvalidError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Log payload for an error; forwarder errors keep their code and context */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof ForwarderError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
