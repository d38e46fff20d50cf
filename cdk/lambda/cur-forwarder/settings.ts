// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Runtime configuration for the forwarder, read once from the Lambda
 * environment and handed to the core as a plain struct.
 *
 * Environment variables:
 *   - DESTINATION_BUCKET (required)       bucket receiving the copies
 *   - PREFIX_MAPPING     (default "{}")   {"<source bucket>": {"source_prefix", "destination_prefix"}}
 *   - GLUE_DATABASE      (optional)       empty disables partition management
 *   - GLUE_REGION        (default "eu-west-1")
 *   - TABLE_MAPPING      (default "{}")   {"<destination prefix>": "<table name>"}, order matters
 */

import { z } from "zod";
import {
  ConfigurationInvalidError,
  ConfigurationMissingError,
  describeError,
} from "./errors";
import type { PrefixRule } from "./path-mapper";
import type { TableBinding } from "./table-binding";

export const DEFAULT_GLUE_REGION = "eu-west-1";

export interface CatalogSettings {
  database: string;
  region: string;
}

export interface ForwarderSettings {
  destinationBucket: string;
  /** Keyed by source bucket name */
  prefixRules: Readonly<Record<string, PrefixRule>>;
  /** Absent when partition management is off */
  catalog?: CatalogSettings;
  tableBindings: readonly TableBinding[];
}

const prefixMappingSchema = z.record(
  z.string(),
  z.object({
    source_prefix: z.string().default(""),
    destination_prefix: z.string().default(""),
  })
);

const tableMappingSchema = z.record(z.string(), z.string().min(1));

function parseJsonVariable<T extends z.ZodTypeAny>(
  name: string,
  raw: string | undefined,
  schema: T
): z.infer<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw?.trim() ? raw : "{}");
  } catch (error) {
    throw new ConfigurationInvalidError(
      `${name} is not valid JSON: ${describeError(error)}`,
      { variable: name }
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationInvalidError(`${name} has an unexpected shape`, {
      variable: name,
      issues: result.error.issues,
    });
  }
  return result.data;
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env
): ForwarderSettings {
  const destinationBucket = env.DESTINATION_BUCKET?.trim();
  if (!destinationBucket) {
    throw new ConfigurationMissingError(
      "DESTINATION_BUCKET environment variable is required",
      { variable: "DESTINATION_BUCKET" }
    );
  }

  const prefixMapping = parseJsonVariable(
    "PREFIX_MAPPING",
    env.PREFIX_MAPPING,
    prefixMappingSchema
  );
  const prefixRules: Record<string, PrefixRule> = {};
  for (const [bucket, rule] of Object.entries(prefixMapping)) {
    prefixRules[bucket] = {
      sourcePrefix: rule.source_prefix,
      destinationPrefix: rule.destination_prefix,
    };
  }

  const tableMapping = parseJsonVariable(
    "TABLE_MAPPING",
    env.TABLE_MAPPING,
    tableMappingSchema
  );
  const tableBindings = Object.entries(tableMapping).map(
    ([prefix, tableName]) => ({ prefix, tableName })
  );

  const database = env.GLUE_DATABASE?.trim();
  return {
    destinationBucket,
    prefixRules,
    catalog: database
      ? { database, region: env.GLUE_REGION?.trim() || DEFAULT_GLUE_REGION }
      : undefined,
    tableBindings,
  };
}
