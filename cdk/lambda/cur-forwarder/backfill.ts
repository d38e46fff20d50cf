// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * One-time sweep that points every billing-period partition at the latest
 * complete assembly already present in the bucket. Once it has run, the
 * forwarder keeps the partitions current.
 */

import type { Logger } from "@aws-lambda-powertools/logger";
import { describeError, serializeError } from "./errors";
import {
  DATA_FILE_SUFFIX,
  isAssemblyId,
  isBillingPeriod,
  splitKey,
} from "./key-classifier";
import type { ObjectStore } from "./object-replicator";
import type { PartitionCatalog, RepointOutcome } from "./partition-repointer";
import { repointPartition } from "./partition-repointer";
import type { TableBinding } from "./table-binding";
import { findOverlappingBindings } from "./table-binding";

/** Label used for reports that overwrite data directly in the billing-period folder */
export const FLAT_LABEL = "flat";

export interface PartitionTarget {
  billingPeriod: string;
  /** Assembly id, or FLAT_LABEL */
  label: string;
  /** Folder the partition should point at, without a trailing separator */
  path: string;
}

interface AssemblyEvidence {
  path: string;
  hasData: boolean;
}

/**
 * Latest assembly holding at least one data file, per billing period, under
 * `prefix`. Falls back to a flat layout when a period has no complete
 * assembly. Sorted by billing period.
 */
export async function findPartitionTargets(
  store: ObjectStore,
  bucket: string,
  prefix: string,
  logger?: Logger
): Promise<PartitionTarget[]> {
  const assemblies = new Map<string, Map<string, AssemblyEvidence>>();
  const flat = new Map<string, string>();

  for await (const key of store.listAllKeys(bucket, prefix)) {
    const segments = splitKey(key);
    const periodIndex = segments.findIndex(isBillingPeriod);
    if (periodIndex === -1) {
      continue;
    }

    const billingPeriod = segments[periodIndex];
    const isData = key.endsWith(DATA_FILE_SUFFIX);
    const next = segments[periodIndex + 1];

    if (periodIndex + 2 < segments.length && isAssemblyId(next)) {
      const byId =
        assemblies.get(billingPeriod) ?? new Map<string, AssemblyEvidence>();
      assemblies.set(billingPeriod, byId);
      const evidence = byId.get(next) ?? {
        path: segments.slice(0, periodIndex + 2).join("/"),
        hasData: false,
      };
      evidence.hasData = evidence.hasData || isData;
      byId.set(next, evidence);
    } else if (isData) {
      flat.set(billingPeriod, segments.slice(0, periodIndex + 1).join("/"));
    }
  }

  const periods = new Set([...assemblies.keys(), ...flat.keys()]);
  const targets: PartitionTarget[] = [];
  for (const billingPeriod of [...periods].sort()) {
    const complete = [
      ...(assemblies.get(billingPeriod) ?? new Map<string, AssemblyEvidence>()).entries(),
    ]
      .filter(([, evidence]) => evidence.hasData)
      .sort(([a], [b]) => a.localeCompare(b));
    const latest = complete[complete.length - 1];

    if (latest) {
      targets.push({ billingPeriod, label: latest[0], path: latest[1].path });
      continue;
    }

    const flatPath = flat.get(billingPeriod);
    if (flatPath !== undefined) {
      targets.push({ billingPeriod, label: FLAT_LABEL, path: flatPath });
      continue;
    }

    logger?.warn("No assembly with data files, leaving partition alone", {
      billingPeriod,
      prefix,
    });
  }
  return targets;
}

export interface BackfillOptions {
  bucket: string;
  database: string;
  tableBindings: readonly TableBinding[];
  dryRun?: boolean;
}

export interface BackfillDeps {
  store: ObjectStore;
  catalog: PartitionCatalog;
  logger: Logger;
}

export interface BackfillEntry {
  tableName: string;
  billingPeriod: string;
  label: string;
  location: string;
  outcome: RepointOutcome | "dry-run" | "failed";
  error?: string;
}

export async function runBackfill(
  options: BackfillOptions,
  { store, catalog, logger }: BackfillDeps
): Promise<BackfillEntry[]> {
  const entries: BackfillEntry[] = [];

  // Each binding sweeps its whole prefix, unlike the forwarder's first-match routing
  for (const [earlier, later] of findOverlappingBindings(options.tableBindings)) {
    logger.warn("Overlapping table prefixes, periods under the longer prefix are repointed for both tables", {
      first: earlier,
      second: later,
    });
  }

  for (const { prefix, tableName } of options.tableBindings) {
    const targets = await findPartitionTargets(
      store,
      options.bucket,
      prefix,
      logger
    );
    logger.info("Found billing periods", {
      prefix,
      tableName,
      periods: targets.length,
    });

    for (const target of targets) {
      const location = `s3://${options.bucket}/${target.path}/`;
      const entry: BackfillEntry = {
        tableName,
        billingPeriod: target.billingPeriod,
        label: target.label,
        location,
        outcome: "dry-run",
      };

      if (!options.dryRun) {
        try {
          entry.outcome = await repointPartition(
            catalog,
            {
              database: options.database,
              tableName,
              billingPeriod: target.billingPeriod,
              location,
            },
            logger
          );
        } catch (error) {
          logger.error("Failed to repoint partition", {
            tableName,
            billingPeriod: target.billingPeriod,
            error: serializeError(error),
          });
          entry.outcome = "failed";
          entry.error = describeError(error);
        }
      }
      entries.push(entry);
    }
  }
  return entries;
}
