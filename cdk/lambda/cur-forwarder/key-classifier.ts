// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Path classification for CUR object keys.
 *
 * A versioned CUR export lays files out as
 *   <prefix>/<report>/<YYYYMMDD-YYYYMMDD>/<YYYYMMDDTHHMMSSZ>/<file>
 * where the date range is the billing period and the timestamp folder is one
 * assembly (snapshot attempt) of that period.
 */

const SEPARATOR = "/";
const ASSEMBLY_ID_PATTERN = /^\d{8}T\d{6}Z$/;
const BILLING_PERIOD_PATTERN = /^\d{8}-\d{8}$/;

export const MANIFEST_SUFFIX = "Manifest.json";
export const DATA_FILE_SUFFIX = ".csv.gz";

export type KeyKind = "assembly-manifest" | "assembly-data-file" | "plain";

export interface AssemblyLocation {
  billingPeriod: string;
  /** Segment following the billing period; not checked against the assembly id pattern */
  assemblyId: string;
  /** Key path up to and including the assembly segment, without a trailing separator */
  folder: string;
}

export function splitKey(key: string): string[] {
  return key.split(SEPARATOR);
}

export function isAssemblyId(segment: string): boolean {
  return ASSEMBLY_ID_PATTERN.test(segment);
}

export function isBillingPeriod(segment: string): boolean {
  return BILLING_PERIOD_PATTERN.test(segment);
}

function isInsideAssemblyFolder(key: string): boolean {
  const segments = splitKey(key);
  if (segments.length < 3) {
    return false;
  }
  return isAssemblyId(segments[segments.length - 2]);
}

/**
 * True for `.../<billing period>/<assembly id>/...Manifest.json`.
 * The top-level manifest that sits directly in the billing-period folder does not match.
 */
export function isAssemblyManifest(key: string): boolean {
  return key.endsWith(MANIFEST_SUFFIX) && isInsideAssemblyFolder(key);
}

export function isAssemblyDataFile(key: string): boolean {
  return key.endsWith(DATA_FILE_SUFFIX) && isInsideAssemblyFolder(key);
}

export function classifyKey(key: string): KeyKind {
  if (isAssemblyManifest(key)) {
    return "assembly-manifest";
  }
  if (isAssemblyDataFile(key)) {
    return "assembly-data-file";
  }
  return "plain";
}

export function extractBillingPeriodAndAssembly(
  key: string
): AssemblyLocation | undefined {
  const segments = splitKey(key);
  const periodIndex = segments.findIndex(isBillingPeriod);
  if (periodIndex === -1 || periodIndex + 1 >= segments.length) {
    return undefined;
  }

  return {
    billingPeriod: segments[periodIndex],
    assemblyId: segments[periodIndex + 1],
    folder: segments.slice(0, periodIndex + 2).join(SEPARATOR),
  };
}
