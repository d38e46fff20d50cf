// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Per-source-bucket prefix rewrite applied to every forwarded key.
 */
export interface PrefixRule {
  sourcePrefix: string;
  destinationPrefix: string;
}

export interface MappedKey {
  destinationKey: string;
  /** False when a non-empty source prefix did not match and the whole key was used */
  prefixMatched: boolean;
}

export const PASSTHROUGH_RULE: Readonly<PrefixRule> = Object.freeze({
  sourcePrefix: "",
  destinationPrefix: "",
});

const LEADING_SEPARATORS = /^\/+/;
const TRAILING_SEPARATORS = /\/+$/;

export function mapKey(sourceKey: string, rule: PrefixRule): MappedKey {
  const prefixMatched = sourceKey.startsWith(rule.sourcePrefix);
  const remainder = prefixMatched
    ? sourceKey.slice(rule.sourcePrefix.length)
    : sourceKey;
  const relativeKey = remainder.replace(LEADING_SEPARATORS, "");

  const destinationPrefix = rule.destinationPrefix.replace(
    TRAILING_SEPARATORS,
    ""
  );
  const destinationKey = destinationPrefix
    ? `${destinationPrefix}/${relativeKey}`
    : relativeKey;

  return { destinationKey, prefixMatched };
}

export function toDestinationKey(sourceKey: string, rule: PrefixRule): string {
  return mapKey(sourceKey, rule).destinationKey;
}
