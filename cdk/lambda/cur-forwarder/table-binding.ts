// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/** Destination key prefix owned by one Glue table */
export interface TableBinding {
  prefix: string;
  tableName: string;
}

/**
 * First binding, in declared order, whose prefix starts the key.
 * Overlapping prefixes are resolved by order, not by length.
 */
export function resolveTableName(
  key: string,
  bindings: readonly TableBinding[]
): string | undefined {
  return bindings.find((binding) => key.startsWith(binding.prefix))?.tableName;
}

/** Pairs of bindings where one prefix starts the other, so declaration order picks the table */
export function findOverlappingBindings(
  bindings: readonly TableBinding[]
): Array<[TableBinding, TableBinding]> {
  const overlaps: Array<[TableBinding, TableBinding]> = [];
  bindings.forEach((earlier, index) => {
    for (const later of bindings.slice(index + 1)) {
      if (
        later.prefix.startsWith(earlier.prefix) ||
        earlier.prefix.startsWith(later.prefix)
      ) {
        overlaps.push([earlier, later]);
      }
    }
  });
  return overlaps;
}
