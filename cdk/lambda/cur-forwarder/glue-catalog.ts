// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import {
  CreatePartitionCommand,
  GetTableCommand,
  GlueClient,
  UpdatePartitionCommand,
} from "@aws-sdk/client-glue";
import type { PartitionInput, StorageDescriptor } from "@aws-sdk/client-glue";
import {
  PartitionNotFoundError,
  PartitionUpdateError,
  describeError,
} from "./errors";
import type { PartitionCatalog } from "./partition-repointer";

function isEntityNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === "EntityNotFoundException";
}

export class GlueCatalog implements PartitionCatalog {
  constructor(private readonly client: GlueClient) {}

  async getTableStorageDescriptor(
    database: string,
    tableName: string
  ): Promise<StorageDescriptor> {
    let descriptor: StorageDescriptor | undefined;
    try {
      const response = await this.client.send(
        new GetTableCommand({ DatabaseName: database, Name: tableName })
      );
      descriptor = response.Table?.StorageDescriptor;
    } catch (error) {
      throw new PartitionUpdateError(
        `Glue GetTable failed for ${database}.${tableName}: ${describeError(error)}`,
        { database, tableName }
      );
    }

    if (!descriptor) {
      throw new PartitionUpdateError(
        `Glue table ${database}.${tableName} has no storage descriptor`,
        { database, tableName }
      );
    }
    return descriptor;
  }

  async updatePartition(
    database: string,
    tableName: string,
    values: string[],
    input: PartitionInput
  ): Promise<void> {
    try {
      await this.client.send(
        new UpdatePartitionCommand({
          DatabaseName: database,
          TableName: tableName,
          PartitionValueList: values,
          PartitionInput: input,
        })
      );
    } catch (error) {
      if (isEntityNotFound(error)) {
        throw new PartitionNotFoundError(
          `No partition ${values.join("/")} in ${database}.${tableName}`,
          { database, tableName, values }
        );
      }
      throw new PartitionUpdateError(
        `Glue UpdatePartition failed for ${database}.${tableName}: ${describeError(error)}`,
        { database, tableName, values }
      );
    }
  }

  async createPartition(
    database: string,
    tableName: string,
    input: PartitionInput
  ): Promise<void> {
    try {
      await this.client.send(
        new CreatePartitionCommand({
          DatabaseName: database,
          TableName: tableName,
          PartitionInput: input,
        })
      );
    } catch (error) {
      throw new PartitionUpdateError(
        `Glue CreatePartition failed for ${database}.${tableName}: ${describeError(error)}`,
        { database, tableName, values: input.Values }
      );
    }
  }
}
