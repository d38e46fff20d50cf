// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type { Logger } from "@aws-lambda-powertools/logger";
import type { Context } from "aws-lambda";
import type { BatchResult, ForwarderEvent } from "./event-router";
import { routeEvent } from "./event-router";
import { serializeError } from "./errors";
import type { ForwardResult } from "./forwarder";
import { forwardObject } from "./forwarder";
import type { ObjectStore } from "./object-replicator";
import type { PartitionCatalog } from "./partition-repointer";
import type { ForwarderSettings } from "./settings";
import { findOverlappingBindings } from "./table-binding";

export type ForwarderBatchResult = BatchResult<ForwardResult>;

/** Collaborators the handler resolves lazily, once per execution environment */
export interface ForwarderRuntime {
  loadSettings: () => ForwarderSettings;
  objectStore: () => ObjectStore;
  catalog: (region: string) => PartitionCatalog;
  logger: Logger;
}

export type ForwarderHandler = (
  event: ForwarderEvent,
  context: Context
) => Promise<ForwarderBatchResult>;

export function createHandler(runtime: ForwarderRuntime): ForwarderHandler {
  const { logger } = runtime;
  let settings: ForwarderSettings | undefined;

  const resolveSettings = (): ForwarderSettings => {
    if (!settings) {
      try {
        settings = runtime.loadSettings();
      } catch (error) {
        logger.error("Invalid forwarder configuration", {
          error: serializeError(error),
        });
        throw error;
      }
      for (const [earlier, later] of findOverlappingBindings(
        settings.tableBindings
      )) {
        logger.warn("Overlapping table mapping prefixes, first declared wins", {
          first: earlier,
          second: later,
        });
      }
    }
    return settings;
  };

  return async (event, context) => {
    logger.addContext(context);
    logger.info("Received event", { records: event.Records.length });

    const current = resolveSettings();
    const deps = {
      store: runtime.objectStore(),
      catalog: current.catalog
        ? runtime.catalog(current.catalog.region)
        : undefined,
      logger,
    };

    const result = await routeEvent(
      event,
      (object) => forwardObject(object, current, deps),
      logger
    );

    logger.info("Completed processing", {
      statusCode: result.statusCode,
      processed: result.processed,
      errors: result.errors,
    });
    return result;
  };
}
