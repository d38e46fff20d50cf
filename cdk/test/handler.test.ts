// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationMissingError } from "../lambda/cur-forwarder/errors";
import { createHandler } from "../lambda/cur-forwarder/handler";
import type { ForwarderSettings } from "../lambda/cur-forwarder/settings";
import { loadSettings } from "../lambda/cur-forwarder/settings";
import { lambdaContext, s3Record, snsWrapping } from "./support/events";
import { InMemoryCatalog, InMemoryObjectStore, silentLogger } from "./support/in-memory";

const ASSEMBLY = "cur/20240101-20240201/20240115T120000Z";

describe("createHandler", () => {
  let store: InMemoryObjectStore;
  let catalog: InMemoryCatalog;

  beforeEach(() => {
    store = new InMemoryObjectStore().put("src", `${ASSEMBLY}/part-1.csv.gz`, "rows");
    catalog = new InMemoryCatalog().addTable("cur_database", "cur_acct", {
      Location: "s3://dest/acct/",
    });
  });

  function runtimeWith(settings: () => ForwarderSettings) {
    return {
      loadSettings: vi.fn(settings),
      objectStore: vi.fn(() => store),
      catalog: vi.fn((_region: string) => catalog),
      logger: silentLogger(),
    };
  }

  it("forwards every object in the event", async () => {
    const runtime = runtimeWith(() =>
      loadSettings({
        DESTINATION_BUCKET: "dest",
        PREFIX_MAPPING: JSON.stringify({
          src: { source_prefix: "cur/", destination_prefix: "acct/" },
        }),
        GLUE_DATABASE: "cur_database",
        TABLE_MAPPING: JSON.stringify({ "acct/": "cur_acct" }),
      })
    );
    const handler = createHandler(runtime);

    const result = await handler(
      { Records: [snsWrapping([s3Record("src", `${ASSEMBLY}/part-1.csv.gz`)])] },
      lambdaContext()
    );

    expect(result.statusCode).toBe(200);
    expect(result.files).toEqual([
      {
        source: `s3://src/${ASSEMBLY}/part-1.csv.gz`,
        destination: "s3://dest/acct/20240101-20240201/20240115T120000Z/part-1.csv.gz",
        partition: {
          status: "created",
          tableName: "cur_acct",
          billingPeriod: "20240101-20240201",
          location: "s3://dest/acct/20240101-20240201/20240115T120000Z/",
        },
      },
    ]);
    expect(runtime.catalog).toHaveBeenCalledWith("eu-west-1");
  });

  it("loads settings once per execution environment", async () => {
    const runtime = runtimeWith(() => ({
      destinationBucket: "dest",
      prefixRules: {},
      tableBindings: [],
    }));
    const handler = createHandler(runtime);

    await handler({ Records: [] }, lambdaContext());
    await handler({ Records: [] }, lambdaContext());

    expect(runtime.loadSettings).toHaveBeenCalledTimes(1);
    expect(runtime.catalog).not.toHaveBeenCalled();
  });

  it("aborts before any item when the destination bucket is missing", async () => {
    const runtime = runtimeWith(() => loadSettings({}));
    const handler = createHandler(runtime);

    await expect(
      handler({ Records: [s3Record("src", `${ASSEMBLY}/part-1.csv.gz`)] }, lambdaContext())
    ).rejects.toBeInstanceOf(ConfigurationMissingError);
    expect(runtime.objectStore).not.toHaveBeenCalled();
    expect(store.copies).toEqual([]);
  });

  it("reports failed items with a 207", async () => {
    const runtime = runtimeWith(() => ({
      destinationBucket: "dest",
      prefixRules: {},
      tableBindings: [],
    }));
    const handler = createHandler(runtime);

    const result = await handler(
      {
        Records: [
          s3Record("src", `${ASSEMBLY}/part-1.csv.gz`),
          s3Record("src", `${ASSEMBLY}/part-9.csv.gz`),
        ],
      },
      lambdaContext()
    );

    expect(result.statusCode).toBe(207);
    expect(result.processed).toBe(1);
    expect(result.errorDetails).toEqual([
      `Error processing s3://src/${ASSEMBLY}/part-9.csv.gz: NoSuchKey: src/${ASSEMBLY}/part-9.csv.gz`,
    ]);
  });
});
