// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { beforeEach, describe, expect, it, vi } from "vitest";
import { ManifestUnreadableError } from "../lambda/cur-forwarder/errors";
import {
  expandManifest,
  readManifest,
} from "../lambda/cur-forwarder/manifest-expander";
import { InMemoryObjectStore, silentLogger } from "./support/in-memory";

const ASSEMBLY = "cur/report/20240101-20240201/20240115T120000Z";
const MANIFEST_KEY = `${ASSEMBLY}/report-Manifest.json`;
const DATA_KEYS = [`${ASSEMBLY}/report-00001.csv.gz`, `${ASSEMBLY}/report-00002.csv.gz`];
const DEST_ASSEMBLY = "account-prod/report/20240101-20240201/20240115T120000Z";

const request = {
  sourceBucket: "payer-cur",
  manifestKey: MANIFEST_KEY,
  destinationBucket: "central-cur",
  rule: { sourcePrefix: "cur/", destinationPrefix: "account-prod/" },
};

describe("expandManifest", () => {
  const logger = silentLogger();
  let store: InMemoryObjectStore;

  beforeEach(() => {
    store = new InMemoryObjectStore()
      .put(
        "payer-cur",
        MANIFEST_KEY,
        JSON.stringify({ assemblyId: "abc", reportKeys: DATA_KEYS })
      )
      .put("payer-cur", DATA_KEYS[0], "rows-1")
      .put("payer-cur", DATA_KEYS[1], "rows-2");
  });

  it("copies every listed data file under the mapped prefix", async () => {
    const result = await expandManifest(request, { store, logger });

    expect(result).toEqual({
      keys: [`${DEST_ASSEMBLY}/report-00001.csv.gz`, `${DEST_ASSEMBLY}/report-00002.csv.gz`],
      copied: [`${DEST_ASSEMBLY}/report-00001.csv.gz`, `${DEST_ASSEMBLY}/report-00002.csv.gz`],
      verified: [],
      failures: [],
    });
    expect(store.keys("central-cur")).toEqual([
      `${DEST_ASSEMBLY}/report-00001.csv.gz`,
      `${DEST_ASSEMBLY}/report-00002.csv.gz`,
    ]);
  });

  it("never copies the manifest itself", async () => {
    await expandManifest(request, { store, logger });

    expect(store.has("central-cur", `${DEST_ASSEMBLY}/report-Manifest.json`)).toBe(false);
  });

  it("does not copy files that are already at the destination", async () => {
    await expandManifest(request, { store, logger });
    const second = await expandManifest(request, { store, logger });

    expect(store.copies).toHaveLength(2);
    expect(second.copied).toEqual([]);
    expect(second.verified).toEqual([
      `${DEST_ASSEMBLY}/report-00001.csv.gz`,
      `${DEST_ASSEMBLY}/report-00002.csv.gz`,
    ]);
    expect(second.keys).toEqual(second.verified);
  });

  it("keeps going when one data file fails to copy", async () => {
    store.failingCopies.add(DATA_KEYS[0]);

    const result = await expandManifest(request, { store, logger });

    expect(result.keys).toEqual([`${DEST_ASSEMBLY}/report-00002.csv.gz`]);
    expect(result.failures).toEqual([
      {
        sourceKey: DATA_KEYS[0],
        destinationKey: `${DEST_ASSEMBLY}/report-00001.csv.gz`,
        error: `simulated transport error for ${DATA_KEYS[0]}`,
      },
    ]);
  });

  it("copies anyway when the existence check fails", async () => {
    store.failingExistenceChecks.add(`${DEST_ASSEMBLY}/report-00001.csv.gz`);

    const result = await expandManifest(request, { store, logger });

    expect(result.copied).toHaveLength(2);
  });

  it("returns an empty result for a manifest that is not JSON", async () => {
    store.put("payer-cur", MANIFEST_KEY, "{not json");

    const result = await expandManifest(request, { store, logger });

    expect(result).toEqual({ keys: [], copied: [], verified: [], failures: [] });
    expect(store.copies).toEqual([]);
  });

  it("returns an empty result for a missing manifest", async () => {
    const result = await expandManifest(
      { ...request, manifestKey: `${ASSEMBLY}/missing-Manifest.json` },
      { store, logger }
    );

    expect(result.keys).toEqual([]);
  });

  it("logs why a manifest was rejected", async () => {
    store.put("payer-cur", MANIFEST_KEY, JSON.stringify({ reportKeys: "x" }));
    const warn = vi.spyOn(logger, "warn");

    await expandManifest(request, { store, logger });

    expect(warn).toHaveBeenCalledWith("Skipping manifest expansion", {
      manifest: `s3://payer-cur/${MANIFEST_KEY}`,
      error: expect.objectContaining({
        code: "MANIFEST_UNREADABLE",
        context: expect.objectContaining({
          manifest: `s3://payer-cur/${MANIFEST_KEY}`,
          issues: [expect.objectContaining({ path: ["reportKeys"] })],
        }),
      }),
    });
    warn.mockRestore();
  });

  it("returns an empty result when reportKeys is absent", async () => {
    store.put("payer-cur", MANIFEST_KEY, JSON.stringify({ assemblyId: "abc" }));

    const result = await expandManifest(request, { store, logger });

    expect(result.keys).toEqual([]);
    expect(store.copies).toEqual([]);
  });
});

describe("readManifest", () => {
  const ref = { bucket: "payer-cur", key: MANIFEST_KEY };

  it("keeps fields other than reportKeys", async () => {
    const store = new InMemoryObjectStore().put(
      "payer-cur",
      MANIFEST_KEY,
      JSON.stringify({ assemblyId: "abc", reportKeys: ["a.csv.gz"] })
    );

    expect(await readManifest(store, ref)).toEqual({
      assemblyId: "abc",
      reportKeys: ["a.csv.gz"],
    });
  });

  it("rejects reportKeys that are not a list of strings", async () => {
    const store = new InMemoryObjectStore().put(
      "payer-cur",
      MANIFEST_KEY,
      JSON.stringify({ reportKeys: "a.csv.gz" })
    );

    await expect(readManifest(store, ref)).rejects.toBeInstanceOf(ManifestUnreadableError);
  });

  it("rejects invalid JSON", async () => {
    const store = new InMemoryObjectStore().put("payer-cur", MANIFEST_KEY, "[");

    await expect(readManifest(store, ref)).rejects.toMatchObject({
      code: "MANIFEST_UNREADABLE",
      context: { manifest: `s3://payer-cur/${MANIFEST_KEY}` },
    });
  });
});
