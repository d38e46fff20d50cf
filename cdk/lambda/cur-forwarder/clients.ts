// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { GlueClient } from "@aws-sdk/client-glue";
import { S3Client } from "@aws-sdk/client-s3";

// Created on first use and kept for the life of the execution environment.
let s3Client: S3Client | undefined;
const glueClients = new Map<string, GlueClient>();

export function getS3Client(): S3Client {
  if (!s3Client) {
    s3Client = new S3Client({});
  }
  return s3Client;
}

/** The Glue catalog can live in another region than the function */
export function getGlueClient(region: string): GlueClient {
  let client = glueClients.get(region);
  if (!client) {
    client = new GlueClient({ region });
    glueClients.set(region, client);
  }
  return client;
}
