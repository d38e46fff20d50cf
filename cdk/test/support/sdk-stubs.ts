// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import type {
  ServiceInputTypes as GlueInput,
  ServiceOutputTypes as GlueOutput,
} from "@aws-sdk/client-glue";
import { GlueClient } from "@aws-sdk/client-glue";
import type {
  ServiceInputTypes as S3Input,
  ServiceOutputTypes as S3Output,
} from "@aws-sdk/client-s3";
import { S3Client } from "@aws-sdk/client-s3";

export interface SdkCall<TInput> {
  commandName: string;
  input: TInput;
}

const clientConfig = {
  region: "eu-west-1",
  credentials: { accessKeyId: "test", secretAccessKey: "test" },
};

/**
 * S3 client whose requests never leave the process: the first middleware
 * records the command and answers with `respond`.
 */
export function stubS3Client(respond: (call: SdkCall<S3Input>) => S3Output) {
  const client = new S3Client(clientConfig);
  const calls: SdkCall<S3Input>[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const call = { commandName: context.commandName ?? "", input: args.input };
      calls.push(call);
      return { output: respond(call), response: {} };
    },
    { step: "initialize", priority: "high", name: "inProcessResponder" }
  );
  return { client, calls };
}

export function stubGlueClient(respond: (call: SdkCall<GlueInput>) => GlueOutput) {
  const client = new GlueClient(clientConfig);
  const calls: SdkCall<GlueInput>[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const call = { commandName: context.commandName ?? "", input: args.input };
      calls.push(call);
      return { output: respond(call), response: {} };
    },
    { step: "initialize", priority: "high", name: "inProcessResponder" }
  );
  return { client, calls };
}
