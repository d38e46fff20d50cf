// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

import { Logger } from "@aws-lambda-powertools/logger";

/** Level and sampling come from the POWERTOOLS_* variables set by LambdaLogging */
export const logger = new Logger({
  serviceName: process.env.POWERTOOLS_SERVICE_NAME ?? "cur-forwarder",
});
