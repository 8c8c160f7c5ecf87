/**
 * Credential preflight: a single STS GetCallerIdentity before any inventory
 * call, so a missing or expired session fails the run up front.
 */

import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { formatErrorMessage } from "../../../src/plugin-sdk/index.js";
import { createAWSRetryRunner, type AWSRetryRunner } from "./retry.js";

export type CallerIdentity = {
  accountId: string;
  arn: string;
  userId: string;
};

export class CredentialValidationError extends Error {
  constructor(
    public readonly region: string,
    cause: unknown,
  ) {
    super(`AWS credential check failed in ${region}: ${formatErrorMessage(cause)}`);
    this.name = "CredentialValidationError";
  }
}

export type ValidateCredentialsOptions = {
  client?: STSClient;
  retry?: AWSRetryRunner;
};

export async function validateCredentials(
  region: string,
  options: ValidateCredentialsOptions = {},
): Promise<CallerIdentity> {
  const client = options.client ?? new STSClient({ region });
  const retry = options.retry ?? createAWSRetryRunner();

  try {
    const response = await retry(() => client.send(new GetCallerIdentityCommand({})), "GetCallerIdentity");
    return {
      accountId: response.Account ?? "",
      arn: response.Arn ?? "",
      userId: response.UserId ?? "",
    };
  } catch (err) {
    throw new CredentialValidationError(region, err);
  }
}
