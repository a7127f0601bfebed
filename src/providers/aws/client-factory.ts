import { EC2Client } from "@aws-sdk/client-ec2";
import { IAMClient } from "@aws-sdk/client-iam";
import { LambdaClient } from "@aws-sdk/client-lambda";
import { RDSClient } from "@aws-sdk/client-rds";
import { S3Client } from "@aws-sdk/client-s3";
import {
  GetCallerIdentityCommand,
  STSClient,
  type GetCallerIdentityCommandOutput,
} from "@aws-sdk/client-sts";

export interface AwsClients {
  readonly ec2: EC2Client;
  readonly iam: IAMClient;
  readonly lambda: LambdaClient;
  readonly rds: RDSClient;
  readonly s3: S3Client;
  readonly sts: STSClient;
}

export interface AwsClientOptions {
  /** Falls back to the SDK's region resolution (AWS_REGION, shared config). */
  readonly region?: string;
}

/**
 * SDK retries are turned off; throttling is retried once, at the lister
 * boundary, by `withRetry`.
 */
export function createAwsClients(options: AwsClientOptions = {}): AwsClients {
  const base = { region: options.region, maxAttempts: 1 };
  return {
    ec2: new EC2Client(base),
    iam: new IAMClient(base),
    lambda: new LambdaClient(base),
    rds: new RDSClient(base),
    s3: new S3Client({ ...base, followRegionRedirects: true }),
    sts: new STSClient(base),
  };
}

export function destroyAwsClients(clients: AwsClients): void {
  clients.ec2.destroy();
  clients.iam.destroy();
  clients.lambda.destroy();
  clients.rds.destroy();
  clients.s3.destroy();
  clients.sts.destroy();
}

export interface CallerIdentity {
  readonly accountId: string;
  readonly arn?: string;
  readonly region: string;
}

/**
 * Resolve who the scan runs as. Fails when no credentials or no region can
 * be resolved, which is the one condition that stops a run from starting.
 */
export async function resolveCallerIdentity(
  sts: STSClient,
): Promise<CallerIdentity> {
  let response: GetCallerIdentityCommandOutput;
  try {
    response = await sts.send(new GetCallerIdentityCommand({}));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to resolve AWS credentials: ${reason}`);
  }
  if (!response.Account) {
    throw new Error("Unable to resolve AWS account id from STS");
  }
  return {
    accountId: response.Account,
    arn: response.Arn,
    region: await sts.config.region(),
  };
}
