import {
  GetBucketAclCommand,
  GetBucketEncryptionCommand,
  GetBucketPolicyStatusCommand,
  GetBucketVersioningCommand,
  ListBucketsCommand,
  type S3Client,
} from "@aws-sdk/client-s3";
import type { ResourceLister } from "../../scanner/types.js";
import type { AclGrant, BucketSnapshot } from "../../resources/types.js";
import {
  callAws,
  isAwsError,
  paginate,
  type AwsCallContext,
} from "./aws-call.js";

export class BucketLister implements ResourceLister<BucketSnapshot> {
  readonly kind = "buckets";

  constructor(
    private readonly client: S3Client,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<BucketSnapshot> {
    const pages = paginate(
      (token) =>
        callAws(this.context, signal, "s3:ListBuckets", () =>
          this.client.send(new ListBucketsCommand({ ContinuationToken: token }), {
            abortSignal: signal,
          }),
        ),
      (page) => page.ContinuationToken,
    );

    for await (const page of pages) {
      for (const bucket of page.Buckets ?? []) {
        if (!bucket.Name) {
          continue;
        }
        yield await this.describeBucket(bucket.Name, signal);
      }
    }
  }

  private async describeBucket(
    bucket: string,
    signal: AbortSignal,
  ): Promise<BucketSnapshot> {
    return {
      resource_id: bucket,
      acl_grants: await this.aclGrants(bucket, signal),
      policy_status: await this.policyStatus(bucket, signal),
      encryption: await this.encryption(bucket, signal),
      versioning: await this.versioning(bucket, signal),
    };
  }

  private async aclGrants(
    bucket: string,
    signal: AbortSignal,
  ): Promise<AclGrant[]> {
    const response = await callAws(this.context, signal, "s3:GetBucketAcl", () =>
      this.client.send(new GetBucketAclCommand({ Bucket: bucket }), {
        abortSignal: signal,
      }),
    );
    return (response.Grants ?? []).map((grant) => ({
      grantee_uri: grant.Grantee?.URI,
      permission: grant.Permission,
    }));
  }

  private async policyStatus(
    bucket: string,
    signal: AbortSignal,
  ): Promise<BucketSnapshot["policy_status"]> {
    try {
      const response = await callAws(
        this.context,
        signal,
        "s3:GetBucketPolicyStatus",
        () =>
          this.client.send(new GetBucketPolicyStatusCommand({ Bucket: bucket }), {
            abortSignal: signal,
          }),
      );
      return { is_public: response.PolicyStatus?.IsPublic };
    } catch (error) {
      if (isAwsError(error, "NoSuchBucketPolicy")) {
        return undefined;
      }
      throw error;
    }
  }

  private async encryption(
    bucket: string,
    signal: AbortSignal,
  ): Promise<string[] | undefined> {
    try {
      const response = await callAws(
        this.context,
        signal,
        "s3:GetBucketEncryption",
        () =>
          this.client.send(new GetBucketEncryptionCommand({ Bucket: bucket }), {
            abortSignal: signal,
          }),
      );
      const rules = response.ServerSideEncryptionConfiguration?.Rules ?? [];
      return rules.map(
        (rule) =>
          rule.ApplyServerSideEncryptionByDefault?.SSEAlgorithm ?? "unspecified",
      );
    } catch (error) {
      if (isAwsError(error, "ServerSideEncryptionConfigurationNotFoundError")) {
        return undefined;
      }
      throw error;
    }
  }

  private async versioning(
    bucket: string,
    signal: AbortSignal,
  ): Promise<string | undefined> {
    const response = await callAws(
      this.context,
      signal,
      "s3:GetBucketVersioning",
      () =>
        this.client.send(new GetBucketVersioningCommand({ Bucket: bucket }), {
          abortSignal: signal,
        }),
    );
    return response.Status;
  }
}
