import {
  GetBucketAclCommand,
  GetBucketEncryptionCommand,
  GetBucketPolicyStatusCommand,
  GetBucketVersioningCommand,
  ListBucketsCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { BucketLister } from "../../../src/providers/aws/storage.js";
import { ALL_USERS_URI } from "../../../src/rules/storage.js";
import { awsError, collect, noDelayContext } from "../../helpers.js";

const s3Mock = mockClient(S3Client);
const client = new S3Client({ region: "eu-west-1" });
const signal = new AbortController().signal;

beforeEach(() => {
  s3Mock.reset();
});

describe("BucketLister", () => {
  it("describes each bucket and folds unconfigured answers into the snapshot", async () => {
    s3Mock
      .on(ListBucketsCommand)
      .resolvesOnce({ Buckets: [{ Name: "public-site" }], ContinuationToken: "next" })
      .resolvesOnce({ Buckets: [{ Name: "audit-logs" }] });

    s3Mock
      .on(GetBucketAclCommand, { Bucket: "public-site" })
      .resolves({
        Grants: [
          { Grantee: { Type: "Group", URI: ALL_USERS_URI }, Permission: "READ" },
        ],
      })
      .on(GetBucketAclCommand, { Bucket: "audit-logs" })
      .resolves({ Grants: [] });

    s3Mock
      .on(GetBucketPolicyStatusCommand, { Bucket: "public-site" })
      .rejects(awsError("NoSuchBucketPolicy"))
      .on(GetBucketPolicyStatusCommand, { Bucket: "audit-logs" })
      .resolves({ PolicyStatus: { IsPublic: false } });

    s3Mock
      .on(GetBucketEncryptionCommand, { Bucket: "public-site" })
      .rejects(awsError("ServerSideEncryptionConfigurationNotFoundError"))
      .on(GetBucketEncryptionCommand, { Bucket: "audit-logs" })
      .resolves({
        ServerSideEncryptionConfiguration: {
          Rules: [{ ApplyServerSideEncryptionByDefault: { SSEAlgorithm: "aws:kms" } }],
        },
      });

    s3Mock
      .on(GetBucketVersioningCommand, { Bucket: "public-site" })
      .resolves({})
      .on(GetBucketVersioningCommand, { Bucket: "audit-logs" })
      .resolves({ Status: "Enabled" });

    const buckets = await collect(
      new BucketLister(client, noDelayContext).list(signal),
    );

    expect(buckets).toEqual([
      {
        resource_id: "public-site",
        acl_grants: [{ grantee_uri: ALL_USERS_URI, permission: "READ" }],
        policy_status: undefined,
        encryption: undefined,
        versioning: undefined,
      },
      {
        resource_id: "audit-logs",
        acl_grants: [],
        policy_status: { is_public: false },
        encryption: ["aws:kms"],
        versioning: "Enabled",
      },
    ]);
  });

  it("stops on errors that are not an unconfigured answer", async () => {
    s3Mock.on(ListBucketsCommand).resolves({ Buckets: [{ Name: "locked" }] });
    s3Mock.on(GetBucketAclCommand).rejects(awsError("AccessDenied", "access denied"));

    await expect(
      collect(new BucketLister(client, noDelayContext).list(signal)),
    ).rejects.toThrow("access denied");
  });
});
