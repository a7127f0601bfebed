import {
  GetFunctionConcurrencyCommand,
  GetPolicyCommand,
  LambdaClient,
  ListFunctionsCommand,
} from "@aws-sdk/client-lambda";
import { DescribeDBInstancesCommand, RDSClient } from "@aws-sdk/client-rds";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { DatabaseLister } from "../../../src/providers/aws/database.js";
import { FunctionLister } from "../../../src/providers/aws/serverless.js";
import { awsError, collect, noDelayContext } from "../../helpers.js";

const lambdaMock = mockClient(LambdaClient);
const rdsMock = mockClient(RDSClient);
const signal = new AbortController().signal;

beforeEach(() => {
  lambdaMock.reset();
  rdsMock.reset();
});

describe("FunctionLister", () => {
  it("reads concurrency and resource policy for each function", async () => {
    lambdaMock
      .on(ListFunctionsCommand)
      .resolvesOnce({
        Functions: [{ FunctionName: "resize-images" }],
        NextMarker: "m-2",
      })
      .resolvesOnce({
        Functions: [
          {
            FunctionName: "webhook",
            KMSKeyArn: "arn:aws:kms:eu-west-1:111122223333:key/test",
          },
        ],
      });
    lambdaMock
      .on(GetFunctionConcurrencyCommand, { FunctionName: "resize-images" })
      .resolves({})
      .on(GetFunctionConcurrencyCommand, { FunctionName: "webhook" })
      .resolves({ ReservedConcurrentExecutions: 5 });
    lambdaMock
      .on(GetPolicyCommand, { FunctionName: "resize-images" })
      .rejects(awsError("ResourceNotFoundException"))
      .on(GetPolicyCommand, { FunctionName: "webhook" })
      .resolves({ Policy: '{"Statement":[]}' });

    const functions = await collect(
      new FunctionLister(new LambdaClient({ region: "eu-west-1" }), noDelayContext).list(
        signal,
      ),
    );

    expect(functions).toEqual([
      {
        resource_id: "resize-images",
        kms_key_arn: undefined,
        reserved_concurrency: undefined,
        has_resource_policy: false,
      },
      {
        resource_id: "webhook",
        kms_key_arn: "arn:aws:kms:eu-west-1:111122223333:key/test",
        reserved_concurrency: 5,
        has_resource_policy: true,
      },
    ]);
    expect(
      lambdaMock
        .commandCalls(ListFunctionsCommand)
        .map((call) => call.args[0].input.Marker),
    ).toEqual([undefined, "m-2"]);
  });
});

describe("DatabaseLister", () => {
  it("follows Marker across pages", async () => {
    rdsMock
      .on(DescribeDBInstancesCommand)
      .resolvesOnce({
        DBInstances: [
          {
            DBInstanceIdentifier: "orders-db",
            Engine: "postgres",
            PubliclyAccessible: false,
            StorageEncrypted: true,
            BackupRetentionPeriod: 7,
          },
        ],
        Marker: "next",
      })
      .resolvesOnce({ DBInstances: [{ DBInstanceIdentifier: "legacy-db" }] });

    const databases = await collect(
      new DatabaseLister(new RDSClient({ region: "eu-west-1" }), noDelayContext).list(
        signal,
      ),
    );

    expect(databases.map((db) => db.resource_id)).toEqual(["orders-db", "legacy-db"]);
    expect(databases[0]).toEqual({
      resource_id: "orders-db",
      engine: "postgres",
      publicly_accessible: false,
      storage_encrypted: true,
      backup_retention_period: 7,
    });
  });
});
