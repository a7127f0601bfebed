import { DescribeDBInstancesCommand, type RDSClient } from "@aws-sdk/client-rds";
import type { ResourceLister } from "../../scanner/types.js";
import type { DatabaseSnapshot } from "../../resources/types.js";
import { callAws, paginate, type AwsCallContext } from "./aws-call.js";

export class DatabaseLister implements ResourceLister<DatabaseSnapshot> {
  readonly kind = "db-instances";

  constructor(
    private readonly client: RDSClient,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<DatabaseSnapshot> {
    const pages = paginate(
      (marker) =>
        callAws(this.context, signal, "rds:DescribeDBInstances", () =>
          this.client.send(new DescribeDBInstancesCommand({ Marker: marker }), {
            abortSignal: signal,
          }),
        ),
      (page) => page.Marker,
    );

    for await (const page of pages) {
      for (const db of page.DBInstances ?? []) {
        if (!db.DBInstanceIdentifier) {
          continue;
        }
        yield {
          resource_id: db.DBInstanceIdentifier,
          engine: db.Engine,
          publicly_accessible: db.PubliclyAccessible,
          storage_encrypted: db.StorageEncrypted,
          backup_retention_period: db.BackupRetentionPeriod,
        };
      }
    }
  }
}
