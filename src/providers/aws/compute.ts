import {
  DescribeInstancesCommand,
  type EC2Client,
  type Instance,
} from "@aws-sdk/client-ec2";
import type { ResourceLister } from "../../scanner/types.js";
import type { InstanceSnapshot } from "../../resources/types.js";
import { callAws, paginate, type AwsCallContext } from "./aws-call.js";

export class InstanceLister implements ResourceLister<InstanceSnapshot> {
  readonly kind = "instances";

  constructor(
    private readonly client: EC2Client,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<InstanceSnapshot> {
    const pages = paginate(
      (token) =>
        callAws(this.context, signal, "ec2:DescribeInstances", () =>
          this.client.send(new DescribeInstancesCommand({ NextToken: token }), {
            abortSignal: signal,
          }),
        ),
      (page) => page.NextToken,
    );

    for await (const page of pages) {
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          if (!instance.InstanceId) {
            continue;
          }
          yield toInstanceSnapshot(instance.InstanceId, instance);
        }
      }
    }
  }
}

function toInstanceSnapshot(id: string, instance: Instance): InstanceSnapshot {
  const name = instance.Tags?.find((tag) => tag.Key === "Name")?.Value;
  return {
    resource_id: id,
    public_ip: instance.PublicIpAddress,
    state: instance.State?.Name,
    name,
  };
}
