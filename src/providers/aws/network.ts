import {
  DescribeSecurityGroupsCommand,
  type EC2Client,
  type IpPermission,
} from "@aws-sdk/client-ec2";
import type { ResourceLister } from "../../scanner/types.js";
import type { IngressRangeSnapshot } from "../../resources/types.js";
import { formatPortRange } from "../../rules/network.js";
import { callAws, paginate, type AwsCallContext } from "./aws-call.js";

/**
 * Yields one snapshot per IPv4 range of every ingress permission, so a group
 * with two open ranges is evaluated twice.
 */
export class IngressRangeLister implements ResourceLister<IngressRangeSnapshot> {
  readonly kind = "security-group-ingress";

  constructor(
    private readonly client: EC2Client,
    private readonly context: AwsCallContext,
  ) {}

  async *list(signal: AbortSignal): AsyncGenerator<IngressRangeSnapshot> {
    const pages = paginate(
      (token) =>
        callAws(this.context, signal, "ec2:DescribeSecurityGroups", () =>
          this.client.send(
            new DescribeSecurityGroupsCommand({ NextToken: token }),
            { abortSignal: signal },
          ),
        ),
      (page) => page.NextToken,
    );

    for await (const page of pages) {
      for (const group of page.SecurityGroups ?? []) {
        if (!group.GroupId) {
          continue;
        }
        for (const permission of group.IpPermissions ?? []) {
          yield* toIngressRanges(group.GroupId, group.GroupName, permission);
        }
      }
    }
  }
}

function toIngressRanges(
  groupId: string,
  groupName: string | undefined,
  permission: IpPermission,
): IngressRangeSnapshot[] {
  const protocol =
    permission.IpProtocol === "-1" ? "all" : permission.IpProtocol;
  // Protocol -1 ignores any port values the API returns.
  const allPorts = permission.IpProtocol === "-1";
  const fromPort = allPorts ? undefined : permission.FromPort;
  const toPort = allPorts ? undefined : permission.ToPort;
  return (permission.IpRanges ?? []).map((range) => ({
    resource_id: groupId,
    group_name: groupName,
    protocol,
    cidr: range.CidrIp,
    from_port: fromPort,
    to_port: toPort,
    port_range: formatPortRange(fromPort, toPort, protocol),
  }));
}
