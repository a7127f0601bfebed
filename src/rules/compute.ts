import { Severity, type Rule } from "../scanner/types.js";
import type { InstanceSnapshot } from "../resources/types.js";

export const INSTANCE_RULES: readonly Rule<InstanceSnapshot>[] = [
  {
    id: "public-ip",
    title: "Instance has a public IP address",
    severity: Severity.Warning,
    message:
      "EC2 instance {resource_id} has a public IP address assigned: {public_ip}",
    // No reported address is no evidence of exposure.
    predicate: (instance) => Boolean(instance.public_ip),
    remediation:
      "Move the instance behind a load balancer or NAT and launch it without a public address.",
  },
];
