import { Severity, type Rule } from "../scanner/types.js";
import type { IngressRangeSnapshot } from "../resources/types.js";

export const WORLD_CIDR = "0.0.0.0/0";

/** SSH, RDP, MySQL, PostgreSQL, HTTP, HTTPS. */
export const DANGEROUS_PORTS: readonly number[] = [22, 3389, 3306, 5432, 80, 443];

const ICMP_PROTOCOLS = new Set(["icmp", "1", "icmpv6", "58"]);

export const INGRESS_RULES: readonly Rule<IngressRangeSnapshot>[] = [
  {
    id: "open-to-world",
    title: "Ingress open to the internet",
    severity: Severity.Warning,
    message:
      "Security group {resource_id} allows {protocol} ports {port_range} from the world (0.0.0.0/0).",
    predicate: (range) => range.cidr === WORLD_CIDR,
    remediation: "Restrict the source CIDR to known networks.",
  },
  {
    id: "dangerous-port-open",
    title: "Sensitive port open to the internet",
    severity: Severity.High,
    message:
      "Security group {resource_id} exposes sensitive {protocol} ports {port_range} to the world (0.0.0.0/0).",
    predicate: (range) =>
      range.cidr === WORLD_CIDR && exposesDangerousPort(range),
    remediation: "Close the port to 0.0.0.0/0 and reach the service through a bastion, VPN or load balancer.",
  },
];

export function exposesDangerousPort(range: IngressRangeSnapshot): boolean {
  if (isIcmp(range.protocol)) {
    return false;
  }
  // A rule without a port range covers every port.
  if (range.from_port === undefined || range.to_port === undefined) {
    return true;
  }
  const from = range.from_port;
  const to = range.to_port;
  return DANGEROUS_PORTS.some((port) => port >= from && port <= to);
}

/** For ICMP the API stores the ICMP type and code in the port fields. */
export function formatPortRange(
  from?: number,
  to?: number,
  protocol?: string,
): string {
  if (isIcmp(protocol)) {
    return from === undefined || from === -1 ? "all" : `type ${from}`;
  }
  if (from === undefined || to === undefined || (from === -1 && to === -1)) {
    return "all";
  }
  return from === to ? String(from) : `${from}-${to}`;
}

function isIcmp(protocol: string | undefined): boolean {
  return protocol !== undefined && ICMP_PROTOCOLS.has(protocol.toLowerCase());
}
