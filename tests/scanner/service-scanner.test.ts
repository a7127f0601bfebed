import { describe, expect, it } from "vitest";
import { defineRuleSource } from "../../src/scanner/rule-engine.js";
import { ServiceScanner } from "../../src/scanner/service-scanner.js";
import { Service, Severity } from "../../src/scanner/types.js";
import { INSTANCE_RULES } from "../../src/rules/compute.js";
import { INGRESS_RULES } from "../../src/rules/network.js";
import type {
  IngressRangeSnapshot,
  InstanceSnapshot,
} from "../../src/resources/types.js";
import {
  FakeLister,
  HangingLister,
  awsError,
  silentLogger,
} from "../helpers.js";

const publicInstance: InstanceSnapshot = {
  resource_id: "i-public",
  public_ip: "54.0.0.1",
};
const privateInstance: InstanceSnapshot = { resource_id: "i-private" };
const openSsh: IngressRangeSnapshot = {
  resource_id: "sg-ssh",
  protocol: "tcp",
  cidr: "0.0.0.0/0",
  from_port: 22,
  to_port: 22,
  port_range: "22",
};

describe("ServiceScanner", () => {
  it("collects findings from every source in order", async () => {
    const scanner = new ServiceScanner({
      service: Service.Compute,
      sources: [
        defineRuleSource(
          new FakeLister("instances", [publicInstance, privateInstance]),
          INSTANCE_RULES,
        ),
        defineRuleSource(new FakeLister("ingress", [openSsh]), INGRESS_RULES),
      ],
      logger: silentLogger,
    });

    const result = await scanner.scan();

    expect(result.status).toBe("completed");
    expect(
      result.findings.map((finding) => `${finding.resource_id}:${finding.rule_id}`),
    ).toEqual([
      "i-public:public-ip",
      "sg-ssh:open-to-world",
      "sg-ssh:dangerous-port-open",
    ]);
    expect(scanner.rules.map((rule) => rule.id)).toEqual([
      "public-ip",
      "open-to-world",
      "dangerous-port-open",
    ]);
  });

  it("keeps findings gathered before a listing error", async () => {
    const scanner = new ServiceScanner({
      service: Service.Compute,
      sources: [
        defineRuleSource(
          new FakeLister(
            "instances",
            [publicInstance],
            awsError("UnauthorizedOperation", "not allowed"),
          ),
          INSTANCE_RULES,
        ),
      ],
      logger: silentLogger,
    });

    const result = await scanner.scan();

    expect(result.status).toBe("failed");
    expect(result.findings.map((finding) => finding.resource_id)).toEqual([
      "i-public",
    ]);
    if (result.status !== "failed") {
      return;
    }
    expect(result.failure.resource_id).toBe("instances");
    expect(result.failure.message).toBe(
      "Scan of compute stopped while listing instances: UnauthorizedOperation: not allowed",
    );
  });

  it("names the source that failed and skips the ones after it", async () => {
    const scanner = new ServiceScanner({
      service: Service.Network,
      sources: [
        defineRuleSource(new FakeLister("ingress", [openSsh]), INGRESS_RULES),
        defineRuleSource(
          new FakeLister<InstanceSnapshot>("instances", [], awsError("Boom")),
          INSTANCE_RULES,
        ),
        defineRuleSource(
          new FakeLister("more-instances", [publicInstance]),
          INSTANCE_RULES,
        ),
      ],
      logger: silentLogger,
    });

    const result = await scanner.scan();

    expect(result.status).toBe("failed");
    expect(result.findings).toHaveLength(2);
    if (result.status === "failed") {
      expect(result.failure.resource_id).toBe("instances");
      expect(result.failure.error).toEqual({ name: "Boom", detail: "Boom" });
    }
  });

  it("records a throwing predicate as a scan failure", async () => {
    const scanner = new ServiceScanner({
      service: Service.Compute,
      sources: [
        defineRuleSource(new FakeLister("instances", [privateInstance]), [
          {
            id: "broken",
            title: "Broken rule",
            severity: Severity.Info,
            message: "never rendered",
            predicate: () => {
              throw new TypeError("bad predicate");
            },
          },
        ]),
      ],
      logger: silentLogger,
    });

    const result = await scanner.scan();

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.failure.error).toEqual({
        name: "TypeError",
        detail: "bad predicate",
      });
    }
  });

  it("fails with a timeout when a lister hangs", async () => {
    const scanner = new ServiceScanner({
      service: Service.Compute,
      sources: [defineRuleSource(new HangingLister(), [])],
      logger: silentLogger,
      timeoutMs: 20,
    });

    const result = await scanner.scan();

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.failure.error).toEqual({
        name: "ScanTimeoutError",
        detail: "Scan of compute exceeded 20ms",
      });
      expect(result.failure.resource_id).toBe("hanging");
    }
  });

  it("completes with no findings when there is nothing to list", async () => {
    const scanner = new ServiceScanner({
      service: Service.Storage,
      sources: [],
      logger: silentLogger,
    });

    await expect(scanner.scan()).resolves.toMatchObject({
      status: "completed",
      service: "storage",
      findings: [],
    });
  });
});
