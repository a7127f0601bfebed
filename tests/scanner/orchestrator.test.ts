import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import {
  reportEntries,
  runAllScans,
  type Scanner,
} from "../../src/scanner/orchestrator.js";
import { defineRuleSource } from "../../src/scanner/rule-engine.js";
import { ServiceScanner } from "../../src/scanner/service-scanner.js";
import { Service, type ServiceResult } from "../../src/scanner/types.js";
import { INSTANCE_RULES } from "../../src/rules/compute.js";
import { BUCKET_RULES } from "../../src/rules/storage.js";
import type {
  BucketSnapshot,
  InstanceSnapshot,
} from "../../src/resources/types.js";
import { FakeLister, awsError, silentLogger } from "../helpers.js";

function delayedScanner(
  service: Service,
  delayMs: number,
  completions: Service[],
): Scanner {
  return {
    service,
    scan: async (): Promise<ServiceResult> => {
      await sleep(delayMs);
      completions.push(service);
      return { status: "completed", service, findings: [], duration_ms: delayMs };
    },
  };
}

describe("runAllScans", () => {
  it("keeps registration order when services finish out of order", async () => {
    const completions: Service[] = [];
    const report = await runAllScans(
      [
        delayedScanner(Service.Compute, 30, completions),
        delayedScanner(Service.Storage, 0, completions),
      ],
      { logger: silentLogger, mode: "parallel" },
    );

    expect(completions).toEqual([Service.Storage, Service.Compute]);
    expect([...report.keys()]).toEqual([Service.Compute, Service.Storage]);
  });

  it("runs sequentially by default", async () => {
    const completions: Service[] = [];
    await runAllScans(
      [
        delayedScanner(Service.Compute, 10, completions),
        delayedScanner(Service.Storage, 0, completions),
      ],
      { logger: silentLogger },
    );

    expect(completions).toEqual([Service.Compute, Service.Storage]);
  });

  it("isolates a failing service from the others", async () => {
    const failing = new ServiceScanner({
      service: Service.Compute,
      sources: [
        defineRuleSource(
          new FakeLister<InstanceSnapshot>(
            "instances",
            [],
            awsError("ExpiredToken", "token expired"),
          ),
          INSTANCE_RULES,
        ),
      ],
      logger: silentLogger,
    });
    const healthy = new ServiceScanner({
      service: Service.Storage,
      sources: [
        defineRuleSource(
          new FakeLister<BucketSnapshot>("buckets", [
            { resource_id: "public-site", versioning: "Enabled", encryption: ["AES256"] },
          ]),
          BUCKET_RULES,
        ),
      ],
      logger: silentLogger,
    });

    const report = await runAllScans([failing, healthy], {
      logger: silentLogger,
      mode: "parallel",
    });

    expect(report.get(Service.Compute)?.status).toBe("failed");
    expect(report.get(Service.Storage)).toMatchObject({
      status: "completed",
      findings: [],
    });
  });

  it("rejects two scanners for the same service", async () => {
    const completions: Service[] = [];
    await expect(
      runAllScans(
        [
          delayedScanner(Service.Compute, 0, completions),
          delayedScanner(Service.Compute, 0, completions),
        ],
        { logger: silentLogger },
      ),
    ).rejects.toThrow("Duplicate scanner registered for compute");
    expect(completions).toEqual([]);
  });
});

describe("reportEntries", () => {
  it("lists findings before the scan failure", async () => {
    const scanner = new ServiceScanner({
      service: Service.Compute,
      sources: [
        defineRuleSource(
          new FakeLister<InstanceSnapshot>(
            "instances",
            [{ resource_id: "i-1", public_ip: "54.0.0.9" }],
            awsError("Throttling"),
          ),
          INSTANCE_RULES,
        ),
      ],
      logger: silentLogger,
    });

    const entries = reportEntries(await scanner.scan());

    expect(entries.map((entry) => entry.kind)).toEqual(["finding", "scan_failure"]);
  });
});
