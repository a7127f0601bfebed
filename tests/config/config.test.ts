import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
} from "../../src/config/config-loader.js";
import { Service, Severity } from "../../src/scanner/types.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "skyaudit-config-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

async function writeConfig(name: string, content: string): Promise<string> {
  const filePath = path.join(tempDir, name);
  await fs.writeFile(filePath, content, "utf8");
  return filePath;
}

describe("loadConfig", () => {
  it("uses defaults when no file is present", async () => {
    const config = await loadConfig({ env: {}, cwd: tempDir });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.execution.service_timeout_ms).toBe(300000);
    expect(config.retry.maxAttempts).toBe(3);
  });

  it("reads skyaudit.yaml from the working directory", async () => {
    await writeConfig(
      "skyaudit.yaml",
      [
        "region: eu-west-1",
        "services: [storage, compute]",
        "log_level: debug",
        "execution:",
        "  mode: parallel",
        "  service_timeout_ms: 1000",
        "retry:",
        "  max_attempts: 5",
        "identity:",
        "  access_key_max_idle_days: 30",
        "rules:",
        "  disabled: [storage/versioning-disabled]",
        "  severity:",
        "    serverless/no-reserved-concurrency: warning",
      ].join("\n"),
    );

    const config = await loadConfig({ env: {}, cwd: tempDir });

    expect(config).toEqual({
      region: "eu-west-1",
      services: [Service.Compute, Service.Storage],
      log_level: "debug",
      execution: { mode: "parallel", service_timeout_ms: 1000 },
      retry: { maxAttempts: 5, baseDelayMs: 200, maxDelayMs: 5000, jitterFactor: 0.2 },
      identity: { access_key_max_idle_days: 30 },
      rules: {
        disabled: ["storage/versioning-disabled"],
        severity: { "serverless/no-reserved-concurrency": Severity.Warning },
      },
    });
  });

  it("lets the environment override the file and flags override both", async () => {
    await writeConfig("skyaudit.yaml", "region: eu-west-1\nlog_level: info\n");
    const env = { AWS_REGION: "us-east-1", SKYAUDIT_LOG_LEVEL: "debug" };

    const fromEnv = await loadConfig({ env, cwd: tempDir });
    expect(fromEnv.region).toBe("us-east-1");
    expect(fromEnv.log_level).toBe("debug");

    const fromFlags = await loadConfig({
      env,
      cwd: tempDir,
      overrides: {
        region: "ap-south-1",
        logLevel: "warn",
        services: ["network", "compute"],
        mode: "parallel",
        serviceTimeoutMs: 0,
      },
    });
    expect(fromFlags.region).toBe("ap-south-1");
    expect(fromFlags.log_level).toBe("warn");
    expect(fromFlags.services).toEqual([Service.Compute, Service.Network]);
    expect(fromFlags.execution).toEqual({ mode: "parallel", service_timeout_ms: 0 });
  });

  it("finds the file named by SKYAUDIT_CONFIG", async () => {
    const filePath = await writeConfig("custom.yaml", "services: [identity]\n");
    const config = await loadConfig({
      env: { SKYAUDIT_CONFIG: filePath },
      cwd: tempDir,
    });
    expect(config.services).toEqual([Service.Identity]);
  });

  it("accepts the shipped example file", async () => {
    const examplePath = fileURLToPath(
      new URL("../../skyaudit.example.yaml", import.meta.url),
    );
    const config = await loadConfig({ configPath: examplePath, env: {} });
    expect(config.rules.disabled).toEqual(["storage/versioning-disabled"]);
    expect(config.services).toHaveLength(6);
  });

  it("fails when an explicit file is missing", async () => {
    await expect(
      loadConfig({ configPath: "missing.yaml", env: {}, cwd: tempDir }),
    ).rejects.toThrow(
      `Configuration file not found: ${path.join(tempDir, "missing.yaml")}`,
    );
  });

  it("reports YAML syntax errors with the file path", async () => {
    const filePath = await writeConfig("broken.yaml", "services: [compute\n");
    await expect(
      loadConfig({ configPath: filePath, env: {}, cwd: tempDir }),
    ).rejects.toThrow(`Invalid configuration file ${filePath}:`);
  });

  it("rejects unknown services passed as flags", async () => {
    await expect(
      loadConfig({ env: {}, cwd: tempDir, overrides: { services: ["dns"] } }),
    ).rejects.toThrow(
      "Invalid configuration: --services: unknown service dns (expected one of compute, identity, serverless, database, network, storage)",
    );
  });

  it("rejects a NaN jitter factor read from YAML", async () => {
    const filePath = await writeConfig(
      "nan.yaml",
      "retry:\n  jitter_factor: .nan\n",
    );
    await expect(
      loadConfig({ configPath: filePath, env: {}, cwd: tempDir }),
    ).rejects.toThrow(
      "Invalid configuration: retry.jitter_factor must be a number between 0 and 1",
    );
  });

  it("rejects a --timeout longer than a timer can wait", async () => {
    await expect(
      loadConfig({
        env: {},
        cwd: tempDir,
        overrides: { serviceTimeoutMs: 3_000_000_000 },
      }),
    ).rejects.toThrow(
      "Invalid configuration: --timeout must not exceed 2147483647 ms",
    );
  });

  it("rejects an unknown log level from the environment", async () => {
    await expect(
      loadConfig({ env: { SKYAUDIT_LOG_LEVEL: "loud" }, cwd: tempDir }),
    ).rejects.toThrow(
      "Invalid configuration: log level must be one of fatal, error, warn, info, debug, trace, silent",
    );
  });
});

describe("parseConfig", () => {
  it("collects every problem into one error", () => {
    expect(() =>
      parseConfig({
        bogus: 1,
        services: ["compute", "dns"],
        execution: { mode: "turbo" },
        rules: { disabled: ["storage/nope"] },
      }),
    ).toThrow(
      "Invalid configuration: configuration: unknown key bogus; " +
        "services: unknown service dns (expected one of compute, identity, serverless, database, network, storage); " +
        "execution.mode must be sequential or parallel; " +
        "rules: unknown rule storage/nope",
    );
  });

  it("rejects unknown nested keys and bad numbers", () => {
    expect(() =>
      parseConfig({
        retry: { max_attempts: 0, backoff: "fast" },
        execution: { service_timeout_ms: -5 },
      }),
    ).toThrow(
      "Invalid configuration: retry: unknown key backoff; " +
        "execution.service_timeout_ms must be a non-negative integer; " +
        "retry.max_attempts must be a positive integer",
    );
  });

  it("caps the service timeout at the largest timer delay", () => {
    expect(
      parseConfig({ execution: { service_timeout_ms: 2_147_483_647 } }).execution
        .service_timeout_ms,
    ).toBe(2_147_483_647);
    expect(() =>
      parseConfig({ execution: { service_timeout_ms: 3_000_000_000 } }),
    ).toThrow(
      "Invalid configuration: execution.service_timeout_ms must not exceed 2147483647 ms",
    );
  });

  it("rejects an unknown severity", () => {
    expect(() =>
      parseConfig({ rules: { severity: { "compute/public-ip": "critical" } } }),
    ).toThrow(
      "Invalid configuration: rules.severity.compute/public-ip must be one of info, warning, high",
    );
  });
});
