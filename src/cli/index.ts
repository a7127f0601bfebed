#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { MAX_SCAN_TIMEOUT_MS } from "../scanner/scan-timeout.js";
import {
  parseFormat,
  parseList,
  parseNonNegativeInteger,
  parseRulesFormat,
  parseShow,
} from "./options.js";
import { runRulesCommand } from "./rules-command.js";
import { runScanCommand } from "./scan-command.js";

interface ScanFlags {
  readonly format: string;
  readonly out?: string;
  readonly region?: string;
  readonly services?: string;
  readonly config?: string;
  readonly parallel?: boolean;
  readonly timeout?: string;
  readonly logLevel?: string;
  readonly show: string;
  readonly maxFindings?: string;
}

interface RulesFlags {
  readonly format: string;
  readonly config?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("skyaudit")
  .description("Read-only AWS security posture scanner")
  .version(toolVersion);

program
  .command("scan")
  .description("Scan the account the current credentials resolve to")
  .option("--format <format>", "Output format (text|json|sarif)", "text")
  .option("--out <file>", "Write report to file")
  .option("--region <region>", "AWS region to scan")
  .option("--services <list>", "Comma separated services to scan")
  .option("--config <path>", "Configuration file")
  .option("--parallel", "Scan services concurrently")
  .option("--timeout <ms>", "Per-service timeout in milliseconds (0 disables)")
  .option("--log-level <level>", "Log level written to stderr")
  .option("--show <section>", "Output sections (summary|findings|all)", "all")
  .option("--max-findings <number>", "Limit findings per service in output")
  .action(async (flags: ScanFlags) => {
    try {
      const result = await runScanCommand(
        {
          format: parseFormat(flags.format),
          out: flags.out,
          region: flags.region,
          services: parseList(flags.services),
          configPath: flags.config,
          parallel: flags.parallel,
          timeoutMs: parseNonNegativeInteger(
            flags.timeout,
            "--timeout",
            MAX_SCAN_TIMEOUT_MS,
          ),
          logLevel: flags.logLevel,
          show: parseShow(flags.show),
          maxFindings: parseNonNegativeInteger(
            flags.maxFindings,
            "--max-findings",
          ),
        },
        toolVersion,
      );
      if (!flags.out) {
        await writeStdout(result.output + "\n");
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("rules")
  .description("List the rules a scan applies")
  .option("--format <format>", "Output format (text|json)", "text")
  .option("--config <path>", "Configuration file")
  .action(async (flags: RulesFlags) => {
    try {
      const output = await runRulesCommand({
        format: parseRulesFormat(flags.format),
        configPath: flags.config,
      });
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
