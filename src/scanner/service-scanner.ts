import type { Logger } from "pino";
import { createScanFailure, describeError } from "./finding-factory.js";
import { ScanTimeoutError, rejectOnAbort } from "./scan-timeout.js";
import type {
  ConfigurationFinding,
  RuleDescriptor,
  RuleSource,
  Service,
  ServiceResult,
} from "./types.js";

export interface ServiceScannerOptions {
  readonly service: Service;
  readonly sources: readonly RuleSource[];
  readonly logger: Logger;
  /** Zero or absent disables the timeout. */
  readonly timeoutMs?: number;
}

/**
 * Drives the rule sources of one service. `scan` never rejects: an error from
 * any lister ends this service's scan with one scan failure, keeping the
 * findings gathered before it.
 */
export class ServiceScanner {
  readonly service: Service;
  private readonly sources: readonly RuleSource[];
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: ServiceScannerOptions) {
    this.service = options.service;
    this.sources = options.sources;
    this.logger = options.logger.child({ service: options.service });
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  get rules(): readonly RuleDescriptor[] {
    return this.sources.flatMap((source) => source.rules);
  }

  async scan(): Promise<ServiceResult> {
    const startedAt = Date.now();
    const findings: ConfigurationFinding[] = [];
    const progress = { kind: this.sources[0]?.kind ?? "resources" };
    const controller = new AbortController();
    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => {
            controller.abort(new ScanTimeoutError(this.service, this.timeoutMs));
          }, this.timeoutMs)
        : undefined;

    this.logger.info({ sources: this.sources.length }, "service scan started");
    try {
      await Promise.race([
        this.collect(findings, progress, controller.signal),
        rejectOnAbort(controller.signal),
      ]);
      const duration_ms = Date.now() - startedAt;
      this.logger.info(
        { findings: findings.length, duration_ms },
        "service scan completed",
      );
      return {
        status: "completed",
        service: this.service,
        findings,
        duration_ms,
      };
    } catch (error) {
      if (!controller.signal.aborted) {
        controller.abort(error);
      }
      const failure = createScanFailure(this.service, progress.kind, error);
      const duration_ms = Date.now() - startedAt;
      this.logger.error(
        { resource_kind: progress.kind, error: describeError(error), duration_ms },
        "service scan failed",
      );
      return {
        status: "failed",
        service: this.service,
        findings: [...findings],
        failure,
        duration_ms,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async collect(
    findings: ConfigurationFinding[],
    progress: { kind: string },
    signal: AbortSignal,
  ): Promise<void> {
    for (const source of this.sources) {
      progress.kind = source.kind;
      let resources = 0;
      for await (const evaluated of source.evaluateAll(this.service, signal)) {
        resources += 1;
        this.logger.debug(
          { resource_id: evaluated.resource_id, findings: evaluated.findings.length },
          "resource evaluated",
        );
        for (const finding of evaluated.findings) {
          this.logger.debug(
            { rule_id: finding.rule_id, resource_id: finding.resource_id },
            finding.message,
          );
          findings.push(finding);
        }
      }
      this.logger.debug({ resource_kind: source.kind, resources }, "source done");
    }
  }
}
