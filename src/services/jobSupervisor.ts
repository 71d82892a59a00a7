import { setTimeout as delay } from "node:timers/promises";
import type { AnalysisDispatcher } from "../analysis/dispatcher";
import { logger } from "../logger";
import { recordJobOutcome } from "../metrics";
import type {
  AnalysisTaskReport,
  CompletionResult,
  JobDescriptor,
  JobOutcome,
  JobStatus,
} from "../types/job";
import type { CompletionDetector } from "./completionDetector";
import type { ComputationRunner } from "./computation";
import { OutputWatcher } from "./outputWatcher";
import type { StatusReporter } from "./statusReporter";

export interface Watcher {
  watch(signal: AbortSignal): Promise<void>;
}

export interface JobSupervisorDeps {
  computation: ComputationRunner;
  reporter: StatusReporter;
  detectCompletion: CompletionDetector;
  runAnalysis: AnalysisDispatcher;
  /** Settle time between the solver exiting and the completion check. */
  gracePeriodMs: number;
  /** Watcher polling interval; also the pause before the terminal `completed` update. */
  reportIntervalMs: number;
  createWatcher?: (descriptor: JobDescriptor) => Watcher;
  sleep?: (ms: number) => Promise<void>;
}

interface TerminalUpdate {
  status: JobStatus;
  delivered: boolean;
}

function describe(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class JobSupervisor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly createWatcher: (descriptor: JobDescriptor) => Watcher;

  constructor(private readonly deps: JobSupervisorDeps) {
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.createWatcher =
      deps.createWatcher ??
      ((descriptor) =>
        new OutputWatcher({
          path: descriptor.outputArtifactPath,
          projectId: descriptor.projectId,
          token: descriptor.token,
          backendUrl: descriptor.backendUrl,
          intervalMs: deps.reportIntervalMs,
          reporter: deps.reporter,
        }));
  }

  private async sendTerminal(descriptor: JobDescriptor, status: JobStatus): Promise<TerminalUpdate> {
    try {
      const delivered = await this.deps.reporter({
        projectId: descriptor.projectId,
        status,
        token: descriptor.token,
        backendUrl: descriptor.backendUrl,
      });
      return { status, delivered };
    } catch (err) {
      logger.error({ err, projectId: descriptor.projectId, status }, "Status reporter threw");
      return { status, delivered: false };
    }
  }

  /**
   * Runs one job end to end. Always attempts exactly one terminal status
   * update and never rejects.
   */
  async run(descriptor: JobDescriptor): Promise<JobOutcome> {
    const log = logger.child({ projectId: descriptor.projectId, projectType: descriptor.projectType });
    const watcherControl = new AbortController();
    let completion: CompletionResult = { outcome: "FAILURE", reason: "job did not reach the completion check" };
    let analysis: AnalysisTaskReport[] = [];
    let terminal: TerminalUpdate | null = null;

    log.info({ workDir: descriptor.workDir }, "Starting job");
    try {
      // Built before the computation so a failure here leaves no promise behind.
      const watcher = this.createWatcher(descriptor);
      const computation = this.deps.computation(descriptor.projectType);
      void watcher
        .watch(watcherControl.signal)
        .catch((err) => log.error({ err }, "Output watcher crashed"));

      let computationFailure: string | null = null;
      try {
        const result = await computation;
        if (result.exitCode !== 0) {
          computationFailure = result.signal
            ? `computation terminated by ${result.signal}`
            : `computation exited with code ${result.exitCode}`;
        }
      } catch (err) {
        computationFailure = `computation crashed: ${describe(err)}`;
      }

      await this.sleep(this.deps.gracePeriodMs);
      watcherControl.abort();

      completion = computationFailure
        ? { outcome: "FAILURE", reason: computationFailure }
        : await this.deps.detectCompletion(descriptor.projectType, descriptor.outputArtifactPath, descriptor.workDir);

      if (completion.outcome === "SUCCESS") {
        analysis = await this.deps.runAnalysis(descriptor.projectType, descriptor.workDir);
        // Let the watcher's last `running` update land first.
        await this.sleep(this.deps.reportIntervalMs);
        terminal = await this.sendTerminal(descriptor, "completed");
      } else {
        log.error({ reason: completion.reason }, "Job failed");
        terminal = await this.sendTerminal(descriptor, "failed");
      }
    } catch (err) {
      log.error({ err }, "Job supervision failed");
      completion = { outcome: "FAILURE", reason: `supervisor error: ${describe(err)}` };
    } finally {
      watcherControl.abort();
    }

    if (terminal === null) {
      terminal = await this.sendTerminal(descriptor, "failed");
    }

    recordJobOutcome(completion.outcome);
    log.info(
      { outcome: completion.outcome, terminalStatus: terminal.status, delivered: terminal.delivered },
      "Job finished",
    );
    return {
      completion,
      analysis,
      terminalStatus: terminal.status,
      terminalDelivered: terminal.delivered,
    };
  }
}
