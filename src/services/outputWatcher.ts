import fs from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../logger";
import { recordWatcherError } from "../metrics";
import type { StatusUpdate, WatchState } from "../types/job";
import { type StatusReporter, sendStatusUpdate } from "./statusReporter";

export interface OutputWatcherOptions {
  path: string;
  projectId: string;
  token: string;
  backendUrl: string;
  intervalMs: number;
  reporter?: StatusReporter;
}

function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readModificationTime(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mtimeMs;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Reports `running` whenever the watched artifact's modification time moves
 * forward. The loop only ends through the abort signal given to `watch`.
 */
export class OutputWatcher {
  private state: WatchState | null = null;
  private readonly reporter: StatusReporter;

  constructor(private readonly options: OutputWatcherOptions) {
    this.reporter = options.reporter ?? sendStatusUpdate;
  }

  get lastSeenModificationTime() {
    return this.state?.lastSeenModificationTime ?? 0;
  }

  async init() {
    let initial = 0;
    try {
      initial = (await readModificationTime(this.options.path)) ?? 0;
    } catch (err) {
      recordWatcherError("stat");
      logger.warn({ err, path: this.options.path }, "Could not stat output artifact, starting from zero");
    }
    this.state = { path: this.options.path, lastSeenModificationTime: initial };
  }

  async watch(signal: AbortSignal) {
    if (!this.state) {
      await this.init();
    }
    logger.info(
      { projectId: this.options.projectId, path: this.options.path, intervalMs: this.options.intervalMs },
      "Output watcher started",
    );
    while (!signal.aborted) {
      try {
        await sleep(this.options.intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
      await this.poll(signal);
    }
    logger.info({ projectId: this.options.projectId }, "Output watcher stopped");
  }

  /** Runs one check. Returns true when a `running` update was sent. */
  async poll(signal?: AbortSignal): Promise<boolean> {
    if (!this.state) {
      await this.init();
    }
    const state = this.state ?? { path: this.options.path, lastSeenModificationTime: 0 };

    let mtime: number | null;
    try {
      mtime = await readModificationTime(state.path);
    } catch (err) {
      recordWatcherError("stat");
      logger.error({ err, path: state.path, projectId: this.options.projectId }, "Failed to stat output artifact");
      return false;
    }
    if (mtime === null || mtime <= state.lastSeenModificationTime) {
      return false;
    }

    const update: StatusUpdate = {
      projectId: this.options.projectId,
      status: "running",
      token: this.options.token,
      backendUrl: this.options.backendUrl,
    };
    let delivered = false;
    try {
      delivered = await this.reporter(update, { signal });
    } catch (err) {
      logger.error({ err, projectId: this.options.projectId }, "Status reporter threw");
    }
    if (!delivered) {
      recordWatcherError("report");
    }
    this.state = { path: state.path, lastSeenModificationTime: mtime };
    logger.info({ projectId: this.options.projectId, mtime, delivered }, "Output artifact modified, update sent");
    return true;
  }
}
