export const PROJECT_TYPES = ["single_point", "md", "geometry_optimization"] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export type JobStatus = "running" | "completed" | "failed";

export interface JobDescriptor {
  readonly projectId: string;
  readonly token: string;
  readonly backendUrl: string;
  readonly projectType: ProjectType;
  readonly outputArtifactPath: string;
  readonly workDir: string;
}

export interface StatusUpdate {
  projectId: string;
  status: JobStatus;
  token: string;
  backendUrl: string;
}

export interface WatchState {
  path: string;
  lastSeenModificationTime: number;
}

export type CompletionOutcome = "SUCCESS" | "FAILURE";

export interface CompletionResult {
  outcome: CompletionOutcome;
  reason: string;
}

export interface ComputationResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface AnalysisContext {
  workDir: string;
  projectType: ProjectType;
}

export interface AnalysisTask {
  name: string;
  /** File names relative to the working directory that must exist before `run`. */
  requiredInputs: readonly string[];
  /** Resolves the path of the artifact written, or null when there was nothing to process. */
  run(context: AnalysisContext): Promise<string | null>;
}

export type AnalysisTaskStatus = "completed" | "skipped" | "failed";

export interface AnalysisTaskReport {
  name: string;
  status: AnalysisTaskStatus;
  artifact?: string;
  error?: string;
  durationMs: number;
}

export interface JobOutcome {
  completion: CompletionResult;
  analysis: AnalysisTaskReport[];
  terminalStatus: JobStatus;
  terminalDelivered: boolean;
}
