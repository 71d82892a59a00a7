import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import { type JobDescriptor, PROJECT_TYPES, type ProjectType } from "./types/job";

const DEFAULT_PROJECT_ID = "default-project";
const DEFAULT_BACKEND_URL = "https://back.compmat.es";

function seconds(fallback: number) {
  return z.coerce.number().positive().catch(fallback);
}

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("production"),
  LOG_LEVEL: z.string().optional().default("info"),
  LOG_FILE: z.string().optional().default("project_executor.log"),
  PROJECT_ID: z.string().trim().optional(),
  TOKEN: z.string().trim().optional(),
  BACKEND_URL: z.string().url().optional().catch(undefined),
  PROJECT_TYPE: z.string().optional(),
  WORK_DIR: z.string().optional(),
  OUTPUT_FILE: z.string().optional().default("siesta.out"),
  SOLVER_COMMAND: z.string().optional().default("siesta-runner"),
  REQUEST_INTERVAL_SECONDS: seconds(10),
  GRACE_PERIOD_SECONDS: seconds(2),
  METRICS_FILE: z.string().optional(),
});

const projectTypeSchema = z.enum(PROJECT_TYPES);

export function loadConfig(source: NodeJS.ProcessEnv) {
  const env = envSchema.parse(source);
  const warnings: string[] = [];

  let projectId = env.PROJECT_ID;
  if (!projectId) {
    warnings.push(`PROJECT_ID is not set, using "${DEFAULT_PROJECT_ID}"`);
    projectId = DEFAULT_PROJECT_ID;
  }

  let token = env.TOKEN;
  if (!token) {
    warnings.push("TOKEN is not set, using a generated token");
    token = randomBytes(20).toString("hex");
  }

  if (source.BACKEND_URL && !env.BACKEND_URL) {
    warnings.push(`BACKEND_URL is not a valid URL, using ${DEFAULT_BACKEND_URL}`);
  }

  let projectType: ProjectType = "single_point";
  if (env.PROJECT_TYPE !== undefined) {
    const parsed = projectTypeSchema.safeParse(env.PROJECT_TYPE.trim().toLowerCase());
    if (parsed.success) {
      projectType = parsed.data;
    } else {
      warnings.push(`PROJECT_TYPE "${env.PROJECT_TYPE}" is not one of ${PROJECT_TYPES.join(", ")}, using "single_point"`);
    }
  }

  for (const key of ["REQUEST_INTERVAL_SECONDS", "GRACE_PERIOD_SECONDS"] as const) {
    const raw = source[key];
    if (raw !== undefined && !(Number(raw) > 0)) {
      warnings.push(`${key} "${raw}" is not a positive number, using ${env[key]}`);
    }
  }

  const workDir = path.resolve(env.WORK_DIR ?? process.cwd());

  const config = {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE.trim() ? path.resolve(workDir, env.LOG_FILE) : null,
    metricsFile: env.METRICS_FILE ? path.resolve(workDir, env.METRICS_FILE) : null,
    job: {
      projectId,
      token,
      backendUrl: (env.BACKEND_URL ?? DEFAULT_BACKEND_URL).replace(/\/$/, ""),
      projectType,
      workDir,
      outputFile: path.resolve(workDir, env.OUTPUT_FILE),
    },
    solver: {
      command: env.SOLVER_COMMAND.trim().split(/\s+/).filter(Boolean),
    },
    watcher: {
      intervalMs: env.REQUEST_INTERVAL_SECONDS * 1000,
    },
    supervisor: {
      gracePeriodMs: env.GRACE_PERIOD_SECONDS * 1000,
    },
  };

  return { config, warnings };
}

export type AppConfig = ReturnType<typeof loadConfig>["config"];

const loaded = loadConfig(process.env);

export const config: AppConfig = loaded.config;
export const configWarnings: readonly string[] = loaded.warnings;

export function buildJobDescriptor(appConfig: AppConfig): JobDescriptor {
  return Object.freeze({
    projectId: appConfig.job.projectId,
    token: appConfig.job.token,
    backendUrl: appConfig.job.backendUrl,
    projectType: appConfig.job.projectType,
    outputArtifactPath: appConfig.job.outputFile,
    workDir: appConfig.job.workDir,
  });
}
