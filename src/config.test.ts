import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildJobDescriptor, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults and reports the missing credentials", () => {
    const { config, warnings } = loadConfig({ WORK_DIR: "/tmp/job" });

    expect(config.job.projectId).toBe("default-project");
    expect(config.job.token).toMatch(/^[0-9a-f]{40}$/);
    expect(config.job.backendUrl).toBe("https://back.compmat.es");
    expect(config.job.projectType).toBe("single_point");
    expect(config.job.outputFile).toBe(path.resolve("/tmp/job", "siesta.out"));
    expect(config.watcher.intervalMs).toBe(10_000);
    expect(config.supervisor.gracePeriodMs).toBe(2_000);
    expect(config.logFile).toBe(path.resolve("/tmp/job", "project_executor.log"));
    expect(warnings).toEqual([
      'PROJECT_ID is not set, using "default-project"',
      "TOKEN is not set, using a generated token",
    ]);
  });

  it("reads the job from the environment", () => {
    const { config, warnings } = loadConfig({
      PROJECT_ID: "42",
      TOKEN: "test-secret",
      BACKEND_URL: "https://backend.test/",
      PROJECT_TYPE: "GEOMETRY_OPTIMIZATION",
      WORK_DIR: "/tmp/job",
      OUTPUT_FILE: "out/run.out",
      REQUEST_INTERVAL_SECONDS: "15",
      SOLVER_COMMAND: "mpirun  -np 4 run-siesta",
      LOG_FILE: "",
    });

    expect(warnings).toEqual([]);
    expect(config.logFile).toBeNull();
    expect(config.solver.command).toEqual(["mpirun", "-np", "4", "run-siesta"]);
    expect(config.watcher.intervalMs).toBe(15_000);
    expect(buildJobDescriptor(config)).toEqual({
      projectId: "42",
      token: "test-secret",
      backendUrl: "https://backend.test",
      projectType: "geometry_optimization",
      outputArtifactPath: path.resolve("/tmp/job", "out/run.out"),
      workDir: path.resolve("/tmp/job"),
    });
  });

  it("replaces malformed values with defaults and warns", () => {
    const { config, warnings } = loadConfig({
      PROJECT_ID: "7",
      TOKEN: "test-secret",
      PROJECT_TYPE: "relax",
      BACKEND_URL: "not a url",
      GRACE_PERIOD_SECONDS: "soon",
    });

    expect(config.job.projectType).toBe("single_point");
    expect(config.job.backendUrl).toBe("https://back.compmat.es");
    expect(config.supervisor.gracePeriodMs).toBe(2_000);
    expect(warnings).toEqual([
      "BACKEND_URL is not a valid URL, using https://back.compmat.es",
      'PROJECT_TYPE "relax" is not one of single_point, md, geometry_optimization, using "single_point"',
      'GRACE_PERIOD_SECONDS "soon" is not a positive number, using 2',
    ]);
  });

  it("freezes the job descriptor", () => {
    const { config } = loadConfig({ PROJECT_ID: "1", TOKEN: "test-secret" });
    expect(Object.isFrozen(buildJobDescriptor(config))).toBe(true);
  });
});
