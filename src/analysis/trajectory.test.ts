import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { H2_RELAXATION, encodeTrajectory } from "../testUtils/aseTrajectory";
import { makeWorkDir, removeWorkDir } from "../testUtils/fixtures";
import { AnalysisInputError } from "./io";
import { readTrajectory, summariseTrajectory, trajectoryTask } from "./trajectory";

describe("readTrajectory", () => {
  it("reads every frame", () => {
    const frames = readTrajectory(encodeTrajectory(H2_RELAXATION), "geometry_optimization.traj");

    expect(frames).toHaveLength(2);
    expect(frames[0].energy).toBe(-50.25);
    expect(frames[0].positions[1]).toEqual([0, 0, 0.74]);
    expect(frames[1].forces).toEqual([
      [0, 0, 0.1],
      [0, 0, -0.1],
    ]);
  });

  it("requires an energy on every frame", () => {
    const [first, second] = H2_RELAXATION;
    const buffer = encodeTrajectory([first, { positions: second.positions, forces: second.forces }]);

    expect(() => readTrajectory(buffer, "geometry_optimization.traj")).toThrow(
      "geometry_optimization.traj: frame 2 has no energy",
    );
  });

  it("requires forces", () => {
    const buffer = encodeTrajectory([{ energy: -1, positions: [[0, 0, 0]] }]);

    expect(() => readTrajectory(buffer, "geometry_optimization.traj")).toThrow("frame 1 has no forces");
  });

  it("rejects files that are not ASE trajectories", () => {
    expect(() => readTrajectory(Buffer.from("1\nenergy=-1\nH 0 0 0\n"), "geometry_optimization.traj")).toThrow(
      AnalysisInputError,
    );
    expect(() =>
      readTrajectory(encodeTrajectory(H2_RELAXATION, "ASE-Bundle"), "geometry_optimization.traj"),
    ).toThrow('has tag "ASE-Bundle", expected "ASE-Trajectory"');
  });

  it("rejects a truncated file", () => {
    const buffer = encodeTrajectory(H2_RELAXATION);

    expect(() => readTrajectory(buffer.subarray(0, buffer.length - 8), "geometry_optimization.traj")).toThrow(
      AnalysisInputError,
    );
  });
});

describe("summariseTrajectory", () => {
  it("reports the magnitude of the summed forces per step", () => {
    const { steps } = summariseTrajectory(readTrajectory(encodeTrajectory(H2_RELAXATION), "geometry_optimization.traj"));

    expect(steps.map((s) => s.step)).toEqual([1, 2]);
    expect(steps[0].force_magnitude).toBeCloseTo(0.5);
    expect(steps[1].force_magnitude).toBe(0);
    expect(steps[1].energy).toBe(-50.5);
  });
});

describe("trajectoryTask", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  it("writes trajectory_analysis.json", async () => {
    await fs.writeFile(path.join(dir, "geometry_optimization.traj"), encodeTrajectory(H2_RELAXATION));

    const artifact = await trajectoryTask.run({ workDir: dir, projectType: "geometry_optimization" });

    expect(artifact).toBe(path.join(dir, "trajectory_analysis.json"));
    const written = JSON.parse(await fs.readFile(path.join(dir, "trajectory_analysis.json"), "utf8"));
    expect(written.steps).toHaveLength(2);
    expect(written.steps[0].positions[0]).toEqual([0, 0, 0]);
  });

  it("fails on a trajectory without frames", async () => {
    await fs.writeFile(path.join(dir, "geometry_optimization.traj"), encodeTrajectory([]));

    await expect(trajectoryTask.run({ workDir: dir, projectType: "geometry_optimization" })).rejects.toThrow(
      "holds no frames",
    );
  });
});
