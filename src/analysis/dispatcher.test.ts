import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  PDOS_XML,
  SINGLE_POINT_OUTPUTS,
  makeWorkDir,
  removeWorkDir,
  writeSinglePointArtifacts,
} from "../testUtils/fixtures";
import type { AnalysisTask } from "../types/job";
import { ANALYSIS_TASKS, runAnalysis } from "./dispatcher";

describe("runAnalysis", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  it("keeps going after a failing task", async () => {
    const ran: string[] = [];
    const tasks: AnalysisTask[] = [
      {
        name: "writes",
        requiredInputs: [],
        async run({ workDir }) {
          ran.push("writes");
          return path.join(workDir, "out.json");
        },
      },
      {
        name: "throws",
        requiredInputs: [],
        async run() {
          ran.push("throws");
          throw new Error("bad input");
        },
      },
      {
        name: "needs_input",
        requiredInputs: ["absent.dat"],
        async run() {
          ran.push("needs_input");
          return null;
        },
      },
      {
        name: "nothing_to_do",
        requiredInputs: [],
        async run() {
          ran.push("nothing_to_do");
          return null;
        },
      },
    ];

    const reports = await runAnalysis("single_point", dir, tasks);

    expect(ran).toEqual(["writes", "throws", "nothing_to_do"]);
    expect(reports.map(({ name, status, artifact, error }) => ({ name, status, artifact, error }))).toEqual([
      { name: "writes", status: "completed", artifact: path.join(dir, "out.json"), error: undefined },
      { name: "throws", status: "failed", artifact: undefined, error: "bad input" },
      { name: "needs_input", status: "failed", artifact: undefined, error: "missing input absent.dat" },
      { name: "nothing_to_do", status: "skipped", artifact: undefined, error: undefined },
    ]);
  });

  it("runs nothing for molecular dynamics", async () => {
    expect(ANALYSIS_TASKS.md).toEqual([]);
    await expect(runAnalysis("md", dir)).resolves.toEqual([]);
  });

  it("runs the single point tasks in order and writes every artifact", async () => {
    await writeSinglePointArtifacts(dir);

    const reports = await runAnalysis("single_point", dir);

    expect(reports.map((r) => [r.name, r.status])).toEqual([
      ["general_info", "completed"],
      ["band_structure", "completed"],
      ["dos", "completed"],
      ["rho_grid", "completed"],
      ["potential_grid", "completed"],
      ["pdos", "completed"],
    ]);
    expect(reports.map((r) => r.artifact)).toEqual(SINGLE_POINT_OUTPUTS.map((name) => path.join(dir, name)));
    for (const name of SINGLE_POINT_OUTPUTS) {
      await expect(fs.stat(path.join(dir, name))).resolves.toBeTruthy();
    }
  });

  it("fails only the PDOS task when an orbital has the wrong sample count", async () => {
    const xml = PDOS_XML.replace("0.1 0.2 0.3 0.4 0.5 0.6", "0.1 0.2 0.3 0.4 0.5");
    await writeSinglePointArtifacts(dir, { "siesta.PDOS.xml": xml });

    const reports = await runAnalysis("single_point", dir);

    expect(reports.map((r) => [r.name, r.status])).toEqual([
      ["general_info", "completed"],
      ["band_structure", "completed"],
      ["dos", "completed"],
      ["rho_grid", "completed"],
      ["potential_grid", "completed"],
      ["pdos", "failed"],
    ]);
    expect(reports[5].error).toMatch(/has 5 samples, expected 6/);
    await expect(fs.stat(path.join(dir, "pdos_data.json"))).rejects.toThrow(/ENOENT/);
  });

  it("reports an unreadable PDOS document", async () => {
    await writeSinglePointArtifacts(dir, { "siesta.PDOS.xml": "<pdos><nspin>1</nspin>" });

    const reports = await runAnalysis("single_point", dir);

    expect(reports.filter((r) => r.status === "failed").map((r) => r.name)).toEqual(["pdos"]);
  });

  it("fails the grid tasks when general info could not be produced", async () => {
    await writeSinglePointArtifacts(dir);
    await fs.rm(path.join(dir, "siesta.out"));

    const reports = await runAnalysis("single_point", dir);
    const byName = Object.fromEntries(reports.map((r) => [r.name, r]));

    expect(byName.general_info.error).toBe("missing input siesta.out");
    expect(byName.rho_grid.error).toBe("missing input general_info.json");
    expect(byName.dos.status).toBe("completed");
  });
});
