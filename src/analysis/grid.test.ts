import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeWorkDir, removeWorkDir } from "../testUtils/fixtures";
import { sampleGrid } from "../testUtils/netcdf";
import { analyseGrid, readGridFile, reshape, rhoGridTask } from "./grid";
import { AnalysisInputError } from "./io";

describe("reshape", () => {
  it("nests flat data by shape", () => {
    expect(reshape([1, 2, 3, 4, 5, 6], [2, 3])).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });
});

describe("analyseGrid", () => {
  const grid = {
    dimensions: { spin: 1, n1: 2, n2: 1, n3: 2 },
    variables: [
      { name: "cell", shape: [3, 3], data: [2, 0, 0, 0, 3, 0, 0, 0, 4] },
      { name: "gridfunc", shape: [1, 2, 1, 2], data: [1, 2, 3, 4] },
    ],
  };

  it("derives the cell geometry", () => {
    const { summary } = analyseGrid(grid, "Rho.grid.nc");

    expect(summary).toMatchObject({
      orthogonal: true,
      face_ab: 6,
      face_ac: 8,
      face_bc: 12,
      diff_a: 1,
      diff_b: 3,
      diff_c: 2,
      volume: 24,
      diff_volume: 6,
      a_grid: [0, 1],
      b_grid: [0],
      c_grid: [0, 2],
    });
  });

  it("averages the field over the planes of each axis", () => {
    const { summary, integral } = analyseGrid(grid, "Rho.grid.nc");

    expect(summary.a_average).toEqual([1.5, 3.5]);
    expect(summary.b_average).toEqual([2.5]);
    expect(summary.c_average).toEqual([2, 3]);
    expect(integral).toBe(60);
  });

  it("detects a skewed cell", () => {
    const skewed = {
      ...grid,
      variables: [{ name: "cell", shape: [3, 3], data: [2, 0, 0, 1, 3, 0, 0, 0, 4] }, grid.variables[1]],
    };
    expect(analyseGrid(skewed, "Rho.grid.nc").summary.orthogonal).toBe(false);
  });

  it("requires the grid function", () => {
    expect(() => analyseGrid({ ...grid, variables: [grid.variables[0]] }, "Rho.grid.nc")).toThrow(
      AnalysisInputError,
    );
  });
});

describe("grid files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  it("reads dimensions and variables from a NetCDF file", async () => {
    const file = path.join(dir, "Rho.grid.nc");
    await fs.writeFile(file, sampleGrid());

    const grid = await readGridFile(file);

    expect(grid.dimensions).toEqual({ xyz: 3, abc: 3, spin: 1, n1: 2, n2: 1, n3: 2 });
    expect(grid.variables).toEqual([
      { name: "cell", shape: [3, 3], data: [2, 0, 0, 0, 3, 0, 0, 0, 4] },
      { name: "gridfunc", shape: [1, 2, 1, 2], data: [1, 2, 3, 4] },
    ]);
  });

  it("rejects a file that is not NetCDF", async () => {
    const file = path.join(dir, "Rho.grid.nc");
    await fs.writeFile(file, "not a grid");

    await expect(readGridFile(file)).rejects.toThrow(AnalysisInputError);
  });

  it("writes the grid document merged with the general info", async () => {
    await fs.writeFile(path.join(dir, "Rho.grid.nc"), sampleGrid());
    await fs.writeFile(path.join(dir, "general_info.json"), JSON.stringify({ n_spin: 1, energy: -100.5 }));

    const artifact = await rhoGridTask.run({ workDir: dir, projectType: "single_point" });

    expect(artifact).toBe(path.join(dir, "Rho_grid.json"));
    const written = JSON.parse(await fs.readFile(path.join(dir, "Rho_grid.json"), "utf8"));
    expect(written.n1).toBe(2);
    expect(written.cell).toEqual([
      [2, 0, 0],
      [0, 3, 0],
      [0, 0, 4],
    ]);
    expect(written.gridfunc).toEqual([[[[1, 2]], [[3, 4]]]]);
    expect(written.volume).toBe(24);
    expect(written.energy).toBe(-100.5);
  });
});
