import fs from "node:fs/promises";
import path from "node:path";
import { NetCDFReader } from "netcdfjs";
import { z } from "zod";
import { artifacts } from "../constants";
import { logger } from "../logger";
import type { AnalysisTask } from "../types/job";
import { type Vec3, cross, dot, norm, toVec3 } from "../utils/vector";
import { AnalysisInputError, readJson, writeJson } from "./io";

export interface GridVariable {
  name: string;
  shape: number[];
  data: number[];
}

export interface GridFile {
  dimensions: Record<string, number>;
  variables: GridVariable[];
}

type Nested = number | Nested[];

export function reshape(data: readonly number[], shape: readonly number[]): Nested {
  if (shape.length === 0) {
    return data[0];
  }
  const [head, ...rest] = shape;
  const stride = rest.reduce((acc, n) => acc * n, 1);
  return Array.from({ length: head }, (_, i) => reshape(data.slice(i * stride, (i + 1) * stride), rest));
}

function flattenNumbers(value: unknown, out: number[], source: string): number[] {
  if (Array.isArray(value)) {
    for (const item of value) {
      flattenNumbers(item, out, source);
    }
  } else if (typeof value === "number") {
    out.push(value);
  } else {
    throw new AnalysisInputError(source, `holds a non-numeric value (${typeof value})`);
  }
  return out;
}

export async function readGridFile(filePath: string): Promise<GridFile> {
  const buffer = await fs.readFile(filePath);
  let reader: NetCDFReader;
  try {
    reader = new NetCDFReader(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisInputError(filePath, `is not a NetCDF file (${reason})`);
  }

  const dimensions: Record<string, number> = {};
  for (const dim of reader.dimensions) {
    dimensions[dim.name] = dim.size;
  }
  const variables = reader.variables.map((variable) => {
    const shape = variable.dimensions.map((id) => reader.dimensions[id]?.size ?? 0);
    const raw: unknown = reader.getDataVariable(variable.name);
    return { name: variable.name, shape, data: flattenNumbers(raw, [], filePath) };
  });
  return { dimensions, variables };
}

function requireVariable(grid: GridFile, name: string, source: string) {
  const variable = grid.variables.find((v) => v.name === name);
  if (!variable) {
    throw new AnalysisInputError(source, `variable "${name}" is missing`);
  }
  return variable;
}

function linspaceExclusive(length: number, count: number) {
  return Array.from({ length: count }, (_, i) => (length * i) / count);
}

/**
 * Derives cell geometry (faces, spacing, volume) and the planar averages of
 * the first spin component along each lattice vector.
 */
export function analyseGrid(grid: GridFile, source: string) {
  const cellVar = requireVariable(grid, "cell", source);
  const gridVar = requireVariable(grid, "gridfunc", source);
  if (cellVar.data.length !== 9) {
    throw new AnalysisInputError(source, "cell must be a 3x3 matrix");
  }
  if (gridVar.shape.length !== 4) {
    throw new AnalysisInputError(source, `gridfunc has ${gridVar.shape.length} dimensions, expected 4`);
  }
  const [nSpin, n1, n2, n3] = gridVar.shape;
  if (!nSpin || !n1 || !n2 || !n3) {
    throw new AnalysisInputError(source, "gridfunc is empty");
  }
  const a: Vec3 = toVec3(cellVar.data, 0);
  const b: Vec3 = toVec3(cellVar.data, 3);
  const c: Vec3 = toVec3(cellVar.data, 6);

  const aAverage = new Array<number>(n1).fill(0);
  const bAverage = new Array<number>(n2).fill(0);
  const cAverage = new Array<number>(n3).fill(0);
  let total = 0;
  gridVar.data.forEach((value, index) => {
    total += value;
    if (index >= n1 * n2 * n3) {
      return;
    }
    const k = index % n3;
    const j = Math.floor(index / n3) % n2;
    const i = Math.floor(index / (n2 * n3));
    aAverage[i] += value / (n2 * n3);
    bAverage[j] += value / (n1 * n3);
    cAverage[k] += value / (n1 * n2);
  });

  const volume = dot(cross(a, b), c);
  const diffVolume = volume / (n1 * n2 * n3);
  return {
    summary: {
      orthogonal: dot(a, b) === 0 && dot(a, c) === 0 && dot(b, c) === 0,
      face_ab: norm(cross(a, b)),
      face_ac: norm(cross(a, c)),
      face_bc: norm(cross(b, c)),
      diff_a: norm(a) / n1,
      diff_b: norm(b) / n2,
      diff_c: norm(c) / n3,
      volume,
      diff_volume: diffVolume,
      a_grid: linspaceExclusive(norm(a), n1),
      b_grid: linspaceExclusive(norm(b), n2),
      c_grid: linspaceExclusive(norm(c), n3),
      a_average: aAverage,
      b_average: bAverage,
      c_average: cAverage,
    },
    integral: diffVolume * total,
  };
}

const generalInfoSchema = z.record(z.union([z.number(), z.null()]));

function gridTask(name: string, input: string, output: string, quantity: string): AnalysisTask {
  return {
    name,
    requiredInputs: [input, artifacts.generalInfo],
    async run({ workDir }) {
      const source = path.join(workDir, input);
      const grid = await readGridFile(source);
      const { summary, integral } = analyseGrid(grid, source);
      const generalInfo = await readJson(path.join(workDir, artifacts.generalInfo), generalInfoSchema);
      logger.info({ task: name, [quantity]: integral }, `Integrated ${quantity} over the grid`);

      const document: Record<string, unknown> = { ...grid.dimensions };
      for (const variable of grid.variables) {
        document[variable.name] = reshape(variable.data, variable.shape);
      }
      Object.assign(document, summary, generalInfo);
      return writeJson(path.join(workDir, output), document);
    },
  };
}

export const rhoGridTask = gridTask("rho_grid", artifacts.rhoGrid, artifacts.rhoGridJson, "total_charge");

export const potentialGridTask = gridTask(
  "potential_grid",
  artifacts.potentialGrid,
  artifacts.potentialGridJson,
  "potential_integral",
);
