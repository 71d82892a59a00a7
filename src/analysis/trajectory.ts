import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { artifacts } from "../constants";
import type { AnalysisTask } from "../types/job";
import { type Vec3, norm } from "../utils/vector";
import { AnalysisInputError, writeJson } from "./io";

export interface TrajectoryFrame {
  energy: number;
  forces: Vec3[];
  positions: Vec3[];
}

export interface TrajectoryStep {
  step: number;
  energy: number;
  force_magnitude: number;
  positions: Vec3[];
}

const ULM_MAGIC = "- of Ulm";
const TRAJECTORY_TAG = "ASE-Trajectory";
const HEADER_SIZE = 48;

// Arrays are stored as raw bytes; the item's JSON only points at them.
const arrayRefSchema = z.object({
  ndarray: z.tuple([z.array(z.number().int().nonnegative()), z.string(), z.number().int().nonnegative()]),
});

type ArrayRef = z.infer<typeof arrayRefSchema>;

const frameSchema = z.object({
  _little_endian: z.boolean().optional(),
  positions: arrayRefSchema,
  "calculator.": z
    .object({
      energy: z.number().optional(),
      free_energy: z.number().optional(),
      forces: arrayRefSchema.optional(),
    })
    .optional(),
});

function readInt(buffer: Buffer, at: number, source: string) {
  if (at < 0 || at + 8 > buffer.length) {
    throw new AnalysisInputError(source, `is truncated at byte ${at}`);
  }
  const value = Number(buffer.readBigInt64LE(at));
  if (value < 0) {
    throw new AnalysisInputError(source, `holds a negative offset at byte ${at}`);
  }
  return value;
}

function readVectors(buffer: Buffer, ref: ArrayRef, littleEndian: boolean, source: string, what: string): Vec3[] {
  const [shape, dtype, offset] = ref.ndarray;
  if (shape.length !== 2 || shape[1] !== 3) {
    throw new AnalysisInputError(source, `${what} has shape [${shape.join(", ")}], expected [n, 3]`);
  }
  const width = dtype === "float64" ? 8 : dtype === "float32" ? 4 : 0;
  if (!width) {
    throw new AnalysisInputError(source, `${what} has unsupported dtype ${dtype}`);
  }
  if (offset + shape[0] * 3 * width > buffer.length) {
    throw new AnalysisInputError(source, `${what} runs past the end of the file`);
  }
  const read = (at: number) => {
    if (width === 8) {
      return littleEndian ? buffer.readDoubleLE(at) : buffer.readDoubleBE(at);
    }
    return littleEndian ? buffer.readFloatLE(at) : buffer.readFloatBE(at);
  };
  return Array.from({ length: shape[0] }, (_, row): Vec3 => {
    const at = offset + row * 3 * width;
    return [read(at), read(at + width), read(at + 2 * width)];
  });
}

/**
 * Reads an ASE trajectory (ULM container): a fixed header, then one JSON
 * item per frame whose arrays point at raw bytes elsewhere in the file.
 */
export function readTrajectory(buffer: Buffer, source: string): TrajectoryFrame[] {
  if (buffer.length < HEADER_SIZE || buffer.toString("latin1", 0, 8) !== ULM_MAGIC) {
    throw new AnalysisInputError(source, "is not an ASE trajectory");
  }
  const tag = buffer.toString("latin1", 8, 24).trimEnd();
  if (tag !== TRAJECTORY_TAG) {
    throw new AnalysisInputError(source, `has tag "${tag}", expected "${TRAJECTORY_TAG}"`);
  }
  const nItems = readInt(buffer, 32, source);
  const offsetsAt = readInt(buffer, 40, source);

  const frames: TrajectoryFrame[] = [];
  for (let index = 0; index < nItems; index += 1) {
    const frameNumber = index + 1;
    const itemAt = readInt(buffer, offsetsAt + index * 8, source);
    const size = readInt(buffer, itemAt, source);
    if (itemAt + 8 + size > buffer.length) {
      throw new AnalysisInputError(source, `frame ${frameNumber} runs past the end of the file`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(buffer.toString("utf8", itemAt + 8, itemAt + 8 + size));
    } catch (error) {
      throw new AnalysisInputError(source, `frame ${frameNumber} is not valid JSON`);
    }
    const parsed = frameSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new AnalysisInputError(source, `frame ${frameNumber}: ${issue.path.join(".")}: ${issue.message}`);
    }
    const item = parsed.data;
    const littleEndian = item._little_endian ?? true;
    const calculator = item["calculator."];
    const energy = calculator?.energy ?? calculator?.free_energy;
    if (energy === undefined) {
      throw new AnalysisInputError(source, `frame ${frameNumber} has no energy`);
    }
    if (!calculator?.forces) {
      throw new AnalysisInputError(source, `frame ${frameNumber} has no forces`);
    }
    const positions = readVectors(buffer, item.positions, littleEndian, source, `frame ${frameNumber} positions`);
    const forces = readVectors(buffer, calculator.forces, littleEndian, source, `frame ${frameNumber} forces`);
    if (forces.length !== positions.length) {
      throw new AnalysisInputError(
        source,
        `frame ${frameNumber} has ${forces.length} forces for ${positions.length} atoms`,
      );
    }
    frames.push({ energy, forces, positions });
  }
  return frames;
}

export function summariseTrajectory(frames: readonly TrajectoryFrame[]): { steps: TrajectoryStep[] } {
  return {
    steps: frames.map((frame, index) => {
      const total: Vec3 = [0, 0, 0];
      for (const f of frame.forces) {
        total[0] += f[0];
        total[1] += f[1];
        total[2] += f[2];
      }
      return {
        step: index + 1,
        energy: frame.energy,
        force_magnitude: norm(total),
        positions: frame.positions,
      };
    }),
  };
}

export const trajectoryTask: AnalysisTask = {
  name: "trajectory",
  requiredInputs: [artifacts.trajectory],
  async run({ workDir }) {
    const source = path.join(workDir, artifacts.trajectory);
    const frames = readTrajectory(await fs.readFile(source), source);
    if (!frames.length) {
      throw new AnalysisInputError(source, "holds no frames");
    }
    return writeJson(path.join(workDir, artifacts.trajectoryJson), summariseTrajectory(frames), 4);
  },
};
