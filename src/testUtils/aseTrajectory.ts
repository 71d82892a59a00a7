import type { Vec3 } from "../utils/vector";

export interface FixtureFrame {
  positions: Vec3[];
  forces?: Vec3[];
  energy?: number;
}

function int64(value: number) {
  const bytes = Buffer.alloc(8);
  bytes.writeBigInt64LE(BigInt(value));
  return bytes;
}

function doubles(rows: readonly Vec3[]) {
  const bytes = Buffer.alloc(rows.length * 24);
  rows.flat().forEach((value, i) => bytes.writeDoubleLE(value, i * 8));
  return bytes;
}

/**
 * Encodes frames the way ASE's trajectory writer lays them out: array bytes,
 * then the item's length-prefixed JSON, with the offsets table at the end.
 */
export function encodeTrajectory(frames: readonly FixtureFrame[], tag = "ASE-Trajectory"): Buffer {
  const chunks: Buffer[] = [];
  let offset = 48;
  const push = (chunk: Buffer) => {
    chunks.push(chunk);
    offset += chunk.length;
    return offset - chunk.length;
  };
  const arrayRef = (rows: readonly Vec3[]) => ({ ndarray: [[rows.length, 3], "float64", push(doubles(rows))] });

  const itemOffsets = frames.map((frame, index) => {
    const item: Record<string, unknown> = index === 0 ? { version: 1, ase_version: "3.23.0" } : {};
    item.pbc = [true, true, true];
    item.cell = arrayRef([
      [10, 0, 0],
      [0, 10, 0],
      [0, 0, 10],
    ]);
    item.positions = arrayRef(frame.positions);
    const calculator: Record<string, unknown> = { name: "siesta" };
    if (frame.energy !== undefined) {
      calculator.energy = frame.energy;
    }
    if (frame.forces) {
      calculator.forces = arrayRef(frame.forces);
    }
    item["calculator."] = calculator;

    const json = Buffer.from(JSON.stringify(item));
    const at = push(int64(json.length));
    push(json);
    return at;
  });
  const offsetsAt = push(Buffer.concat(itemOffsets.map(int64)));

  const header = Buffer.alloc(48);
  header.write("- of Ulm", 0, "latin1");
  header.write(tag.padEnd(16), 8, "latin1");
  header.writeBigInt64LE(BigInt(3), 24);
  header.writeBigInt64LE(BigInt(frames.length), 32);
  header.writeBigInt64LE(BigInt(offsetsAt), 40);
  return Buffer.concat([header, ...chunks]);
}

/** Two relaxation steps of an H2 molecule. */
export const H2_RELAXATION: FixtureFrame[] = [
  {
    energy: -50.25,
    positions: [
      [0, 0, 0],
      [0, 0, 0.74],
    ],
    forces: [
      [0.1, 0.2, 0],
      [0.2, 0.2, 0],
    ],
  },
  {
    energy: -50.5,
    positions: [
      [0, 0, 0.01],
      [0, 0, 0.73],
    ],
    forces: [
      [0, 0, 0.1],
      [0, 0, -0.1],
    ],
  },
];
