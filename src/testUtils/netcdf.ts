export interface FixtureDimension {
  name: string;
  size: number;
}

export interface FixtureVariable {
  name: string;
  dimensions: string[];
  data: number[];
}

const NC_DIMENSION = 10;
const NC_VARIABLE = 11;
const NC_DOUBLE = 6;

function padded(length: number) {
  return Math.ceil(length / 4) * 4;
}

/** Encodes a classic (CDF-1) NetCDF file holding double variables and no attributes. */
export function encodeNetcdf(dimensions: FixtureDimension[], variables: FixtureVariable[]): Buffer {
  const nameSize = (name: string) => 4 + padded(Buffer.byteLength(name));
  const dimListSize = 8 + dimensions.reduce((acc, dim) => acc + nameSize(dim.name) + 4, 0);
  const varListSize =
    8 + variables.reduce((acc, v) => acc + nameSize(v.name) + 4 + 4 * v.dimensions.length + 8 + 12, 0);
  const headerSize = 8 + dimListSize + 8 + varListSize;
  const dataSize = variables.reduce((acc, v) => acc + v.data.length * 8, 0);

  const buffer = Buffer.alloc(headerSize + dataSize);
  let offset = 0;
  const int = (value: number) => {
    buffer.writeInt32BE(value, offset);
    offset += 4;
  };
  const name = (value: string) => {
    const bytes = Buffer.from(value);
    int(bytes.length);
    bytes.copy(buffer, offset);
    offset += padded(bytes.length);
  };

  buffer.write("CDF", 0, "latin1");
  buffer.writeUInt8(1, 3);
  offset = 4;
  int(0);

  int(NC_DIMENSION);
  int(dimensions.length);
  for (const dim of dimensions) {
    name(dim.name);
    int(dim.size);
  }

  int(0);
  int(0);

  int(NC_VARIABLE);
  int(variables.length);
  let begin = headerSize;
  for (const variable of variables) {
    name(variable.name);
    int(variable.dimensions.length);
    for (const dimName of variable.dimensions) {
      const id = dimensions.findIndex((dim) => dim.name === dimName);
      if (id < 0) {
        throw new Error(`unknown dimension ${dimName}`);
      }
      int(id);
    }
    int(0);
    int(0);
    int(NC_DOUBLE);
    int(variable.data.length * 8);
    int(begin);
    begin += variable.data.length * 8;
  }

  for (const variable of variables) {
    for (const value of variable.data) {
      buffer.writeDoubleBE(value, offset);
      offset += 8;
    }
  }
  return buffer;
}

/** A 2x1x2 grid in an orthorhombic 2 x 3 x 4 cell. */
export function sampleGrid(values: number[] = [1, 2, 3, 4]) {
  return encodeNetcdf(
    [
      { name: "xyz", size: 3 },
      { name: "abc", size: 3 },
      { name: "spin", size: 1 },
      { name: "n1", size: 2 },
      { name: "n2", size: 1 },
      { name: "n3", size: 2 },
    ],
    [
      { name: "cell", dimensions: ["abc", "xyz"], data: [2, 0, 0, 0, 3, 0, 0, 0, 4] },
      { name: "gridfunc", dimensions: ["spin", "n1", "n2", "n3"], data: values },
    ],
  );
}
