import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export class AnalysisInputError extends Error {
  readonly path: string;

  constructor(filePath: string, message: string) {
    super(`${path.basename(filePath)}: ${message}`);
    this.path = filePath;
    this.name = "AnalysisInputError";
  }
}

/** ASE's JSON encoding of a numpy array: `{"__ndarray__": [shape, dtype, flatValues]}`. */
export const ndarraySchema = z.object({
  __ndarray__: z.tuple([z.array(z.number().int().nonnegative()), z.string(), z.array(z.number())]),
});

export type EncodedNdarray = z.infer<typeof ndarraySchema>;

export interface Ndarray {
  shape: number[];
  data: number[];
}

export function decodeNdarray(encoded: EncodedNdarray, source: string): Ndarray {
  const [shape, , data] = encoded.__ndarray__;
  const size = shape.reduce((acc, n) => acc * n, 1);
  if (size !== data.length) {
    throw new AnalysisInputError(source, `array of shape [${shape.join(", ")}] holds ${data.length} values`);
  }
  return { shape, data };
}

export async function fileExists(filePath: string) {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function readText(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisInputError(filePath, `cannot be read (${reason})`);
  }
}

export async function readJson<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  const text = await readText(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AnalysisInputError(filePath, "is not valid JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AnalysisInputError(filePath, `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  return parsed.data;
}

export async function writeJson(filePath: string, data: unknown, indent?: number) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, indent), "utf8");
  return filePath;
}
