import path from "node:path";
import { z } from "zod";
import { artifacts } from "../constants";
import { ndarraySchema, readJson } from "./io";

const bandStructureSchema = z.object({
  energies: ndarraySchema,
  reference: z.number(),
  path: z.object({
    kpts: ndarraySchema,
    special_points: z.record(ndarraySchema),
    labelseq: z.string(),
  }),
});

// Keys the solver wrapper writes; each is null when the calculator did not produce it.
export const calculationResultsSchema = z
  .object({
    energy: z.number().nullish(),
    fermi_energy: z.number().nullish(),
    eigenvalues: ndarraySchema.nullish(),
    bandstructure: bandStructureSchema.nullish(),
  })
  .passthrough();

export type CalculationResults = z.infer<typeof calculationResultsSchema>;
export type BandStructureData = z.infer<typeof bandStructureSchema>;

export function resultsPath(workDir: string) {
  return path.join(workDir, artifacts.results);
}

export function loadResults(workDir: string) {
  return readJson(resultsPath(workDir), calculationResultsSchema);
}
