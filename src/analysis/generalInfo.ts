import path from "node:path";
import { artifacts } from "../constants";
import type { AnalysisTask } from "../types/job";
import { roundTo } from "../utils/vector";
import { AnalysisInputError, decodeNdarray, readText, writeJson } from "./io";
import { loadResults, resultsPath } from "./results";

export interface SolverOutputSummary {
  number_of_electrons: number | null;
  Total_force: number | null;
}

const ELECTRONS_MARKER = "Total number of electrons:";
const TOTAL_FORCE_PREFIX = "   Tot   ";

/** Pulls the electron count and the final total force from the solver's text output. */
export function parseSolverOutput(text: string): SolverOutputSummary {
  let electrons: number | null = null;
  let lastTotLine: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.includes(ELECTRONS_MARKER)) {
      const fields = line.trim().split(/\s+/);
      const value = Number(fields[fields.length - 1]);
      electrons = Number.isFinite(value) ? value : electrons;
    } else if (line.startsWith(TOTAL_FORCE_PREFIX)) {
      lastTotLine = line;
    }
  }

  let totalForce: number | null = null;
  if (lastTotLine) {
    const fields = lastTotLine.trim().split(/\s+/);
    const components = fields.slice(1).map(Number);
    if (fields.length === 4 && components.every(Number.isFinite)) {
      const [x, y, z] = components;
      totalForce = roundTo(Math.sqrt(x * x + y * y + z * z), 6);
    }
  }

  return { number_of_electrons: electrons, Total_force: totalForce };
}

export async function extractGeneralInfo(workDir: string) {
  const results = await loadResults(workDir);
  if (!results.eigenvalues) {
    throw new AnalysisInputError(resultsPath(workDir), "eigenvalues are missing");
  }
  const { shape } = decodeNdarray(results.eigenvalues, resultsPath(workDir));
  if (shape.length !== 3) {
    throw new AnalysisInputError(resultsPath(workDir), `eigenvalues have ${shape.length} dimensions, expected 3`);
  }
  const [nSpin, nK, nEig] = shape;

  const solver = parseSolverOutput(await readText(path.join(workDir, artifacts.solverOutput)));

  const info: Record<string, number | null> = {
    n_spin: nSpin,
    n_k: nK,
    n_eig: nEig,
    fermi_energy: results.fermi_energy ?? null,
    energy: results.energy ?? null,
    number_of_electrons: solver.number_of_electrons,
    norm_of_force: solver.Total_force,
    Total_force: solver.Total_force,
  };
  if (nSpin && nK && nEig && solver.number_of_electrons) {
    info.n_occupied = nSpin * (solver.number_of_electrons / 2);
  }
  return info;
}

export const generalInfoTask: AnalysisTask = {
  name: "general_info",
  requiredInputs: [artifacts.results, artifacts.solverOutput],
  async run({ workDir }) {
    const info = await extractGeneralInfo(workDir);
    return writeJson(path.join(workDir, artifacts.generalInfo), info);
  },
};
