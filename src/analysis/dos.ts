import path from "node:path";
import { artifacts } from "../constants";
import type { AnalysisTask } from "../types/job";
import { trapezoid } from "../utils/vector";
import { AnalysisInputError, decodeNdarray, readText, writeJson } from "./io";
import { type CalculationResults, loadResults, resultsPath } from "./results";

export interface DosTable {
  energy: number[];
  columns: number[][];
}

export function parseDosTable(text: string, source: string): DosTable {
  const rows = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((line, index) => {
      const values = line.split(/\s+/).map(Number);
      if (values.length < 2 || !values.every(Number.isFinite)) {
        throw new AnalysisInputError(source, `row ${index + 1} is not a numeric DOS row`);
      }
      return values;
    });

  if (rows.length < 2) {
    throw new AnalysisInputError(source, "needs at least two energy points");
  }
  const width = Math.min(...rows.map((row) => row.length));
  return {
    energy: rows.map((row) => row[0]),
    columns: Array.from({ length: width - 1 }, (_, c) => rows.map((row) => row[c + 1])),
  };
}

/** Spin count from the leading dimension of the eigenvalues, 1 when they are absent. */
export function spinCount(results: CalculationResults, source: string) {
  if (!results.eigenvalues) {
    return 1;
  }
  return decodeNdarray(results.eigenvalues, source).shape[0] ?? 1;
}

/**
 * Builds the DOS document: total and, for spin-polarised calculations,
 * per-spin curves with their trapezoidal integrals over the energy grid.
 * Columns beyond the second are ignored unless `spinPolarized` is set.
 */
export function buildDosDocument(table: DosTable, fermiEnergy: number | null, spinPolarized = false, source = "DOS") {
  const deltaE = table.energy[1] - table.energy[0];
  if (spinPolarized && table.columns.length < 2) {
    throw new AnalysisInputError(source, "spin-polarised DOS needs spin-up and spin-down columns");
  }

  if (!spinPolarized) {
    const total = table.columns[0];
    return {
      fermi_energy: fermiEnergy,
      energy: table.energy,
      total_dos: total,
      spin_up: [] as number[],
      spin_down: [] as number[],
      difference: [] as number[],
      cumulative_spin_up: [] as number[],
      cumulative_spin_down: [] as number[],
      cumulative_total_dos: trapezoid(total, deltaE),
      cumulative_difference: [] as number[],
      metadata: { units: { energy: "eV", dos: "states/eV" }, spin_polarized: false },
    };
  }

  const [up, down] = table.columns;
  const total = up.map((value, i) => value + down[i]);
  const difference = up.map((value, i) => value - down[i]);
  return {
    fermi_energy: fermiEnergy,
    energy: table.energy,
    total_dos: total,
    spin_up: up,
    spin_down: down,
    difference,
    cumulative_spin_up: trapezoid(up, deltaE),
    cumulative_spin_down: trapezoid(down, deltaE),
    cumulative_total_dos: trapezoid(total, deltaE),
    cumulative_difference: trapezoid(difference, deltaE),
    metadata: { units: { energy: "eV", dos: "states/eV" }, spin_polarized: true },
  };
}

export const dosTask: AnalysisTask = {
  name: "dos",
  requiredInputs: [artifacts.dos, artifacts.results],
  async run({ workDir }) {
    const results = await loadResults(workDir);
    const source = path.join(workDir, artifacts.dos);
    const table = parseDosTable(await readText(source), source);
    const spinPolarized = spinCount(results, resultsPath(workDir)) === 2;
    const document = buildDosDocument(table, results.fermi_energy ?? null, spinPolarized, source);
    return writeJson(path.join(workDir, artifacts.dosJson), document, 4);
  },
};
