import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { artifacts } from "../constants";
import { sampleGrid } from "./netcdf";

export async function makeWorkDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), "job-runner-"));
}

export async function removeWorkDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export const SOLVER_OUTPUT = [
  "Siesta Version  : 5.0",
  "Total number of electrons:     8.000000",
  "siesta: Atomic forces (eV/Ang):",
  "     1    0.150000    0.200000    0.000000",
  "   Tot    0.300000    0.400000    0.000000",
  "",
  "Job completed",
  "",
].join("\n");

export const RESULTS = {
  energy: -100.5,
  free_energy: -100.6,
  fermi_energy: -4.2,
  eigenvalues: { __ndarray__: [[1, 2, 3], "float64", [-10, -5, 1, -9, -4, 2]] },
  kpoints: null,
  bandstructure: {
    energies: { __ndarray__: [[1, 3, 2], "float64", [-9, -3, -8, -2, -7, -1]] },
    reference: -4.2,
    path: {
      kpts: { __ndarray__: [[3, 3], "float64", [0, 0, 0, 0.1, 0, 0, 0.2, 0, 0]] },
      special_points: {
        G: { __ndarray__: [[3], "float64", [0, 0, 0]] },
        X: { __ndarray__: [[3], "float64", [0.2, 0, 0]] },
      },
      labelseq: "GX",
    },
  },
};

export const DOS_TABLE = ["# E   DOS", "-1.0  2.0", "-0.5  2.0", " 0.0  2.0", " 0.5  2.0", ""].join("\n");

export const PDOS_XML = `<?xml version="1.0" encoding="UTF-8" ?>
<pdos>
  <nspin>2</nspin>
  <norbitals>1</norbitals>
  <fermi_energy units="eV">-3.5</fermi_energy>
  <energy_values units="eV">
     -1.0 0.0 1.0
  </energy_values>
  <orbital index="1" atom_index="1" species="O" position="0.0 0.0 0.0" n="2" l="0" m="0" z="1">
    <data>
      0.1 0.2 0.3 0.4 0.5 0.6
    </data>
  </orbital>
</pdos>
`;

/** Outputs a complete single point analysis writes. */
export const SINGLE_POINT_OUTPUTS = [
  artifacts.generalInfo,
  artifacts.bandPlotJson,
  artifacts.dosJson,
  artifacts.rhoGridJson,
  artifacts.potentialGridJson,
  artifacts.pdosJson,
];

/** Writes the artifacts a successful single point calculation leaves behind. */
export async function writeSinglePointArtifacts(dir: string, overrides: Partial<Record<string, string | Buffer>> = {}) {
  const files: Record<string, string | Buffer> = {
    [artifacts.solverOutput]: SOLVER_OUTPUT,
    [artifacts.results]: JSON.stringify(RESULTS),
    [artifacts.dos]: DOS_TABLE,
    [artifacts.rhoGrid]: sampleGrid(),
    [artifacts.potentialGrid]: sampleGrid([0.5, 0.5, 1.5, 1.5]),
    [artifacts.pdos]: PDOS_XML,
  };
  for (const [name, content] of Object.entries(overrides)) {
    if (content !== undefined) {
      files[name] = content;
    }
  }
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
}
