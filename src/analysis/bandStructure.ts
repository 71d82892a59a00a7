import path from "node:path";
import { KPATH_JUMP_THRESHOLD, artifacts } from "../constants";
import { logger } from "../logger";
import type { AnalysisTask } from "../types/job";
import { type Vec3, norm, sub, toVec3 } from "../utils/vector";
import { AnalysisInputError, decodeNdarray, writeJson } from "./io";
import { type BandStructureData, loadResults, resultsPath } from "./results";

const PALETTE = [
  [
    "rgba(0, 149, 168, 0.4)",
    "rgba(17, 46, 81,0.4)",
    "rgba(255, 112, 67, 0.4)",
    "rgba(128, 64, 211, 0.4)",
    "rgba(161, 132, 151, 0.4)",
  ],
  [
    "rgba(0, 149, 168, 0.8)",
    "rgba(17, 46, 81,0.8)",
    "rgba(255, 112, 67, 0.8)",
    "rgba(128, 64, 211, 0.8)",
    "rgba(161, 132, 151, 0.8)",
  ],
];
const GUIDE_LINE = { color: "rgb(180, 171, 186)", width: 1 };
const ENERGY_WINDOW: [number, number] = [-6.0, 8.0];
const AXIS_FONT = "Helvetica, san-serif";

/**
 * Accumulates distances between consecutive k-points into a 1-D path
 * coordinate. A step longer than `jumpThreshold` is a jump between
 * disconnected segments and adds nothing.
 */
export function accumulateKPath(kpoints: readonly Vec3[], jumpThreshold = KPATH_JUMP_THRESHOLD): number[] {
  const line = kpoints.length ? [0] : [];
  for (let i = 1; i < kpoints.length; i += 1) {
    const step = norm(sub(kpoints[i], kpoints[i - 1]));
    line.push(line[i - 1] + (step > jumpThreshold ? 0 : step));
  }
  return line;
}

/** Splits a label sequence like "GXL,UX" into tick labels, merging labels across a jump ("L,U"). */
export function tickLabels(labelseq: string): string[] {
  const labels: string[] = [];
  labelseq.split(",").forEach((segment, index) => {
    const chars = [...segment];
    if (index > 0 && labels.length && chars.length) {
      labels[labels.length - 1] = `${labels[labels.length - 1]},${chars.shift()}`;
    }
    labels.push(...chars);
  });
  return labels;
}

/** Indices of special k-points in path order, keeping one index per run of adjacent points. */
export function specialPointIndices(kpoints: readonly Vec3[], specialPoints: readonly Vec3[]): number[] {
  const hits: number[] = [];
  for (const point of specialPoints) {
    kpoints.forEach((k, ik) => {
      if (k[0] === point[0] && k[1] === point[1] && k[2] === point[2]) {
        hits.push(ik);
      }
    });
  }
  hits.sort((a, b) => a - b);
  return hits.filter((ik, i) => i === 0 || ik - hits[i - 1] > 1);
}

interface BandData {
  fermiEnergy: number;
  kpath: number[];
  nSpin: number;
  nBands: number;
  /** bands[spin][band][k], shifted by the Fermi energy */
  bands: number[][][];
  xticks: number[];
  xticklabels: string[];
}

export function buildBandData(band: BandStructureData, source: string): BandData {
  const energies = decodeNdarray(band.energies, source);
  if (energies.shape.length !== 3) {
    throw new AnalysisInputError(source, "band energies must have shape [spin, k, band]");
  }
  const [nSpin, nK, nBands] = energies.shape;
  if (!nSpin || !nK) {
    throw new AnalysisInputError(source, "band structure has no k-points");
  }
  const kptsArray = decodeNdarray(band.path.kpts, source);
  if (kptsArray.data.length !== nK * 3) {
    throw new AnalysisInputError(source, `band path holds ${kptsArray.data.length / 3} k-points, energies ${nK}`);
  }
  const kpoints = Array.from({ length: nK }, (_, ik) => toVec3(kptsArray.data, ik * 3));
  const specials = Object.values(band.path.special_points).map((encoded) => toVec3(decodeNdarray(encoded, source).data));

  const bands = Array.from({ length: nSpin }, (_, s) =>
    Array.from({ length: nBands }, (_, b) =>
      Array.from({ length: nK }, (_, k) => energies.data[(s * nK + k) * nBands + b] - band.reference),
    ),
  );

  const kpath = accumulateKPath(kpoints);
  return {
    fermiEnergy: band.reference,
    kpath,
    nSpin,
    nBands,
    bands,
    xticks: specialPointIndices(kpoints, specials).map((ik) => kpath[ik]),
    xticklabels: tickLabels(band.path.labelseq),
  };
}

function guide(x: number[], y: number[]) {
  return { type: "scatter", x, y, showlegend: false, line: GUIDE_LINE };
}

export function buildBandFigure(data: BandData) {
  const xMin = Math.min(...data.kpath);
  const xMax = Math.max(...data.kpath);
  // Bands lying entirely below the Fermi level.
  const occupied = data.bands[0].filter((_, b) =>
    Math.max(...data.bands.map((spin) => Math.max(...spin[b]))) < 0,
  ).length;
  const spinLabels = data.nSpin === 2 ? ["↑", "↓"] : [""];

  const traces: Record<string, unknown>[] = data.xticks.map((x) =>
    guide([x, x], [ENERGY_WINDOW[0] - 1, ENERGY_WINDOW[1] + 1]),
  );
  for (const y of [ENERGY_WINDOW[0], ENERGY_WINDOW[1], 0]) {
    traces.push(guide([-1, xMax + 1], [y, y]));
  }
  data.bands.forEach((spin, s) => {
    spin.forEach((values, b) => {
      traces.push({
        type: "scatter",
        x: data.kpath,
        y: values.map((v) => v - 0.0001 * s),
        mode: "lines",
        showlegend: b >= occupied - 3 && b < occupied + 3,
        line: { shape: "linear", color: PALETTE[s % 2][b % 5], width: 4 - 2 * s },
        name: `band_${b + 1}${spinLabels[s] ?? ""}`,
        yaxis: "y1",
      });
    });
  });

  return {
    data: traces,
    layout: {
      title: { text: "" },
      width: 1000,
      height: 800,
      xaxis: {
        range: [xMin, xMax],
        tickmode: "array",
        tickvals: data.xticks,
        ticktext: data.xticklabels,
        mirror: true,
        ticks: "outside",
        tickfont: { family: AXIS_FONT, size: 24, color: "black" },
        title: { text: "", font: { size: 8, family: AXIS_FONT } },
      },
      yaxis: {
        mirror: true,
        ticks: "outside",
        tickfont: { family: AXIS_FONT, size: 18, color: "black" },
        range: ENERGY_WINDOW,
        title: { text: "Energy (eV)", font: { size: 24, family: AXIS_FONT } },
      },
      legend: { font: { family: "Courier", size: 24, color: "black" } },
      plot_bgcolor: "rgba(249,254,254, 0.99)",
      paper_bgcolor: "rgba(249,253,253, 0.99)",
    },
  };
}

export const bandStructureTask: AnalysisTask = {
  name: "band_structure",
  requiredInputs: [artifacts.results],
  async run({ workDir }) {
    const results = await loadResults(workDir);
    if (!results.bandstructure) {
      logger.info({ task: "band_structure" }, "No band structure in results, nothing to plot");
      return null;
    }
    const figure = buildBandFigure(buildBandData(results.bandstructure, resultsPath(workDir)));
    return writeJson(path.join(workDir, artifacts.bandPlotJson), figure, 2);
  },
};
