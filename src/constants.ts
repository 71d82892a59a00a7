// Artifact names shared with the solver and downstream consumers.
export const artifacts = {
  solverOutput: "siesta.out",
  results: "calc_results_task.json",
  generalInfo: "general_info.json",
  dos: "siesta.DOS",
  rhoGrid: "Rho.grid.nc",
  potentialGrid: "ElectrostaticPotential.grid.nc",
  pdos: "siesta.PDOS.xml",
  trajectory: "geometry_optimization.traj",
  bandPlotJson: "band_structure_plot.json",
  dosJson: "DOS.json",
  rhoGridJson: "Rho_grid.json",
  potentialGridJson: "ElectrostaticPotential_grid.json",
  pdosJson: "pdos_data.json",
  trajectoryJson: "trajectory_analysis.json",
} as const;

export const COMPLETION_SENTINEL = "Job completed";

export const KPATH_JUMP_THRESHOLD = 0.2;
