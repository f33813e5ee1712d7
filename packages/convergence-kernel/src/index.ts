export * from "./stats/stats";
export * from "./history/phase_history";
export * from "./unwrap/angular_unwrap";
export * from "./trend/trend_fitter";
export * from "./eta/eta_projector";
export * from "./validator/closing_trend_validator";
export * from "./trigger/convergence_trigger";
export * from "./confidence/confidence_scorer";
export * from "./stability/eta_stability";
export * from "./evaluate";
