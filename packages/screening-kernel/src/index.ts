export * from "./config/accessor";
export * from "./rules/result";
export * from "./rules/qc";
export * from "./rules/trisomy";
export * from "./rules/sca";
export * from "./rules/rat";
export * from "./rules/cnv";
export * from "./reportability";
export * from "./interpreter";
export * from "./override/qc_override";
export * from "./validation/input_validation";
export * from "./risk/maternal_age_risk";
export * from "./advice/clinical_recommendation";
