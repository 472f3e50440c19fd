export * from "./decisionPolicy";
export * from "./feedbackStore";
export * from "./learnedPolicy";
export * from "./rulePolicy";
export * from "./thresholds";
