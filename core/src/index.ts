export * from "./resilience/index.js";
export type {
  Action,
  CircuitState,
  ErrorKind,
  HealthCount,
  PipelineObservers,
  PolicyResult,
  ResiliencePipelineConfig,
} from "@stalwart/types";
