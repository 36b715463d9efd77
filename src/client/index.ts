export {
  createGuardedInferenceClient,
  type GuardedGenerateOptions,
  type GuardedInferenceClient,
  type GuardedInferenceClientConfig,
} from "./guarded-inference-client";
